import type { VectorStoreType } from '../types';

export interface VectorPoint {
  id: string;
  vector: number[];
  payload: Record<string, unknown>;
}

export interface VectorMatch {
  id: string;
  /** Cosine similarity in [-1, 1] */
  score: number;
  payload: Record<string, unknown>;
}

export interface CollectionDescription {
  name: string;
  fields: string[];
}

/**
 * Vector similarity capability, shared by the semantic cache tier and by
 * retrieval. One implementation is selected at startup (VECTOR_STORE_TYPE).
 */
export abstract class VectorStore {
  abstract readonly kind: VectorStoreType;

  /** Create the collection with cosine distance when it does not exist yet. */
  abstract ensureCollection(name: string, dimensions: number): Promise<void>;

  abstract upsert(collection: string, points: VectorPoint[]): Promise<void>;

  /** Nearest neighbours, best first. */
  abstract search(
    collection: string,
    vector: number[],
    limit: number,
  ): Promise<VectorMatch[]>;

  /** Collections with the payload keys of a sampled point. */
  abstract describeCollections(): Promise<CollectionDescription[]>;

  abstract healthCheck(): Promise<boolean>;
}
