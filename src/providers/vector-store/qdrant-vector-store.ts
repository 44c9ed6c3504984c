import { Logger } from '@nestjs/common';
import { QdrantClient } from '@qdrant/js-client-rest';
import {
  VectorStore,
  type CollectionDescription,
  type VectorMatch,
  type VectorPoint,
} from './vector-store';

export interface QdrantVectorStoreOptions {
  url: string;
  apiKey?: string;
  /** Named vector to read and write; unnamed default vector when absent. */
  vectorName?: string;
}

export class QdrantVectorStore extends VectorStore {
  readonly kind = 'qdrant' as const;

  private readonly logger = new Logger(QdrantVectorStore.name);
  private readonly client: QdrantClient;
  private readonly vectorName: string | undefined;

  constructor(options: QdrantVectorStoreOptions) {
    super();
    this.client = new QdrantClient({ url: options.url, apiKey: options.apiKey });
    this.vectorName = options.vectorName;
  }

  async ensureCollection(name: string, dimensions: number): Promise<void> {
    try {
      await this.client.getCollection(name);
      this.logger.log(`Collection "${name}" exists`);
      return;
    } catch {
      this.logger.log(`Collection "${name}" not found`);
    }

    this.logger.log(`Creating collection "${name}" (${dimensions}D, Cosine)...`);
    const params = { size: dimensions, distance: 'Cosine' as const };
    await this.client.createCollection(name, {
      vectors: this.vectorName ? { [this.vectorName]: params } : params,
    });
    this.logger.log(`✓ Collection "${name}" created`);
  }

  async upsert(collection: string, points: VectorPoint[]): Promise<void> {
    await this.client.upsert(collection, {
      wait: true,
      points: points.map((point) => ({
        id: point.id,
        vector: this.vectorName
          ? { [this.vectorName]: point.vector }
          : point.vector,
        payload: point.payload,
      })),
    });
  }

  async search(
    collection: string,
    vector: number[],
    limit: number,
  ): Promise<VectorMatch[]> {
    const results = await this.client.search(collection, {
      vector: this.vectorName ? { name: this.vectorName, vector } : vector,
      limit,
      with_payload: true,
    });

    return results.map((result) => ({
      id: String(result.id),
      score: result.score,
      payload: result.payload ?? {},
    }));
  }

  async describeCollections(): Promise<CollectionDescription[]> {
    const { collections } = await this.client.getCollections();
    const descriptions: CollectionDescription[] = [];

    for (const { name } of collections) {
      const { points } = await this.client.scroll(name, {
        limit: 1,
        with_payload: true,
        with_vector: false,
      });
      const payload = points[0]?.payload ?? {};
      descriptions.push({ name, fields: Object.keys(payload) });
    }

    return descriptions;
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.client.getCollections();
      return true;
    } catch {
      return false;
    }
  }
}
