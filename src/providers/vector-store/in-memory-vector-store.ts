import { Logger } from '@nestjs/common';
import {
  VectorStore,
  type CollectionDescription,
  type VectorMatch,
  type VectorPoint,
} from './vector-store';

interface MemoryCollection {
  dimensions: number;
  points: Map<string, VectorPoint>;
}

/**
 * In-process vector store using cosine similarity.
 * Backs VECTOR_STORE_TYPE=memory and the test suites.
 */
export class InMemoryVectorStore extends VectorStore {
  readonly kind = 'memory' as const;

  private readonly logger = new Logger(InMemoryVectorStore.name);
  private readonly collections = new Map<string, MemoryCollection>();

  async ensureCollection(name: string, dimensions: number): Promise<void> {
    if (!this.collections.has(name)) {
      this.collections.set(name, { dimensions, points: new Map() });
      this.logger.debug(`Created collection "${name}" (${dimensions}D)`);
    }
  }

  async upsert(collection: string, points: VectorPoint[]): Promise<void> {
    const target = this.getCollection(collection);
    for (const point of points) {
      if (point.vector.length !== target.dimensions) {
        throw new Error(
          `Vector dimension ${point.vector.length} does not match collection "${collection}" (${target.dimensions})`,
        );
      }
      target.points.set(point.id, {
        id: point.id,
        vector: [...point.vector],
        payload: { ...point.payload },
      });
    }
  }

  async search(
    collection: string,
    vector: number[],
    limit: number,
  ): Promise<VectorMatch[]> {
    const target = this.getCollection(collection);
    const matches: VectorMatch[] = [];

    for (const point of target.points.values()) {
      matches.push({
        id: point.id,
        score: cosineSimilarity(vector, point.vector),
        payload: { ...point.payload },
      });
    }

    // Sort by similarity (descending) and return top K
    matches.sort((a, b) => b.score - a.score);
    return matches.slice(0, limit);
  }

  async describeCollections(): Promise<CollectionDescription[]> {
    return [...this.collections.entries()].map(([name, collection]) => {
      const [sample] = [...collection.points.values()];
      return {
        name,
        fields: sample ? Object.keys(sample.payload) : [],
      };
    });
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }

  count(collection: string): number {
    return this.collections.get(collection)?.points.size ?? 0;
  }

  private getCollection(name: string): MemoryCollection {
    const collection = this.collections.get(name);
    if (!collection) {
      throw new Error(`Collection "${name}" not found`);
    }
    return collection;
  }
}

export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length) {
    throw new Error('Vectors must have the same length');
  }

  let dotProduct = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i++) {
    dotProduct += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  const denominator = Math.sqrt(normA) * Math.sqrt(normB);
  if (denominator === 0) {
    return 0;
  }

  return dotProduct / denominator;
}
