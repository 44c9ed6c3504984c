export type CacheOutcome =
  | { kind: 'exact_hit'; response: string }
  | { kind: 'semantic_hit'; response: string; score: number }
  | { kind: 'miss' };

export interface CacheLookup {
  outcome: CacheOutcome;
  /** Embedding computed (or supplied) during the lookup, for reuse by store and retrieval */
  embedding: number[] | null;
}

/** An embedding already at hand, or a way to compute it when needed */
export type EmbeddingSource = number[] | (() => Promise<number[]>);

export interface CacheEngineOptions {
  enabled: boolean;
  /** 0 disables expiry of exact-tier entries */
  ttlSeconds: number;
  /** Cosine similarity a semantic neighbour must reach, in [0, 1] */
  similarityThreshold: number;
  semanticCollection: string;
  dimensions: number;
  timeoutMs: number;
}

/** Value kept in the exact tier */
export interface ExactCacheEntry {
  response: string;
  normalizedQuery: string;
  createdAt: string;
}

export const CACHE_ENGINE_OPTIONS = 'CACHE_ENGINE_OPTIONS';
