/**
 * Cache Engine
 * Two-tier response cache: exact match on the normalized query, then the
 * nearest semantic neighbour above a cosine threshold.
 *
 * Every backend call is bounded by a timeout. Failures on either tier
 * degrade to a miss (lookup) or are dropped (store) and only logged.
 */

import { Inject, Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { createHash } from 'crypto';
import { KeyValueStore } from './stores/key-value.store';
import { VectorStore } from '../providers/vector-store/vector-store';
import {
  CacheBackendUnavailableError,
  CacheError,
  CacheTimeoutError,
  type CacheTier,
} from './errors/cache-errors';
import {
  CACHE_ENGINE_OPTIONS,
  type CacheEngineOptions,
  type CacheLookup,
  type EmbeddingSource,
  type ExactCacheEntry,
} from './types/cache.types';
import {
  OperationTimeoutError,
  withTimeout,
} from '../shared/utils/with-timeout';

function isExactCacheEntry(value: unknown): value is ExactCacheEntry {
  return (
    typeof value === 'object' &&
    value !== null &&
    'response' in value &&
    typeof value.response === 'string'
  );
}

/**
 * Convert string to UUID format; vector stores only accept UUID point ids.
 */
function stringToUuid(str: string): string {
  const hash = createHash('md5').update(str).digest('hex');
  return `${hash.substring(0, 8)}-${hash.substring(8, 12)}-4${hash.substring(13, 16)}-${((parseInt(hash.substring(16, 18), 16) & 0x3f) | 0x80).toString(16)}${hash.substring(18, 20)}-${hash.substring(20, 32)}`;
}

@Injectable()
export class CacheEngineService implements OnModuleInit {
  private readonly logger = new Logger(CacheEngineService.name);

  constructor(
    private readonly keyValueStore: KeyValueStore,
    private readonly vectorStore: VectorStore,
    @Inject(CACHE_ENGINE_OPTIONS) private readonly options: CacheEngineOptions,
  ) {}

  async onModuleInit(): Promise<void> {
    if (!this.options.enabled) {
      this.logger.warn('Response cache is DISABLED');
      return;
    }

    try {
      await this.vectorStore.ensureCollection(
        this.options.semanticCollection,
        this.options.dimensions,
      );
    } catch (error) {
      // Non-critical: the semantic tier degrades to misses until the store is back
      this.logger.error(
        `Semantic cache collection initialization failed: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }

  /**
   * Exact-tier key for a normalized query.
   */
  exactKey(normalizedQuery: string): string {
    return createHash('sha256').update(normalizedQuery).digest('hex');
  }

  /**
   * Semantic-tier point id for a normalized query; stable, so repeated
   * stores overwrite instead of duplicating.
   */
  semanticId(normalizedQuery: string): string {
    return stringToUuid(normalizedQuery);
  }

  async lookup(
    normalizedQuery: string,
    embeddingSource: EmbeddingSource,
  ): Promise<CacheLookup> {
    const supplied = Array.isArray(embeddingSource) ? embeddingSource : null;
    if (!this.options.enabled) {
      return { outcome: { kind: 'miss' }, embedding: supplied };
    }

    const startTime = Date.now();
    const key = this.exactKey(normalizedQuery);

    try {
      const entry = await this.call('exact', 'get', this.keyValueStore.get(key));
      if (isExactCacheEntry(entry)) {
        this.logger.log(
          `[CacheEngine] tier=exact status=hit duration=${Date.now() - startTime}ms`,
        );
        return {
          outcome: { kind: 'exact_hit', response: entry.response },
          embedding: supplied,
        };
      }
    } catch (error) {
      this.logDegraded(error);
    }

    let embedding: number[];
    try {
      embedding = supplied ?? (await this.resolveEmbedding(embeddingSource));
    } catch (error) {
      this.logger.warn(
        `[CacheEngine] tier=semantic status=skipped reason=embedding_failed error=${error instanceof Error ? error.message : String(error)}`,
      );
      return { outcome: { kind: 'miss' }, embedding: null };
    }

    try {
      const [nearest] = await this.call(
        'semantic',
        'search',
        this.vectorStore.search(this.options.semanticCollection, embedding, 1),
      );
      const response = nearest?.payload.response;

      if (
        nearest &&
        nearest.score >= this.options.similarityThreshold &&
        typeof response === 'string'
      ) {
        this.logger.log(
          `[CacheEngine] tier=semantic status=hit score=${nearest.score.toFixed(4)} threshold=${this.options.similarityThreshold} duration=${Date.now() - startTime}ms`,
        );
        // Prime the exact tier so the next identical query skips the embedding
        await this.writeExact(key, normalizedQuery, response);
        return {
          outcome: { kind: 'semantic_hit', response, score: nearest.score },
          embedding,
        };
      }

      if (nearest) {
        this.logger.log(
          `[CacheEngine] tier=semantic status=miss score=${nearest.score.toFixed(4)} threshold=${this.options.similarityThreshold}`,
        );
      }
    } catch (error) {
      this.logDegraded(error);
    }

    this.logger.log(
      `[CacheEngine] status=miss duration=${Date.now() - startTime}ms`,
    );
    return { outcome: { kind: 'miss' }, embedding };
  }

  /**
   * Writes a generated response to both tiers. Never throws.
   */
  async store(
    normalizedQuery: string,
    embeddingSource: EmbeddingSource,
    response: string,
  ): Promise<void> {
    if (!this.options.enabled) {
      return;
    }

    await Promise.all([
      this.writeExact(this.exactKey(normalizedQuery), normalizedQuery, response),
      this.writeSemantic(normalizedQuery, embeddingSource, response),
    ]);
  }

  private async writeExact(
    key: string,
    normalizedQuery: string,
    response: string,
  ): Promise<void> {
    const entry: ExactCacheEntry = {
      response,
      normalizedQuery,
      createdAt: new Date().toISOString(),
    };
    const ttlMs =
      this.options.ttlSeconds > 0 ? this.options.ttlSeconds * 1000 : undefined;

    try {
      await this.call('exact', 'set', this.keyValueStore.set(key, entry, ttlMs));
    } catch (error) {
      this.logDegraded(error);
    }
  }

  private async writeSemantic(
    normalizedQuery: string,
    embeddingSource: EmbeddingSource,
    response: string,
  ): Promise<void> {
    try {
      const embedding = await this.resolveEmbedding(embeddingSource);
      await this.call(
        'semantic',
        'upsert',
        this.vectorStore.upsert(this.options.semanticCollection, [
          {
            id: this.semanticId(normalizedQuery),
            vector: embedding,
            payload: {
              normalized_prompt: normalizedQuery,
              response,
              created_at: new Date().toISOString(),
            },
          },
        ]),
      );
    } catch (error) {
      this.logDegraded(error);
    }
  }

  private async resolveEmbedding(source: EmbeddingSource): Promise<number[]> {
    return Array.isArray(source) ? source : source();
  }

  private async call<T>(
    tier: CacheTier,
    operation: string,
    pending: Promise<T>,
  ): Promise<T> {
    try {
      return await withTimeout(
        pending,
        this.options.timeoutMs,
        `${tier} cache ${operation}`,
      );
    } catch (error) {
      throw error instanceof OperationTimeoutError
        ? new CacheTimeoutError(tier, operation, this.options.timeoutMs)
        : new CacheBackendUnavailableError(tier, operation, error);
    }
  }

  private logDegraded(error: unknown): void {
    if (error instanceof CacheError) {
      this.logger.warn(
        `[CacheEngine] tier=${error.tier} status=degraded code=${error.code} error=${error.message}`,
      );
      return;
    }
    this.logger.warn(
      `[CacheEngine] status=degraded error=${error instanceof Error ? error.message : String(error)}`,
    );
  }
}
