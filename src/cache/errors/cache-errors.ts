import { ServiceError } from '../../common/errors/service.error';

export type CacheTier = 'exact' | 'semantic';
export type CacheErrorCode = 'CACHE_BACKEND_UNAVAILABLE' | 'CACHE_TIMEOUT';

/**
 * Cache failures never reach the caller: lookups degrade to a miss and
 * writes are dropped. The classes exist so logs carry a stable code.
 */
export abstract class CacheError extends ServiceError {
  declare readonly code: CacheErrorCode;

  protected constructor(
    message: string,
    code: CacheErrorCode,
    public readonly tier: CacheTier,
    cause?: unknown,
  ) {
    super(message, code, true, cause);
  }
}

export class CacheBackendUnavailableError extends CacheError {
  constructor(tier: CacheTier, operation: string, cause: unknown) {
    super(
      `${tier} cache ${operation} failed: ${cause instanceof Error ? cause.message : String(cause)}`,
      'CACHE_BACKEND_UNAVAILABLE',
      tier,
      cause,
    );
  }
}

export class CacheTimeoutError extends CacheError {
  constructor(tier: CacheTier, operation: string, timeoutMs: number) {
    super(
      `${tier} cache ${operation} timed out after ${timeoutMs}ms`,
      'CACHE_TIMEOUT',
      tier,
    );
  }
}
