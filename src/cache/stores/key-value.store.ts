import { Inject, Injectable } from '@nestjs/common';
import { CACHE_MANAGER } from '@nestjs/cache-manager';
import type { Cache } from 'cache-manager';

/**
 * Key-value capability used by the exact cache tier.
 */
export abstract class KeyValueStore {
  abstract get(key: string): Promise<unknown>;
  /** ttlMs undefined means no expiry */
  abstract set(key: string, value: unknown, ttlMs?: number): Promise<void>;
  abstract delete(key: string): Promise<void>;
}

@Injectable()
export class CacheManagerKeyValueStore extends KeyValueStore {
  constructor(@Inject(CACHE_MANAGER) private readonly cache: Cache) {
    super();
  }

  async get(key: string): Promise<unknown> {
    return this.cache.get<unknown>(key);
  }

  async set(key: string, value: unknown, ttlMs?: number): Promise<void> {
    await this.cache.set(key, value, ttlMs);
  }

  async delete(key: string): Promise<void> {
    await this.cache.del(key);
  }
}
