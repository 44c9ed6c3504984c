import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { CacheEngineService } from './cache-engine.service';
import {
  CacheManagerKeyValueStore,
  KeyValueStore,
} from './stores/key-value.store';
import {
  CACHE_ENGINE_OPTIONS,
  type CacheEngineOptions,
} from './types/cache.types';
import { EMBEDDER } from '../providers/provider.tokens';
import type { Embedder } from '../providers/types';
import {
  readBoolean,
  readNumber,
  readString,
} from '../shared/utils/config-readers';

@Module({
  providers: [
    { provide: KeyValueStore, useClass: CacheManagerKeyValueStore },
    {
      provide: CACHE_ENGINE_OPTIONS,
      inject: [ConfigService, EMBEDDER],
      useFactory: (
        configService: ConfigService,
        embedder: Embedder,
      ): CacheEngineOptions => ({
        enabled: readBoolean(configService, 'CACHE_ENABLED', true),
        ttlSeconds: Math.max(0, readNumber(configService, 'CACHE_TTL_SECONDS', 3600)),
        similarityThreshold: Math.min(
          1,
          Math.max(0, readNumber(configService, 'SEMANTIC_CACHE_THRESHOLD', 0.5)),
        ),
        semanticCollection: readString(
          configService,
          'SEMANTIC_CACHE_COLLECTION',
          'prompt_response_cache',
        ),
        dimensions: embedder.dimensions,
        timeoutMs: readNumber(configService, 'CACHE_TIMEOUT_MS', 2000),
      }),
    },
    CacheEngineService,
  ],
  exports: [CacheEngineService],
})
export class CacheEngineModule {}
