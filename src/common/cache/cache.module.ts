/**
 * Cache Configuration Module
 * Exact-tier key-value backend through @nestjs/cache-manager and Keyv.
 * CACHE_BACKEND=redis uses @keyv/redis, CACHE_BACKEND=memory the in-process map.
 */

import { Module, Global, Logger } from '@nestjs/common';
import { CacheModule } from '@nestjs/cache-manager';
import { ConfigModule, ConfigService } from '@nestjs/config';
import Keyv from 'keyv';
import KeyvRedis from '@keyv/redis';
import {
  readChoice,
  readNumber,
  readString,
} from '../../shared/utils/config-readers';

@Global()
@Module({
  imports: [
    CacheModule.registerAsync({
      imports: [ConfigModule],
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => {
        const logger = new Logger('CacheConfigModule');
        const backend = readChoice(
          configService,
          'CACHE_BACKEND',
          ['redis', 'memory'] as const,
          'redis',
        );
        // Prefix all keys so cache entries never collide with application data
        const namespace = readString(
          configService,
          'CACHE_KEY_PREFIX',
          'response-cache',
        );

        let store: Keyv;
        if (backend === 'redis') {
          const redisUrl = readString(
            configService,
            'CACHE_REDIS_URL',
            'redis://localhost:6379',
          );
          store = new Keyv({ store: new KeyvRedis(redisUrl), namespace });
        } else {
          store = new Keyv({ namespace });
        }
        store.on('error', (error: unknown) => {
          logger.warn(
            `Cache backend error: ${error instanceof Error ? error.message : String(error)}`,
          );
        });
        logger.log(`Exact cache backend: ${backend} (namespace ${namespace})`);

        // TTL from config in seconds, 0 keeps entries until evicted
        const ttlSeconds = readNumber(configService, 'CACHE_TTL_SECONDS', 3600);

        return {
          stores: [store],
          ttl: ttlSeconds > 0 ? ttlSeconds * 1000 : undefined,
        };
      },
      isGlobal: true,
    }),
  ],
  exports: [CacheModule],
})
export class CacheConfigModule {}
