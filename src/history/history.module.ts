import { Logger, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Keyv from 'keyv';
import KeyvRedis from '@keyv/redis';
import { HistoryStore, KeyvHistoryStore } from './history.store';
import { ConversationHistoryService } from './conversation-history.service';
import {
  HISTORY_OPTIONS,
  HISTORY_TYPES,
  type HistoryOptions,
} from './history.types';
import {
  readChoice,
  readNumber,
  readString,
} from '../shared/utils/config-readers';

@Module({
  providers: [
    {
      provide: HistoryStore,
      inject: [ConfigService],
      useFactory: (configService: ConfigService): HistoryStore => {
        const logger = new Logger('HistoryModule');
        const type = readChoice(configService, 'HISTORY_TYPE', HISTORY_TYPES, 'memory');
        const maxTurns = readNumber(configService, 'HISTORY_MAX_TURNS', 200);
        const ttlSeconds = readNumber(configService, 'HISTORY_TTL_SECONDS', 86400);

        const keyv =
          type === 'redis'
            ? new Keyv({
                store: new KeyvRedis(
                  readString(configService, 'HISTORY_REDIS_URL', 'redis://localhost:6379'),
                ),
                namespace: 'history',
              })
            : new Keyv({ namespace: 'history' });
        keyv.on('error', (error: unknown) => {
          logger.warn(
            `History backend error: ${error instanceof Error ? error.message : String(error)}`,
          );
        });

        logger.log(
          `History backend: ${type} (max ${maxTurns} turns per conversation, ttl ${ttlSeconds}s)`,
        );
        return new KeyvHistoryStore(keyv, maxTurns, {
          ttlMs: ttlSeconds * 1000,
          // The in-process map only evicts expired keys when they are read
          dropOnRelease: type === 'memory',
        });
      },
    },
    {
      provide: HISTORY_OPTIONS,
      inject: [ConfigService],
      useFactory: (configService: ConfigService): HistoryOptions => ({
        promptTurns: readNumber(configService, 'HISTORY_PROMPT_TURNS', 6),
        timeoutMs: readNumber(configService, 'HISTORY_TIMEOUT_MS', 2000),
      }),
    },
    ConversationHistoryService,
  ],
  exports: [ConversationHistoryService],
})
export class HistoryModule {}
