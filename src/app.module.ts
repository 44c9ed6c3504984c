import { Module, NestModule, MiddlewareConsumer } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ScheduleModule } from '@nestjs/schedule';
import { LoggerModule } from 'nestjs-pino';
import { RequestIdMiddleware } from './shared/middleware/request-id.middleware';
import { pinoConfig } from './shared/logging/pino.config';
import { CacheConfigModule } from './common/cache/cache.module';
import { ProvidersModule } from './providers/providers.module';
import { ConfigStoreModule } from './config-store/config-store.module';
import { CacheEngineModule } from './cache/cache-engine.module';
import { HistoryModule } from './history/history.module';
import { OrchestratorModule } from './orchestrator/orchestrator.module';
import { GatewayModule } from './gateway/gateway.module';
import { AdminModule } from './admin/admin.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
    }),
    LoggerModule.forRoot(pinoConfig),
    ScheduleModule.forRoot(),
    CacheConfigModule,
    ProvidersModule,
    ConfigStoreModule,
    CacheEngineModule,
    HistoryModule,
    OrchestratorModule,
    GatewayModule,
    AdminModule,
  ],
  controllers: [],
  providers: [],
})
export class AppModule implements NestModule {
  configure(consumer: MiddlewareConsumer) {
    consumer.apply(RequestIdMiddleware).forRoutes('*');
  }
}
