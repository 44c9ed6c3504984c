import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { CacheEngineModule } from '../cache/cache-engine.module';
import { HistoryModule } from '../history/history.module';
import { IntentClassifierService } from './services/intent-classifier.service';
import { TopicResolverService } from './services/topic-resolver.service';
import { RetrievalService } from './services/retrieval.service';
import { PipelineWorkflowService } from './workflow/pipeline-workflow.service';
import { RETRIEVAL_OPTIONS, type RetrievalOptions } from './types/pipeline.types';
import { readNumber } from '../shared/utils/config-readers';

@Module({
  imports: [CacheEngineModule, HistoryModule],
  providers: [
    {
      provide: RETRIEVAL_OPTIONS,
      useFactory: (configService: ConfigService): RetrievalOptions => ({
        defaultLimit: readNumber(configService, 'RETRIEVAL_DEFAULT_LIMIT', 20),
        timeoutMs: readNumber(configService, 'RETRIEVAL_TIMEOUT_MS', 5000),
      }),
      inject: [ConfigService],
    },
    IntentClassifierService,
    TopicResolverService,
    RetrievalService,
    PipelineWorkflowService,
  ],
  exports: [PipelineWorkflowService],
})
export class OrchestratorModule {}
