import { Global, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { LLMProviderFactory } from './llm-provider.factory';
import { EmbeddingProviderFactory } from './embedding-provider.factory';
import { LangChainEmbedder, LangChainTextGenerator } from './text-generation';
import { ANSWER_MODEL, EMBEDDER, ROUTING_MODEL } from './provider.tokens';
import type { Embedder, TextGenerator } from './types';
import { VectorStore } from './vector-store/vector-store';
import { VectorStoreFactory } from './vector-store/vector-store.factory';
import { readNumber } from '../shared/utils/config-readers';

/**
 * External capabilities: generation models, embeddings and the vector store.
 * Each is selected once at startup from configuration.
 */
@Global()
@Module({
  providers: [
    LLMProviderFactory,
    EmbeddingProviderFactory,
    {
      provide: ANSWER_MODEL,
      inject: [LLMProviderFactory, ConfigService],
      useFactory: (
        factory: LLMProviderFactory,
        configService: ConfigService,
      ): TextGenerator =>
        new LangChainTextGenerator(
          factory.createAnswerModel(),
          'answer',
          readNumber(configService, 'GENERATION_TIMEOUT_MS', 60000),
        ),
    },
    {
      provide: ROUTING_MODEL,
      inject: [LLMProviderFactory, ConfigService],
      useFactory: (
        factory: LLMProviderFactory,
        configService: ConfigService,
      ): TextGenerator =>
        new LangChainTextGenerator(
          factory.createRoutingModel(),
          'routing',
          readNumber(configService, 'GENERATION_TIMEOUT_MS', 60000),
        ),
    },
    {
      provide: EMBEDDER,
      inject: [EmbeddingProviderFactory, ConfigService],
      useFactory: (
        factory: EmbeddingProviderFactory,
        configService: ConfigService,
      ): Embedder => {
        const settings = factory.resolveSettings();
        return new LangChainEmbedder(
          factory.createEmbeddingModel(settings),
          settings.dimensions,
          readNumber(configService, 'EMBEDDING_TIMEOUT_MS', 10000),
        );
      },
    },
    {
      provide: VectorStore,
      inject: [ConfigService],
      useFactory: (configService: ConfigService): VectorStore =>
        VectorStoreFactory.create(configService),
    },
  ],
  exports: [ANSWER_MODEL, ROUTING_MODEL, EMBEDDER, VectorStore],
})
export class ProvidersModule {}
