/**
 * Embedding Provider Factory
 * Builds the embedding model behind the semantic cache and retrieval.
 */

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { OllamaEmbeddings } from '@langchain/ollama';
import { OpenAIEmbeddings } from '@langchain/openai';
import { GoogleGenerativeAIEmbeddings } from '@langchain/google-genai';
import type { Embeddings } from '@langchain/core/embeddings';
import { EMBEDDING_PROVIDERS, type EmbeddingProvider } from './types';
import { ProviderNotConfiguredError } from './errors/provider-config.error';
import { readChoice, readNumber, readString } from '../shared/utils/config-readers';

export interface EmbeddingModelSettings {
  provider: EmbeddingProvider;
  model: string;
  /** Vector size the cache collection is created with */
  dimensions: number;
}

interface ProviderDefaults {
  modelVariable: string;
  model: string;
}

const PROVIDER_DEFAULTS: Record<EmbeddingProvider, ProviderDefaults> = {
  ollama: { modelVariable: 'OLLAMA_EMBEDDING_MODEL', model: 'bge-m3:567m' },
  openai: { modelVariable: 'OPENAI_EMBEDDING_MODEL', model: 'text-embedding-3-small' },
  google: { modelVariable: 'GOOGLE_EMBEDDING_MODEL', model: 'text-embedding-004' },
};

const KNOWN_DIMENSIONS: Record<string, number> = {
  'bge-m3:567m': 1024,
  'bge-m3': 1024,
  'nomic-embed-text': 768,
  'text-embedding-3-small': 1536,
  'text-embedding-3-large': 3072,
  'text-embedding-ada-002': 1536,
  'text-embedding-004': 768,
  'embedding-001': 768,
};

const FALLBACK_DIMENSIONS = 1024;

@Injectable()
export class EmbeddingProviderFactory {
  private readonly logger = new Logger(EmbeddingProviderFactory.name);

  constructor(private readonly configService: ConfigService) {}

  /**
   * Provider, model and vector size from env. EMBEDDING_DIMENSIONS wins
   * over the size known for the model.
   */
  resolveSettings(): EmbeddingModelSettings {
    const provider = readChoice(
      this.configService,
      'EMBEDDING_PROVIDER',
      EMBEDDING_PROVIDERS,
      'ollama',
    );
    const defaults = PROVIDER_DEFAULTS[provider];
    const model = readString(this.configService, defaults.modelVariable, defaults.model);
    const dimensions = readNumber(
      this.configService,
      'EMBEDDING_DIMENSIONS',
      KNOWN_DIMENSIONS[model] ?? FALLBACK_DIMENSIONS,
    );
    return { provider, model, dimensions };
  }

  createEmbeddingModel(settings: EmbeddingModelSettings = this.resolveSettings()): Embeddings {
    this.logger.log(
      `Creating embedding model: ${settings.provider}/${settings.model} (${settings.dimensions}D)`,
    );

    switch (settings.provider) {
      case 'ollama':
        return new OllamaEmbeddings({
          model: settings.model,
          baseUrl: readString(this.configService, 'OLLAMA_BASE_URL', 'http://localhost:11434'),
        });
      case 'openai':
        return new OpenAIEmbeddings({
          model: settings.model,
          apiKey: this.requireKey('openai', 'OPENAI_API_KEY'),
        });
      case 'google':
        return new GoogleGenerativeAIEmbeddings({
          model: settings.model,
          apiKey: this.requireKey('google', 'GOOGLE_API_KEY'),
        });
    }
  }

  private requireKey(provider: EmbeddingProvider, variable: string): string {
    const key = this.configService.get<string>(variable);
    if (!key) {
      throw new ProviderNotConfiguredError(provider, variable);
    }
    return key;
  }
}
