/**
 * LLM Provider Factory
 * Creates chat models from multiple providers (OpenAI, Google, Anthropic, Ollama).
 * The answer model and the routing model are built once at startup.
 */

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ChatOpenAI } from '@langchain/openai';
import { ChatGoogleGenerativeAI } from '@langchain/google-genai';
import { ChatAnthropic } from '@langchain/anthropic';
import { ChatOllama } from '@langchain/ollama';
import type { BaseChatModel } from '@langchain/core/language_models/chat_models';
import { LLM_PROVIDERS, type LLMProvider, type ChatModelOptions } from './types';
import { ProviderNotConfiguredError } from './errors/provider-config.error';
import { readChoice, readNumber } from '../shared/utils/config-readers';

@Injectable()
export class LLMProviderFactory {
  private readonly logger = new Logger(LLMProviderFactory.name);

  constructor(private readonly configService: ConfigService) {}

  /**
   * Model that writes user-facing answers (LLM_PROVIDER).
   */
  createAnswerModel(): BaseChatModel {
    return this.createChatModel(this.answerProvider());
  }

  /**
   * Model used for intent classification and topic resolution.
   * Falls back to the answer provider when ROUTING_LLM_PROVIDER is unset.
   */
  createRoutingModel(): BaseChatModel {
    const provider = readChoice(
      this.configService,
      'ROUTING_LLM_PROVIDER',
      LLM_PROVIDERS,
      this.answerProvider(),
    );
    const model = this.configService.get<string>('ROUTING_LLM_MODEL');

    // Routing answers are a single name, keep them short and deterministic
    return this.createChatModel(provider, {
      model: model || undefined,
      temperature: 0,
      maxTokens: 64,
    });
  }

  /**
   * Create chat model based on provider
   * @param provider - Provider name (openai, google, anthropic, ollama)
   * @param options - Optional override options (model, temperature, maxTokens, maxRetries)
   */
  createChatModel(
    provider: LLMProvider,
    options?: ChatModelOptions,
  ): BaseChatModel {
    this.logger.log(`Creating chat model for provider: ${provider}`);

    switch (provider) {
      case 'openai':
        return this.createOpenAIModel(options);

      case 'google':
        return this.createGoogleModel(options);

      case 'anthropic':
        return this.createAnthropicModel(options);

      case 'ollama':
        return this.createOllamaModel(options);
    }
  }

  private answerProvider(): LLMProvider {
    return readChoice(this.configService, 'LLM_PROVIDER', LLM_PROVIDERS, 'ollama');
  }

  private requireKey(provider: LLMProvider, variable: string): string {
    const key = this.configService.get<string>(variable);
    if (!key) {
      throw new ProviderNotConfiguredError(provider, variable);
    }
    return key;
  }

  private temperature(options?: ChatModelOptions): number {
    return (
      options?.temperature ??
      readNumber(this.configService, 'LLM_TEMPERATURE', 0.3)
    );
  }

  private maxTokens(options?: ChatModelOptions): number {
    return (
      options?.maxTokens ?? readNumber(this.configService, 'LLM_MAX_TOKENS', 1024)
    );
  }

  /**
   * Create OpenAI chat model
   */
  private createOpenAIModel(options?: ChatModelOptions): ChatOpenAI {
    const model =
      options?.model ||
      this.configService.get<string>('OPENAI_CHAT_MODEL') ||
      'gpt-4o-mini';

    const apiKey = this.requireKey('openai', 'OPENAI_API_KEY');

    return new ChatOpenAI({
      model,
      temperature: this.temperature(options),
      maxTokens: this.maxTokens(options),
      maxRetries: options?.maxRetries ?? 2,
      configuration: {
        baseURL:
          this.configService.get<string>('OPENAI_BASE_URL') ||
          'https://api.openai.com/v1',
        apiKey,
      },
    });
  }

  /**
   * Create Google Gemini chat model
   */
  private createGoogleModel(
    options?: ChatModelOptions,
  ): ChatGoogleGenerativeAI {
    const model =
      options?.model ||
      this.configService.get<string>('GOOGLE_CHAT_MODEL') ||
      'gemini-2.0-flash';

    const apiKey = this.requireKey('google', 'GOOGLE_API_KEY');

    return new ChatGoogleGenerativeAI({
      model,
      temperature: this.temperature(options),
      maxOutputTokens: this.maxTokens(options),
      maxRetries: options?.maxRetries ?? 2,
      apiKey,
    });
  }

  /**
   * Create Anthropic Claude chat model
   */
  private createAnthropicModel(options?: ChatModelOptions): ChatAnthropic {
    const model =
      options?.model ||
      this.configService.get<string>('ANTHROPIC_CHAT_MODEL') ||
      'claude-3-5-haiku-latest';

    const apiKey = this.requireKey('anthropic', 'ANTHROPIC_API_KEY');

    return new ChatAnthropic({
      model,
      temperature: this.temperature(options),
      maxTokens: this.maxTokens(options),
      maxRetries: options?.maxRetries ?? 2,
      apiKey,
    });
  }

  /**
   * Create Ollama chat model (local)
   */
  private createOllamaModel(options?: ChatModelOptions): ChatOllama {
    const model =
      options?.model ||
      this.configService.get<string>('OLLAMA_CHAT_MODEL') ||
      'gemma3:1b';

    return new ChatOllama({
      model,
      temperature: this.temperature(options),
      numPredict: this.maxTokens(options),
      baseUrl:
        this.configService.get<string>('OLLAMA_BASE_URL') ||
        'http://localhost:11434',
    });
  }
}
