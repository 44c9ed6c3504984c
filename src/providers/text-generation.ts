import type { BaseChatModel } from '@langchain/core/language_models/chat_models';
import type { Embeddings } from '@langchain/core/embeddings';
import { StringOutputParser } from '@langchain/core/output_parsers';
import type { Embedder, TextGenerator } from './types';
import {
  GenerationProviderError,
  GenerationTimeoutError,
  InvalidGenerationResponseError,
} from './errors/generation-errors';
import {
  OperationTimeoutError,
  withTimeout,
} from '../shared/utils/with-timeout';

/**
 * TextGenerator over a LangChain chat model: prompt in, plain text out,
 * bounded by a per-call timeout.
 */
export class LangChainTextGenerator implements TextGenerator {
  constructor(
    private readonly model: BaseChatModel,
    readonly label: string,
    private readonly timeoutMs: number,
  ) {}

  async complete(prompt: string): Promise<string> {
    let text: string;
    try {
      text = await withTimeout(
        this.model.pipe(new StringOutputParser()).invoke(prompt),
        this.timeoutMs,
        `${this.label} completion`,
      );
    } catch (error) {
      if (error instanceof OperationTimeoutError) {
        throw new GenerationTimeoutError(this.label, this.timeoutMs);
      }
      throw new GenerationProviderError(this.label, error);
    }

    if (text.trim().length === 0) {
      throw new InvalidGenerationResponseError(this.label, 'empty completion');
    }
    return text;
  }
}

export class LangChainEmbedder implements Embedder {
  constructor(
    private readonly embeddings: Embeddings,
    readonly dimensions: number,
    private readonly timeoutMs: number,
  ) {}

  async embed(text: string): Promise<number[]> {
    let vector: number[];
    try {
      vector = await withTimeout(
        this.embeddings.embedQuery(text),
        this.timeoutMs,
        'embedding',
      );
    } catch (error) {
      if (error instanceof OperationTimeoutError) {
        throw new GenerationTimeoutError('embedding', this.timeoutMs);
      }
      throw new GenerationProviderError('embedding', error);
    }

    if (vector.length === 0) {
      throw new InvalidGenerationResponseError('embedding', 'empty vector');
    }
    return vector;
  }
}
