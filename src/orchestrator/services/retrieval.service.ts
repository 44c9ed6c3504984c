import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  VectorStore,
  type VectorMatch,
} from '../../providers/vector-store/vector-store';
import {
  RetrievalBackendUnavailableError,
  RetrievalTimeoutError,
} from '../errors/pipeline-errors';
import {
  RETRIEVAL_OPTIONS,
  type RetrievalOptions,
  type RetrievedDocument,
} from '../types/pipeline.types';
import {
  OperationTimeoutError,
  withTimeout,
} from '../../shared/utils/with-timeout';

/**
 * Similarity search against the resolved index.
 * Throws RetrievalError; callers continue with empty context.
 */
@Injectable()
export class RetrievalService {
  private readonly logger = new Logger(RetrievalService.name);

  constructor(
    private readonly vectorStore: VectorStore,
    @Inject(RETRIEVAL_OPTIONS) private readonly options: RetrievalOptions,
  ) {}

  async retrieve(
    index: string,
    embedding: () => Promise<number[]>,
    limit: number = this.options.defaultLimit,
  ): Promise<RetrievedDocument[]> {
    const startTime = Date.now();

    let matches: VectorMatch[];
    try {
      matches = await withTimeout(
        embedding().then((vector) => this.vectorStore.search(index, vector, limit)),
        this.options.timeoutMs,
        `retrieval from ${index}`,
      );
    } catch (error) {
      if (error instanceof OperationTimeoutError) {
        throw new RetrievalTimeoutError(index, this.options.timeoutMs);
      }
      throw new RetrievalBackendUnavailableError(index, error);
    }

    this.logger.log(
      `[Retrieve] index=${index} results=${matches.length} limit=${limit} duration=${Date.now() - startTime}ms`,
    );

    return matches.map((match) => ({
      id: match.id,
      score: match.score,
      payload: match.payload,
    }));
  }
}
