/**
 * Retrieve Node
 * Similarity search in the resolved index. Failures leave the document
 * list empty and generation still runs.
 */

import { Logger } from '@nestjs/common';
import type { PipelineStateType } from '../state/pipeline-state';
import type { RetrievalService } from '../../services/retrieval.service';
import type { Embedder } from '../../../providers/types';
import { RetrievalError } from '../../errors/pipeline-errors';

export function createRetrieveNode(
  retrieval: RetrievalService,
  embedder: Embedder,
) {
  const logger = new Logger('RetrieveNode');

  return async (
    state: PipelineStateType,
  ): Promise<Partial<PipelineStateType>> => {
    const startTime = Date.now();
    const topic = state.topic;
    if (!topic) {
      return { documents: [], currentStage: 'retrieval_skipped' };
    }

    let queryEmbedding = state.queryEmbedding;
    const embedding = async (): Promise<number[]> => {
      queryEmbedding = queryEmbedding ?? (await embedder.embed(state.normalizedQuery));
      return queryEmbedding;
    };

    try {
      const documents = await retrieval.retrieve(topic, embedding);
      return {
        documents,
        queryEmbedding,
        currentStage: 'retrieved',
        metrics: { ...state.metrics, retrievalDuration: Date.now() - startTime },
      };
    } catch (error) {
      if (!(error instanceof RetrievalError)) {
        throw error;
      }
      logger.warn(
        `[Retrieve] index=${topic} status=degraded code=${error.code} error=${error.message} duration=${Date.now() - startTime}ms`,
      );
      return {
        documents: [],
        queryEmbedding,
        currentStage: 'retrieval_degraded',
        errors: [...state.errors, error.code],
        metrics: { ...state.metrics, retrievalDuration: Date.now() - startTime },
      };
    }
  };
}
