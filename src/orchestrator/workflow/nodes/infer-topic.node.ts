/**
 * Infer Topic Node
 * Primary topic stage: rag_topic_inference over the full schema.
 * "None" or an unknown index moves on to resolveTopicFallback; a routing
 * model failure ends the request.
 */

import { Logger } from '@nestjs/common';
import type { PipelineStateType } from '../state/pipeline-state';
import type { TopicResolverService } from '../../services/topic-resolver.service';
import { GenerationError } from '../../../providers/errors/generation-errors';
import {
  DEFAULT_GENERATION_FAILED,
} from '../../services/prompt-templates';

export function createInferTopicNode(topicResolver: TopicResolverService) {
  const logger = new Logger('InferTopicNode');

  return async (
    state: PipelineStateType,
  ): Promise<Partial<PipelineStateType>> => {
    const startTime = Date.now();

    try {
      const topic = await topicResolver.inferPrimary(state.message, state.snapshot);
      return {
        topic,
        topicStage: topic ? 'primary' : null,
        currentStage: topic ? 'topic_resolved' : 'topic_primary_unresolved',
        metrics: { ...state.metrics, resolutionDuration: Date.now() - startTime },
      };
    } catch (error) {
      if (!(error instanceof GenerationError)) {
        throw error;
      }
      logger.error(`[InferTopic] status=failed code=${error.code} error=${error.message}`);
      return {
        failure: error,
        outcome: 'failed',
        answer:
          state.snapshot.prompts.responseTemplates.generation_failed ??
          DEFAULT_GENERATION_FAILED,
        currentStage: 'topic_failed',
        errors: [...state.errors, error.code],
      };
    }
  };
}
