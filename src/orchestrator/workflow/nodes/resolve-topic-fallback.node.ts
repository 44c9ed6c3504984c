/**
 * Resolve Topic Fallback Node
 * Second topic stage, reached only when the primary stage named no known
 * index. Its prompt maps implied concepts to the index holding the field.
 * Still unresolved → clarification answer.
 */

import { Logger } from '@nestjs/common';
import type { PipelineStateType } from '../state/pipeline-state';
import type { TopicResolverService } from '../../services/topic-resolver.service';
import { GenerationError } from '../../../providers/errors/generation-errors';
import { UnresolvedTopicError } from '../../errors/pipeline-errors';
import {
  DEFAULT_CLARIFICATION,
  DEFAULT_GENERATION_FAILED,
} from '../../services/prompt-templates';

export function createResolveTopicFallbackNode(
  topicResolver: TopicResolverService,
) {
  const logger = new Logger('ResolveTopicFallbackNode');

  return async (
    state: PipelineStateType,
  ): Promise<Partial<PipelineStateType>> => {
    const startTime = Date.now();
    const templates = state.snapshot.prompts.responseTemplates;

    let topic: string | null;
    try {
      topic = await topicResolver.resolveFallback(state.message, state.snapshot);
    } catch (error) {
      if (!(error instanceof GenerationError)) {
        throw error;
      }
      logger.error(
        `[ResolveTopicFallback] status=failed code=${error.code} error=${error.message}`,
      );
      return {
        failure: error,
        outcome: 'failed',
        answer: templates.generation_failed ?? DEFAULT_GENERATION_FAILED,
        currentStage: 'topic_failed',
        errors: [...state.errors, error.code],
      };
    }

    const resolutionDuration =
      (state.metrics.resolutionDuration ?? 0) + Date.now() - startTime;

    if (topic) {
      return {
        topic,
        topicStage: 'fallback',
        currentStage: 'topic_resolved',
        metrics: { ...state.metrics, resolutionDuration },
      };
    }

    const unresolved = new UnresolvedTopicError(state.message);
    logger.log(
      `[ResolveTopicFallback] status=unresolved code=${unresolved.code} response=clarification`,
    );

    return {
      answer: templates.clarification ?? DEFAULT_CLARIFICATION,
      outcome: 'clarification',
      currentStage: 'topic_unresolved',
      errors: [...state.errors, unresolved.code],
      metrics: { ...state.metrics, resolutionDuration },
    };
  };
}
