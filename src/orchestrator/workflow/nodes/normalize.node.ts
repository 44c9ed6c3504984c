/**
 * Normalize Node
 * Folds case and whitespace so equivalent queries share one cache key, and
 * runs the deterministic intent rules early: direct-response intents never
 * consult the cache.
 */

import { Logger } from '@nestjs/common';
import type { PipelineStateType } from '../state/pipeline-state';
import type { IntentClassifierService } from '../../services/intent-classifier.service';

export function normalizeQuery(text: string): string {
  return text.trim().replace(/\s+/g, ' ').toLowerCase();
}

export function createNormalizeNode(intentClassifier: IntentClassifierService) {
  const logger = new Logger('NormalizeNode');

  return async (
    state: PipelineStateType,
  ): Promise<Partial<PipelineStateType>> => {
    const normalizedQuery = normalizeQuery(state.message);
    const rule = intentClassifier.matchRules(
      normalizedQuery,
      state.snapshot.prompts,
    );

    logger.debug(
      `[Normalize] conversation=${state.conversationId} length=${normalizedQuery.length} rule_intent=${rule?.intent.name ?? 'none'} config_version=${state.snapshot.version}`,
    );

    return {
      normalizedQuery,
      ruleIntent: rule
        ? { intent: rule.intent, action: rule.intent.action, method: rule.method }
        : null,
      currentStage: 'normalized',
    };
  };
}
