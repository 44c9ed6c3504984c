import { Logger } from '@nestjs/common';
import type { PipelineStateType } from '../state/pipeline-state';
import type { IntentClassifierService } from '../../services/intent-classifier.service';

/**
 * Classify Intent Node
 * Reuses the rule match from normalize when there is one; otherwise asks
 * the classifier, which may consult the routing model.
 */
export function createClassifyIntentNode(
  intentClassifier: IntentClassifierService,
) {
  const logger = new Logger('ClassifyIntentNode');

  return async (
    state: PipelineStateType,
  ): Promise<Partial<PipelineStateType>> => {
    const intent =
      state.ruleIntent ??
      (await intentClassifier.classify(
        state.message,
        state.normalizedQuery,
        state.snapshot.prompts,
      ));

    logger.log(
      `[ClassifyIntent] intent=${intent.intent?.name ?? 'none'} action=${intent.action} method=${intent.method}`,
    );

    return {
      intent,
      currentStage: 'intent_classified',
    };
  };
}
