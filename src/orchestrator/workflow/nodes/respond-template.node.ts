import { Logger } from '@nestjs/common';
import type { PipelineStateType } from '../state/pipeline-state';
import { DEFAULT_CLARIFICATION } from '../../services/prompt-templates';

/**
 * Respond Template Node
 * Direct-response intents answer from response_templates, no model call.
 */
export function createRespondTemplateNode() {
  const logger = new Logger('RespondTemplateNode');

  return async (
    state: PipelineStateType,
  ): Promise<Partial<PipelineStateType>> => {
    const intent = state.intent?.intent ?? null;
    const templates = state.snapshot.prompts.responseTemplates;
    const key = intent?.template ?? intent?.name ?? '';
    const template = templates[key];

    if (template === undefined) {
      logger.warn(`[RespondTemplate] status=missing template=${key}`);
    }

    return {
      answer: template ?? templates.clarification ?? DEFAULT_CLARIFICATION,
      outcome: 'template',
      currentStage: 'template_response',
    };
  };
}
