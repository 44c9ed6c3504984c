/**
 * Generate Node
 * Builds the answer prompt and calls the answer model.
 *
 * - Retrieval intents: the intent's own query template when it has one,
 *   otherwise rag_final_answer, filled with topic, fields and documents
 * - General conversation: general_conversation, or the bare history plus
 *   the message when that template is absent
 *
 * A GenerationError is terminal for the request; the user gets the
 * generation_failed text.
 */

import { Logger } from '@nestjs/common';
import type { PipelineStateType } from '../state/pipeline-state';
import type { TextGenerator } from '../../../providers/types';
import { GenerationError } from '../../../providers/errors/generation-errors';
import {
  type ConversationHistoryService,
  formatHistory,
} from '../../../history/conversation-history.service';
import {
  DEFAULT_GENERATION_FAILED,
  describeIndex,
  formatDocuments,
  renderTemplate,
  withSystemPrompt,
} from '../../services/prompt-templates';

export function buildAnswerPrompt(
  state: PipelineStateType,
  history: string,
): string {
  const { prompts, schema } = state.snapshot;
  const templateKey = state.intent?.intent?.template ?? null;
  const intentTemplate: string | undefined = templateKey
    ? prompts.queryTemplates[templateKey]
    : undefined;

  if (state.intent?.action === 'general_llm_call') {
    const template = intentTemplate ?? prompts.queryTemplates.general_conversation;
    const prompt = template
      ? renderTemplate(template, { history, user_question: state.message })
      : [history, `User: ${state.message}`].filter((part) => part.length > 0).join('\n\n');
    return withSystemPrompt(state.snapshot, prompt);
  }

  const topic = state.topic ?? '';
  const template = intentTemplate ?? prompts.queryTemplates.rag_final_answer ?? '';
  const prompt = renderTemplate(template, {
    history,
    topic,
    schema: describeIndex(schema.indexes.find((index) => index.name === topic)),
    documents: formatDocuments(state.documents),
    user_question: state.message,
  });
  return withSystemPrompt(state.snapshot, prompt);
}

export function createGenerateNode(
  answerModel: TextGenerator,
  historyService: ConversationHistoryService,
) {
  const logger = new Logger('GenerateNode');

  return async (
    state: PipelineStateType,
  ): Promise<Partial<PipelineStateType>> => {
    const startTime = Date.now();
    const history = formatHistory(await historyService.recent(state.conversationId));
    const prompt = buildAnswerPrompt(state, history);

    try {
      const answer = await answerModel.complete(prompt);
      const generationDuration = Date.now() - startTime;

      logger.log(
        `[Generate] model=${answerModel.label} topic=${state.topic ?? 'none'} documents=${state.documents.length} answer_length=${answer.length} duration=${generationDuration}ms`,
      );

      return {
        answer,
        outcome: 'generated',
        currentStage: 'generated',
        metrics: { ...state.metrics, generationDuration },
      };
    } catch (error) {
      if (!(error instanceof GenerationError)) {
        throw error;
      }
      logger.error(
        `[Generate] model=${answerModel.label} status=failed code=${error.code} error=${error.message}`,
      );
      return {
        answer:
          state.snapshot.prompts.responseTemplates.generation_failed ??
          DEFAULT_GENERATION_FAILED,
        outcome: 'failed',
        failure: error,
        currentStage: 'generation_failed',
        errors: [...state.errors, error.code],
        metrics: { ...state.metrics, generationDuration: Date.now() - startTime },
      };
    }
  };
}
