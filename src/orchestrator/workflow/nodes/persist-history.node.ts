import { Logger } from '@nestjs/common';
import type { PipelineStateType } from '../state/pipeline-state';
import type { ConversationHistoryService } from '../../../history/conversation-history.service';

/**
 * Persist History Node
 * Appends the user turn and the assistant turn. Cache hits are recorded
 * too, so the conversation reads continuously.
 */
export function createPersistHistoryNode(
  historyService: ConversationHistoryService,
) {
  const logger = new Logger('PersistHistoryNode');

  return async (
    state: PipelineStateType,
  ): Promise<Partial<PipelineStateType>> => {
    if (state.answer === null) {
      return { currentStage: 'history_skipped' };
    }

    const historyPersisted = await historyService.record(
      state.conversationId,
      state.message,
      state.answer,
    );

    if (!historyPersisted) {
      logger.warn(`[PersistHistory] conversation=${state.conversationId} status=degraded`);
    }

    return {
      historyPersisted,
      currentStage: 'history_persisted',
    };
  };
}
