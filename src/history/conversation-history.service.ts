import { Inject, Injectable, Logger } from '@nestjs/common';
import { HistoryStore } from './history.store';
import {
  HISTORY_OPTIONS,
  type ConversationTurn,
  type HistoryOptions,
} from './history.types';
import { withTimeout } from '../shared/utils/with-timeout';

/**
 * Best-effort access to conversation history. Failures and timeouts are
 * logged and never reach the caller.
 */
@Injectable()
export class ConversationHistoryService {
  private readonly logger = new Logger(ConversationHistoryService.name);

  constructor(
    private readonly store: HistoryStore,
    @Inject(HISTORY_OPTIONS) private readonly options: HistoryOptions,
  ) {}

  /**
   * Appends the user turn then the assistant turn.
   * @returns whether both turns were written
   */
  async record(
    conversationId: string,
    userText: string,
    assistantText: string,
  ): Promise<boolean> {
    const now = new Date().toISOString();
    try {
      await withTimeout(
        this.store.append({ conversationId, role: 'user', text: userText, timestamp: now }),
        this.options.timeoutMs,
        'history append',
      );
      await withTimeout(
        this.store.append({
          conversationId,
          role: 'assistant',
          text: assistantText,
          timestamp: new Date().toISOString(),
        }),
        this.options.timeoutMs,
        'history append',
      );
      return true;
    } catch (error) {
      this.logger.warn(
        `[History] stage=persist status=degraded conversation=${conversationId} error=${error instanceof Error ? error.message : String(error)}`,
      );
      return false;
    }
  }

  async recent(conversationId: string): Promise<ConversationTurn[]> {
    try {
      return await withTimeout(
        this.store.list(conversationId, this.options.promptTurns),
        this.options.timeoutMs,
        'history list',
      );
    } catch (error) {
      this.logger.warn(
        `[History] stage=load status=degraded conversation=${conversationId} error=${error instanceof Error ? error.message : String(error)}`,
      );
      return [];
    }
  }

  async release(conversationId: string): Promise<void> {
    try {
      await withTimeout(
        this.store.release(conversationId),
        this.options.timeoutMs,
        'history release',
      );
    } catch (error) {
      this.logger.warn(
        `[History] stage=release status=degraded conversation=${conversationId} error=${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }
}

/**
 * Renders turns as "Previous conversation:" followed by User/Assistant lines.
 */
export function formatHistory(turns: readonly ConversationTurn[]): string {
  if (turns.length === 0) {
    return '';
  }
  const lines = turns.map(
    (turn) => `${turn.role === 'user' ? 'User' : 'Assistant'}: ${turn.text}`,
  );
  return `Previous conversation:\n${lines.join('\n')}`;
}
