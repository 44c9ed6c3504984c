export type TurnRole = 'user' | 'assistant';

export interface ConversationTurn {
  conversationId: string;
  role: TurnRole;
  text: string;
  /** ISO-8601 */
  timestamp: string;
}

export const HISTORY_TYPES = ['redis', 'memory'] as const;
export type HistoryType = (typeof HISTORY_TYPES)[number];

export interface HistoryOptions {
  promptTurns: number;
  timeoutMs: number;
}

export const HISTORY_OPTIONS = 'HISTORY_OPTIONS';
