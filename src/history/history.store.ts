import type Keyv from 'keyv';
import type { ConversationTurn } from './history.types';

/**
 * History capability: append a turn, fetch the recent turns of a conversation.
 */
export abstract class HistoryStore {
  abstract append(turn: ConversationTurn): Promise<void>;

  /** Most recent `limit` turns, oldest first */
  abstract list(conversationId: string, limit: number): Promise<ConversationTurn[]>;

  /** The conversation's connection is gone and its id will not be used again */
  abstract release(conversationId: string): Promise<void>;
}

export interface KeyvHistoryStoreOptions {
  /** Expiry of a conversation after its last append; 0 keeps it forever */
  ttlMs?: number;
  /** Delete released conversations (backends without their own eviction) */
  dropOnRelease?: boolean;
}

function isTurn(value: unknown): value is ConversationTurn {
  return (
    typeof value === 'object' &&
    value !== null &&
    'role' in value &&
    'text' in value &&
    (value.role === 'user' || value.role === 'assistant') &&
    typeof value.text === 'string'
  );
}

/**
 * One list per conversation, kept as a capped array in a Keyv store
 * (Redis through @keyv/redis, or Keyv's in-process map).
 * Appends for one conversation are issued sequentially by its connection.
 */
export class KeyvHistoryStore extends HistoryStore {
  constructor(
    private readonly keyv: Keyv,
    private readonly maxTurns: number,
    private readonly options: KeyvHistoryStoreOptions = {},
  ) {
    super();
  }

  async append(turn: ConversationTurn): Promise<void> {
    const turns = await this.read(turn.conversationId);
    turns.push(turn);
    const ttl = this.options.ttlMs && this.options.ttlMs > 0 ? this.options.ttlMs : undefined;
    await this.keyv.set(turn.conversationId, turns.slice(-this.maxTurns), ttl);
  }

  async release(conversationId: string): Promise<void> {
    if (this.options.dropOnRelease) {
      await this.keyv.delete(conversationId);
    }
  }

  async list(conversationId: string, limit: number): Promise<ConversationTurn[]> {
    if (limit <= 0) {
      return [];
    }
    const turns = await this.read(conversationId);
    return turns.slice(-limit);
  }

  private async read(conversationId: string): Promise<ConversationTurn[]> {
    const stored: unknown = await this.keyv.get(conversationId);
    return Array.isArray(stored) ? stored.filter(isTurn) : [];
  }
}
