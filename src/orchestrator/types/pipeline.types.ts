import type { ServiceError } from '../../common/errors/service.error';

export interface Query {
  conversationId: string;
  text: string;
}

export interface RetrievedDocument {
  id: string;
  score: number;
  payload: Record<string, unknown>;
}

export type AnswerKind = 'cache_hit' | 'template' | 'generated' | 'clarification';

export type PipelineOutcome = AnswerKind | 'failed';

/**
 * Exactly one answer per query. Failures still carry text for the user.
 */
export type PipelineResult =
  | { ok: true; kind: AnswerKind; text: string }
  | { ok: false; error: ServiceError; text: string };

export interface RetrievalOptions {
  defaultLimit: number;
  timeoutMs: number;
}

export const RETRIEVAL_OPTIONS = 'RETRIEVAL_OPTIONS';
