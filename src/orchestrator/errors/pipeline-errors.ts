import { ServiceError } from '../../common/errors/service.error';

/**
 * Neither topic stage named a known index. Answered with a clarification.
 */
export class UnresolvedTopicError extends ServiceError {
  constructor(query: string) {
    super(
      `No index could be resolved for query: ${query}`,
      'RESOLUTION_UNRESOLVED',
      false,
    );
  }
}

export type ResolutionError = UnresolvedTopicError;

export type RetrievalErrorCode =
  | 'RETRIEVAL_BACKEND_UNAVAILABLE'
  | 'RETRIEVAL_TIMEOUT';

/**
 * Retrieval failures; the pipeline continues with empty context.
 */
export abstract class RetrievalError extends ServiceError {
  declare readonly code: RetrievalErrorCode;

  protected constructor(
    message: string,
    code: RetrievalErrorCode,
    cause?: unknown,
  ) {
    super(message, code, true, cause);
  }
}

export class RetrievalBackendUnavailableError extends RetrievalError {
  constructor(index: string, cause: unknown) {
    super(
      `Retrieval from ${index} failed: ${cause instanceof Error ? cause.message : String(cause)}`,
      'RETRIEVAL_BACKEND_UNAVAILABLE',
      cause,
    );
  }
}

export class RetrievalTimeoutError extends RetrievalError {
  constructor(index: string, timeoutMs: number) {
    super(
      `Retrieval from ${index} timed out after ${timeoutMs}ms`,
      'RETRIEVAL_TIMEOUT',
    );
  }
}

/**
 * A pipeline step threw something it does not handle itself.
 */
export class PipelineFailedError extends ServiceError {
  constructor(cause: unknown) {
    super(
      `Pipeline failed: ${cause instanceof Error ? cause.message : String(cause)}`,
      'PIPELINE_FAILED',
      false,
      cause,
    );
  }
}
