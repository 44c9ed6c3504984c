import { ServiceError } from '../../common/errors/service.error';

export type GenerationErrorCode =
  | 'GENERATION_PROVIDER_FAILURE'
  | 'GENERATION_TIMEOUT'
  | 'GENERATION_INVALID_RESPONSE';

/**
 * Failures of the text-generation capability. Terminal for the request
 * that hit them, never for the connection.
 */
export abstract class GenerationError extends ServiceError {
  declare readonly code: GenerationErrorCode;

  protected constructor(
    message: string,
    code: GenerationErrorCode,
    retryable: boolean,
    cause?: unknown,
  ) {
    super(message, code, retryable, cause);
  }
}

export class GenerationProviderError extends GenerationError {
  constructor(model: string, cause: unknown) {
    super(
      `Model ${model} failed: ${cause instanceof Error ? cause.message : String(cause)}`,
      'GENERATION_PROVIDER_FAILURE',
      true,
      cause,
    );
  }
}

export class GenerationTimeoutError extends GenerationError {
  constructor(model: string, timeoutMs: number) {
    super(
      `Model ${model} did not answer within ${timeoutMs}ms`,
      'GENERATION_TIMEOUT',
      true,
    );
  }
}

export class InvalidGenerationResponseError extends GenerationError {
  constructor(model: string, detail: string) {
    super(
      `Model ${model} returned an unusable response: ${detail}`,
      'GENERATION_INVALID_RESPONSE',
      false,
    );
  }
}
