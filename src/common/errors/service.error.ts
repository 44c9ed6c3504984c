/**
 * Base class for every error the request server raises on purpose.
 * `code` names the variant (e.g. CACHE_TIMEOUT), `retryable` tells callers
 * whether repeating the same call may succeed.
 */
export abstract class ServiceError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly retryable: boolean,
    cause?: unknown,
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
