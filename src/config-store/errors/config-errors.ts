import { ServiceError } from '../../common/errors/service.error';

export type ConfigErrorCode = 'CONFIG_INVALID' | 'CONFIG_SOURCE_UNAVAILABLE';

/**
 * Reload-level failures. The active snapshot is kept when one is raised.
 */
export abstract class ConfigError extends ServiceError {
  declare readonly code: ConfigErrorCode;

  protected constructor(
    message: string,
    code: ConfigErrorCode,
    retryable: boolean,
    cause?: unknown,
  ) {
    super(message, code, retryable, cause);
  }
}

export class InvalidConfigError extends ConfigError {
  constructor(
    public readonly document: string,
    detail: string,
    cause?: unknown,
  ) {
    super(`Invalid ${document}: ${detail}`, 'CONFIG_INVALID', false, cause);
  }
}

export class ConfigSourceUnavailableError extends ConfigError {
  constructor(
    public readonly source: string,
    detail: string,
    cause?: unknown,
  ) {
    super(
      `${source} unavailable: ${detail}`,
      'CONFIG_SOURCE_UNAVAILABLE',
      true,
      cause,
    );
  }
}
