import { ServiceError } from '../../common/errors/service.error';

/**
 * A provider was selected without the settings it needs. Raised at startup.
 */
export class ProviderNotConfiguredError extends ServiceError {
  constructor(
    public readonly provider: string,
    public readonly setting: string,
  ) {
    super(`${setting} is required for the ${provider} provider`, 'PROVIDER_NOT_CONFIGURED', false);
  }
}
