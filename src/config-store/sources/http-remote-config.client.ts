/**
 * Remote prompt configuration over HTTP.
 * Conditional requests with ETag / If-None-Match; 304 means unchanged.
 */

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import axios, { isAxiosError, type AxiosInstance } from 'axios';
import { RemoteConfigSource, type RemoteFetchResult } from './config-sources';
import { extractRemotePromptText, parsePromptConfig } from '../config-parser';
import type { PromptConfig } from '../types/config.types';
import { ConfigSourceUnavailableError } from '../errors/config-errors';
import {
  readBoolean,
  readNumber,
  readString,
} from '../../shared/utils/config-readers';

@Injectable()
export class HttpRemoteConfigClient extends RemoteConfigSource {
  private readonly logger = new Logger(HttpRemoteConfigClient.name);

  readonly enabled: boolean;
  readonly http: AxiosInstance;
  private readonly url: string;
  private readonly parameter: string;
  private etag: string | null = null;
  private lastPrompts: PromptConfig | null = null;

  constructor(configService: ConfigService) {
    super();
    this.url = configService.get<string>('REMOTE_CONFIG_URL') ?? '';
    this.enabled =
      readBoolean(configService, 'REMOTE_CONFIG_ENABLED', false) &&
      this.url.length > 0;
    this.parameter = readString(
      configService,
      'REMOTE_CONFIG_PARAMETER',
      'prompts',
    );

    const token = configService.get<string>('REMOTE_CONFIG_TOKEN');
    this.http = axios.create({
      timeout: readNumber(configService, 'REMOTE_CONFIG_TIMEOUT_MS', 10000),
      headers: {
        Accept: 'application/json',
        ...(token ? { Authorization: `Bearer ${token}` } : {}),
      },
      responseType: 'text',
      validateStatus: (status) =>
        (status >= 200 && status < 300) || status === 304,
    });

    if (readBoolean(configService, 'REMOTE_CONFIG_ENABLED', false) && !this.enabled) {
      this.logger.warn('REMOTE_CONFIG_ENABLED is set but REMOTE_CONFIG_URL is empty');
    }
  }

  async fetch(): Promise<RemoteFetchResult> {
    if (!this.enabled) {
      throw new ConfigSourceUnavailableError('remote configuration', 'disabled');
    }

    let status: number;
    let body: unknown;
    let etag: unknown;
    try {
      const response = await this.http.get<unknown>(this.url, {
        headers: this.etag ? { 'If-None-Match': this.etag } : undefined,
      });
      status = response.status;
      body = response.data;
      etag = response.headers['etag'];
    } catch (error) {
      const detail = isAxiosError(error)
        ? [error.code, error.response?.status, error.message]
            .filter((part) => part !== undefined && part !== '')
            .join(' ')
        : error instanceof Error
          ? error.message
          : String(error);
      throw new ConfigSourceUnavailableError('remote configuration', detail, error);
    }

    if (status === 304) {
      this.logger.log('[RemoteConfig] status=not_modified');
      return { status: 'not_modified', prompts: this.lastPrompts };
    }

    if (typeof body !== 'string') {
      throw new ConfigSourceUnavailableError(
        'remote configuration',
        'response body is not text',
      );
    }

    // An invalid body must not become the revalidation baseline
    const prompts = parsePromptConfig(extractRemotePromptText(body, this.parameter));
    this.etag = typeof etag === 'string' && etag.length > 0 ? etag : null;
    this.lastPrompts = prompts;
    this.logger.log(
      `[RemoteConfig] status=modified bytes=${body.length} etag=${this.etag ?? 'none'}`,
    );
    return { status: 'modified', prompts };
  }
}
