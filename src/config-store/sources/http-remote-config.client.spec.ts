import { describe, expect, it } from '@jest/globals';
import { ConfigService } from '@nestjs/config';
import {
  AxiosError,
  type AxiosResponse,
  type InternalAxiosRequestConfig,
} from 'axios';
import { HttpRemoteConfigClient } from './http-remote-config.client';
import {
  ConfigSourceUnavailableError,
  InvalidConfigError,
} from '../errors/config-errors';
import type { RemoteFetchResult } from './config-sources';
import { promptsWithGreeting } from '../../testing/stub-config-sources';
import { testPromptDocument } from '../../testing/fixtures';

const PROMPTS = promptsWithGreeting('Remote hello');

function greetingOf(result: RemoteFetchResult): string | null {
  return result.prompts?.responseTemplates.greeting ?? null;
}

function buildClient(env: Record<string, string> = {}) {
  return new HttpRemoteConfigClient(
    new ConfigService({
      REMOTE_CONFIG_ENABLED: 'true',
      REMOTE_CONFIG_URL: 'http://config.test/prompts',
      REMOTE_CONFIG_TOKEN: 'test-token',
      ...env,
    }),
  );
}

function respond(
  config: InternalAxiosRequestConfig,
  status: number,
  data: string,
  headers: Record<string, string> = {},
): AxiosResponse<string> {
  return { data, status, statusText: String(status), headers, config };
}

describe('HttpRemoteConfigClient', () => {
  it('is disabled without a URL', async () => {
    const client = buildClient({ REMOTE_CONFIG_URL: '' });

    expect(client.enabled).toBe(false);
    await expect(client.fetch()).rejects.toThrow(
      'remote configuration unavailable: disabled',
    );
  });

  it('returns the fetched prompt text with the bearer token sent', async () => {
    const client = buildClient();
    const authorization: unknown[] = [];
    client.http.defaults.adapter = async (config) => {
      authorization.push(config.headers.get('Authorization'));
      return respond(config, 200, PROMPTS, { etag: '"v1"' });
    };

    const result = await client.fetch();

    expect(result.status).toBe('modified');
    expect(greetingOf(result)).toBe('Remote hello');
    expect(authorization).toEqual(['Bearer test-token']);
  });

  it('revalidates with the last etag and reuses the cached prompts on 304', async () => {
    const client = buildClient();
    const ifNoneMatch: unknown[] = [];
    client.http.defaults.adapter = async (config) => {
      ifNoneMatch.push(config.headers.get('If-None-Match'));
      return ifNoneMatch.length === 1
        ? respond(config, 200, PROMPTS, { etag: '"v1"' })
        : respond(config, 304, '');
    };

    await client.fetch();
    const second = await client.fetch();

    expect(second.status).toBe('not_modified');
    expect(greetingOf(second)).toBe('Remote hello');
    expect(ifNoneMatch).toEqual([undefined, '"v1"']);
  });

  it('unwraps prompts published as a remote-config parameter', async () => {
    const client = buildClient({ REMOTE_CONFIG_PARAMETER: 'assistant_prompts' });
    const body = JSON.stringify({
      parameters: { assistant_prompts: { defaultValue: { value: PROMPTS } } },
    });
    client.http.defaults.adapter = async (config) => respond(config, 200, body);

    const result = await client.fetch();

    expect(result.status).toBe('modified');
    expect(greetingOf(result)).toBe('Remote hello');
  });

  it('keeps the last valid etag when the server publishes an invalid configuration', async () => {
    const client = buildClient();
    const broken = testPromptDocument();
    broken.query_templates = {};
    const ifNoneMatch: unknown[] = [];
    client.http.defaults.adapter = async (config) => {
      ifNoneMatch.push(config.headers.get('If-None-Match'));
      return ifNoneMatch.length === 1
        ? respond(config, 200, PROMPTS, { etag: '"v1"' })
        : respond(config, 200, JSON.stringify(broken), { etag: '"v2"' });
    };

    await client.fetch();
    await expect(client.fetch()).rejects.toBeInstanceOf(InvalidConfigError);
    await expect(client.fetch()).rejects.toBeInstanceOf(InvalidConfigError);

    expect(ifNoneMatch).toEqual([undefined, '"v1"', '"v1"']);
  });

  it('reports transport failures as an unavailable source', async () => {
    const client = buildClient();
    client.http.defaults.adapter = async () => {
      throw new AxiosError('connect ECONNREFUSED', 'ECONNREFUSED');
    };

    const failure = client.fetch();

    await expect(failure).rejects.toBeInstanceOf(ConfigSourceUnavailableError);
    await expect(failure).rejects.toThrow(
      'remote configuration unavailable: ECONNREFUSED connect ECONNREFUSED',
    );
  });
});
