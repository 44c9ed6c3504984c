import { beforeEach, describe, expect, it } from '@jest/globals';
import { ConfigService } from '@nestjs/config';
import { SchedulerRegistry } from '@nestjs/schedule';
import { ConfigStoreService } from './config-store.service';
import { buildIndexSchema } from './config-parser';
import { ConfigSourceUnavailableError } from './errors/config-errors';
import {
  StubLocalSource,
  StubRemoteSource,
  promptsWithGreeting,
  remotePrompts,
} from '../testing/stub-config-sources';

describe('ConfigStoreService', () => {
  let local: StubLocalSource;
  let remote: StubRemoteSource;
  let store: ConfigStoreService;

  beforeEach(() => {
    local = new StubLocalSource();
    remote = new StubRemoteSource();
    store = new ConfigStoreService(
      local,
      remote,
      new ConfigService({}),
      new SchedulerRegistry(),
    );
  });

  describe('initialize', () => {
    it('refuses reads before the first snapshot exists', () => {
      expect(() => store.current()).toThrow('Configuration has not been loaded yet');
    });

    it('loads a frozen snapshot from the local source', async () => {
      const snapshot = await store.initialize();

      expect(store.current()).toBe(snapshot);
      expect(snapshot.version).toBe(1);
      expect(snapshot.promptSource).toBe('local');
      expect(snapshot.prompts.responseTemplates.greeting).toBe('Local hello');
      expect(Object.isFrozen(snapshot)).toBe(true);
    });

    it('prefers remote prompts when the remote source answers', async () => {
      remote.enabled = true;
      remote.response = { status: 'modified', prompts: remotePrompts('Remote hello') };

      const snapshot = await store.initialize();

      expect(snapshot.promptSource).toBe('remote');
      expect(snapshot.prompts.responseTemplates.greeting).toBe('Remote hello');
      expect(snapshot.schema.indexes.map((index) => index.name)).toEqual(['profile', 'orders']);
    });

    it('falls back to local prompts when the remote source is down', async () => {
      remote.enabled = true;
      remote.failure = new ConfigSourceUnavailableError('remote configuration', 'ECONNREFUSED');

      const snapshot = await store.initialize();

      expect(snapshot.promptSource).toBe('local');
    });

    it('fails when no source provides prompts', async () => {
      local.promptsText = null;

      await expect(store.initialize()).rejects.toThrow(
        'Invalid prompt configuration: neither the local file nor the remote source provided one',
      );
    });
  });

  describe('reload', () => {
    beforeEach(async () => {
      await store.initialize();
    });

    it('reports an unchanged local source and keeps the snapshot', async () => {
      const before = store.current();

      const report = await store.reload('local');

      expect(report).toEqual({
        success: true,
        message: 'Reload complete',
        details: ['Local unchanged'],
        sources: { local: { status: 'unchanged' } },
        version: 1,
      });
      expect(store.current()).toBe(before);
    });

    it('swaps in a new snapshot when the local files changed', async () => {
      local.promptsText = promptsWithGreeting('Updated hello');

      const report = await store.reload('local');

      expect(report.details).toEqual(['Local reloaded']);
      expect(report.version).toBe(2);
      expect(store.current().prompts.responseTemplates.greeting).toBe('Updated hello');
    });

    it('keeps the previous snapshot when the local prompts are malformed', async () => {
      const before = store.current();
      local.promptsText = '{"intents": ';

      const report = await store.reload('local');

      expect(report.success).toBe(false);
      expect(report.message).toBe('Reload errors');
      expect(report.sources.local?.status).toBe('failed');
      expect(report.sources.local?.error?.code).toBe('CONFIG_INVALID');
      expect(report.details[0]).toMatch(
        /^Local error: Invalid prompt configuration: malformed JSON/,
      );
      expect(store.current()).toBe(before);
    });

    it('reports a disabled remote source without failing', async () => {
      const report = await store.reload('both');

      expect(report.success).toBe(true);
      expect(report.details).toEqual(['Local unchanged', 'Remote disabled']);
      expect(report.sources.remote).toEqual({ status: 'disabled' });
    });

    it('applies the source that succeeded when the other one fails', async () => {
      remote.enabled = true;
      remote.response = { status: 'modified', prompts: remotePrompts('Remote hello') };
      local.unavailable = new ConfigSourceUnavailableError('json/index_schema.json', 'EACCES');

      const report = await store.reload('both');

      expect(report.success).toBe(false);
      expect(report.details).toEqual([
        'Local error: json/index_schema.json unavailable: EACCES',
        'Remote reloaded',
      ]);
      expect(report.sources.local?.error?.code).toBe('CONFIG_SOURCE_UNAVAILABLE');
      expect(report.version).toBe(2);
      expect(store.current().promptSource).toBe('remote');
      expect(store.current().prompts.responseTemplates.greeting).toBe('Remote hello');
    });

    it('keeps remote prompts over a changed local file when the remote is not modified', async () => {
      remote.enabled = true;
      remote.response = { status: 'modified', prompts: remotePrompts('Remote hello') };
      await store.reload('remote');

      remote.response = { status: 'not_modified', prompts: remotePrompts('Remote hello') };
      local.promptsText = promptsWithGreeting('Local edit');
      local.schema = buildIndexSchema([
        { name: 'products', description: null, fields: ['sku'] },
      ]);

      const report = await store.reload('both');

      expect(report.details).toEqual(['Local reloaded', 'Remote unchanged']);
      const snapshot = store.current();
      expect(snapshot.promptSource).toBe('remote');
      expect(snapshot.prompts.responseTemplates.greeting).toBe('Remote hello');
      expect(snapshot.schema.indexes.map((index) => index.name)).toEqual(['products']);
    });

    it('never changes a snapshot a request is already holding', async () => {
      const held = store.current();
      local.promptsText = promptsWithGreeting('Updated hello');
      local.schema = buildIndexSchema([
        { name: 'products', description: null, fields: ['sku'] },
      ]);

      await store.reload('local');

      expect(held.prompts.responseTemplates.greeting).toBe('Local hello');
      expect(held.schema.indexes.map((index) => index.name)).toEqual(['profile', 'orders']);
      const next = store.current();
      expect(next.prompts.responseTemplates.greeting).toBe('Updated hello');
      expect(next.schema.indexes.map((index) => index.name)).toEqual(['products']);
    });

    it('runs concurrent reloads one after another', async () => {
      local.promptsText = promptsWithGreeting('Updated hello');

      const [first, second] = await Promise.all([
        store.reload('local'),
        store.reload('local'),
      ]);

      expect(first.details).toEqual(['Local reloaded']);
      expect(second.details).toEqual(['Local unchanged']);
      expect(store.current().version).toBe(2);
    });
  });
});
