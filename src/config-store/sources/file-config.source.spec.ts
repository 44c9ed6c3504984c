import { afterEach, beforeEach, describe, expect, it } from '@jest/globals';
import { ConfigService } from '@nestjs/config';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { FileConfigSource } from './file-config.source';
import { ConfigSourceUnavailableError } from '../errors/config-errors';
import { InMemoryVectorStore } from '../../providers/vector-store/in-memory-vector-store';
import { testPromptDocument } from '../../testing/fixtures';

const SCHEMA = JSON.stringify({
  indexes: [{ name: 'profile', fields: ['full_name', 'birth_date'] }],
});

describe('FileConfigSource', () => {
  let dir: string;
  let promptsPath: string;
  let schemaPath: string;
  let vectorStore: InMemoryVectorStore;

  function buildSource(env: Record<string, string> = {}): FileConfigSource {
    return new FileConfigSource(
      new ConfigService({
        PROMPTS_PATH: promptsPath,
        SCHEMA_PATH: schemaPath,
        ...env,
      }),
      vectorStore,
    );
  }

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'config-source-'));
    promptsPath = join(dir, 'prompts.json');
    schemaPath = join(dir, 'index_schema.json');
    vectorStore = new InMemoryVectorStore();
    await writeFile(promptsPath, JSON.stringify(testPromptDocument()));
    await writeFile(schemaPath, SCHEMA);
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('loads prompts and schema from disk', async () => {
    const bundle = await buildSource().load();

    expect(bundle.prompts?.intents.map((intent) => intent.name)).toEqual([
      'greeting',
      'small_talk',
      'knowledge_query',
    ]);
    expect(bundle.schema.indexes).toEqual([
      { name: 'profile', description: null, fields: ['full_name', 'birth_date'] },
    ]);
  });

  it('keeps the fingerprint until a file changes', async () => {
    const source = buildSource();
    const first = await source.load();
    const second = await source.load();

    await writeFile(schemaPath, JSON.stringify({ indexes: [] }));
    const third = await source.load();

    expect(second.fingerprint).toBe(first.fingerprint);
    expect(third.fingerprint).not.toBe(first.fingerprint);
  });

  it('treats a missing prompts file as absent prompts', async () => {
    await rm(promptsPath);

    const bundle = await buildSource().load();

    expect(bundle.prompts).toBeNull();
  });

  it('fails when the schema file is missing', async () => {
    await rm(schemaPath);

    await expect(buildSource().load()).rejects.toBeInstanceOf(
      ConfigSourceUnavailableError,
    );
  });

  it('derives the schema from the vector store when asked to', async () => {
    await vectorStore.ensureCollection('profile', 2);
    await vectorStore.upsert('profile', [
      { id: 'p1', vector: [1, 0], payload: { full_name: 'Test User', birth_date: '1990-01-01' } },
    ]);
    await vectorStore.ensureCollection('prompt_response_cache', 2);

    const bundle = await buildSource({ SCHEMA_AUTO_GENERATE: 'true' }).load();

    expect(bundle.schema.indexes).toEqual([
      { name: 'profile', description: null, fields: ['full_name', 'birth_date'] },
    ]);
  });
});
