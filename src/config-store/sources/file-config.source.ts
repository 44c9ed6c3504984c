import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { readFile } from 'fs/promises';
import { createHash } from 'crypto';
import { resolve } from 'path';
import { LocalConfigSource, type LocalConfigBundle } from './config-sources';
import {
  buildIndexSchema,
  parseIndexSchema,
  parsePromptConfig,
} from '../config-parser';
import { ConfigSourceUnavailableError } from '../errors/config-errors';
import type { IndexSchema } from '../types/config.types';
import { VectorStore } from '../../providers/vector-store/vector-store';
import { readBoolean, readString } from '../../shared/utils/config-readers';

function isMissingFile(error: unknown): boolean {
  return (
    error instanceof Error && 'code' in error && error.code === 'ENOENT'
  );
}

/**
 * Reads prompts.json and index_schema.json from disk. With
 * SCHEMA_AUTO_GENERATE the schema is introspected from the vector store.
 */
@Injectable()
export class FileConfigSource extends LocalConfigSource {
  private readonly logger = new Logger(FileConfigSource.name);
  private readonly promptsPath: string;
  private readonly schemaPath: string;
  private readonly autoSchema: boolean;
  private readonly cacheCollection: string;

  constructor(
    configService: ConfigService,
    private readonly vectorStore: VectorStore,
  ) {
    super();
    this.promptsPath = resolve(
      readString(configService, 'PROMPTS_PATH', 'json/prompts.json'),
    );
    this.schemaPath = resolve(
      readString(configService, 'SCHEMA_PATH', 'json/index_schema.json'),
    );
    this.autoSchema = readBoolean(configService, 'SCHEMA_AUTO_GENERATE', false);
    this.cacheCollection = readString(
      configService,
      'SEMANTIC_CACHE_COLLECTION',
      'prompt_response_cache',
    );
  }

  async load(): Promise<LocalConfigBundle> {
    const promptsText = await this.readOptional(this.promptsPath);
    const hash = createHash('sha256').update(promptsText ?? '');

    let schema: IndexSchema;
    if (this.autoSchema) {
      schema = await this.introspectSchema();
      hash.update(JSON.stringify(schema));
    } else {
      const schemaText = await this.readRequired(this.schemaPath);
      schema = parseIndexSchema(schemaText);
      hash.update(schemaText);
    }

    return {
      prompts: promptsText === null ? null : parsePromptConfig(promptsText),
      schema,
      fingerprint: hash.digest('hex'),
    };
  }

  private async introspectSchema(): Promise<IndexSchema> {
    try {
      const collections = await this.vectorStore.describeCollections();
      const indexes = collections
        .filter((collection) => collection.name !== this.cacheCollection)
        .map((collection) => ({
          name: collection.name,
          description: null,
          fields: collection.fields.filter((field) => field !== 'vector'),
        }));
      this.logger.log(
        `Generated index schema from vector store: ${indexes.map((index) => index.name).join(', ') || '(empty)'}`,
      );
      return buildIndexSchema(indexes);
    } catch (error) {
      throw new ConfigSourceUnavailableError(
        'vector store schema',
        error instanceof Error ? error.message : String(error),
        error,
      );
    }
  }

  private async readOptional(path: string): Promise<string | null> {
    try {
      return await readFile(path, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        this.logger.warn(`No local prompt configuration at ${path}`);
        return null;
      }
      throw new ConfigSourceUnavailableError(
        path,
        error instanceof Error ? error.message : String(error),
        error,
      );
    }
  }

  private async readRequired(path: string): Promise<string> {
    try {
      return await readFile(path, 'utf8');
    } catch (error) {
      throw new ConfigSourceUnavailableError(
        path,
        error instanceof Error ? error.message : String(error),
        error,
      );
    }
  }
}
