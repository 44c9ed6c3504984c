import type { IndexSchema, PromptConfig } from '../types/config.types';

export interface LocalConfigBundle {
  /** Null when no local prompt file exists (remote-only deployments) */
  prompts: PromptConfig | null;
  schema: IndexSchema;
  /** Content hash; identical fingerprints mean nothing changed */
  fingerprint: string;
}

export type RemoteFetchResult =
  | { status: 'modified'; prompts: PromptConfig }
  | { status: 'not_modified'; prompts: PromptConfig | null };

export abstract class LocalConfigSource {
  abstract load(): Promise<LocalConfigBundle>;
}

export abstract class RemoteConfigSource {
  abstract readonly enabled: boolean;

  /**
   * Fetches and validates the prompt configuration. A conditional fetch
   * that the server answers with "not modified" returns the last valid one.
   */
  abstract fetch(): Promise<RemoteFetchResult>;
}
