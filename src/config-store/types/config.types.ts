/**
 * Behaviour configuration: intents, prompt templates and the index schema.
 * Snapshots are deep-frozen; a reload builds a new one and swaps the reference.
 */

export const INTENT_ACTIONS = [
  'direct_response',
  'call_rag_tool',
  'general_llm_call',
] as const;
export type IntentAction = (typeof INTENT_ACTIONS)[number];

export interface IntentDefinition {
  name: string;
  description: string;
  /** Normalized (trimmed, lower-case) words or phrases */
  keywords: readonly string[];
  patterns: readonly RegExp[];
  action: IntentAction;
  /** Template key; direct responses read response_templates, others query_templates */
  template: string | null;
}

export type TemplateMap = Readonly<Record<string, string>>;

export interface PromptConfig {
  /** Declaration order is matching order */
  intents: readonly IntentDefinition[];
  defaultIntent: string | null;
  corePrompts: TemplateMap;
  queryTemplates: TemplateMap;
  responseTemplates: TemplateMap;
}

export interface IndexDescriptor {
  name: string;
  description: string | null;
  fields: readonly string[];
}

export interface IndexSchema {
  indexes: readonly IndexDescriptor[];
}

export type PromptSource = 'local' | 'remote';

export interface ConfigSnapshot {
  version: number;
  prompts: PromptConfig;
  schema: IndexSchema;
  promptSource: PromptSource;
  loadedAt: Date;
}

export const RELOAD_SOURCES = ['local', 'remote', 'both'] as const;
export type ReloadSource = (typeof RELOAD_SOURCES)[number];

export type SourceStatus = 'reloaded' | 'unchanged' | 'disabled' | 'failed';

export interface SourceOutcome {
  status: SourceStatus;
  error?: { code: string; message: string };
}

export interface ReloadReport {
  success: boolean;
  message: 'Reload complete' | 'Reload errors';
  details: string[];
  sources: Partial<Record<PromptSource, SourceOutcome>>;
  version: number;
}

/** Query templates every prompt configuration must define */
export const REQUIRED_QUERY_TEMPLATES = [
  'rag_topic_inference',
  'fallback_topic_resolver',
  'rag_final_answer',
] as const;
