/**
 * Provider Types and Configurations
 */

export const EMBEDDING_PROVIDERS = ['ollama', 'openai', 'google'] as const;
export type EmbeddingProvider = (typeof EMBEDDING_PROVIDERS)[number];

export const LLM_PROVIDERS = ['openai', 'google', 'anthropic', 'ollama'] as const;
export type LLMProvider = (typeof LLM_PROVIDERS)[number];

export const VECTOR_STORE_TYPES = ['qdrant', 'memory'] as const;
export type VectorStoreType = (typeof VECTOR_STORE_TYPES)[number];

/**
 * Chat Model Options
 */
export interface ChatModelOptions {
  model?: string;
  temperature?: number;
  maxTokens?: number;
  maxRetries?: number;
}

/**
 * Given a prompt, returns generated text.
 */
export interface TextGenerator {
  readonly label: string;
  complete(prompt: string): Promise<string>;
}

/**
 * Given text, returns its embedding vector.
 */
export interface Embedder {
  readonly dimensions: number;
  embed(text: string): Promise<number[]>;
}
