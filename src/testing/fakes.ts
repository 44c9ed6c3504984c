/**
 * In-process stand-ins for the external capabilities.
 */

import { KeyValueStore } from '../cache/stores/key-value.store';
import { InMemoryVectorStore } from '../providers/vector-store/in-memory-vector-store';
import type { VectorMatch } from '../providers/vector-store/vector-store';
import type { Embedder, TextGenerator } from '../providers/types';

export type Responder = (prompt: string, call: number) => string | Promise<string>;

export class ScriptedTextGenerator implements TextGenerator {
  readonly prompts: string[] = [];

  constructor(
    readonly label: string,
    private readonly respond: Responder,
  ) {}

  async complete(prompt: string): Promise<string> {
    this.prompts.push(prompt);
    return this.respond(prompt, this.prompts.length);
  }
}

/**
 * Deterministic embeddings; texts listed in `vectors` get that vector.
 */
export class FakeEmbedder implements Embedder {
  readonly calls: string[] = [];

  constructor(
    readonly dimensions = 4,
    private readonly vectors: Record<string, number[]> = {},
  ) {}

  async embed(text: string): Promise<number[]> {
    this.calls.push(text);
    const fixed = this.vectors[text];
    if (fixed) {
      return fixed;
    }
    let seed = 0;
    for (const char of text) {
      seed = (seed * 31 + char.charCodeAt(0)) % 9973;
    }
    return Array.from({ length: this.dimensions }, (_, i) => ((seed * (i + 7)) % 97) + 1);
  }
}

export class MapKeyValueStore extends KeyValueStore {
  readonly entries = new Map<string, { value: unknown; ttlMs: number | undefined }>();
  failure: Error | null = null;
  hang = false;

  async get(key: string): Promise<unknown> {
    await this.gate();
    return this.entries.get(key)?.value;
  }

  async set(key: string, value: unknown, ttlMs?: number): Promise<void> {
    await this.gate();
    this.entries.set(key, { value, ttlMs });
  }

  async delete(key: string): Promise<void> {
    await this.gate();
    this.entries.delete(key);
  }

  private gate(): Promise<void> {
    if (this.hang) {
      return new Promise<void>(() => undefined);
    }
    return this.failure ? Promise.reject(this.failure) : Promise.resolve();
  }
}

/**
 * InMemoryVectorStore whose search can be made to stall or fail per collection.
 */
export class ControllableVectorStore extends InMemoryVectorStore {
  readonly stalled = new Set<string>();
  readonly failing = new Set<string>();

  async search(collection: string, vector: number[], limit: number): Promise<VectorMatch[]> {
    if (this.stalled.has(collection)) {
      return new Promise<VectorMatch[]>(() => undefined);
    }
    if (this.failing.has(collection)) {
      throw new Error(`search on ${collection} failed`);
    }
    return super.search(collection, vector, limit);
  }
}
