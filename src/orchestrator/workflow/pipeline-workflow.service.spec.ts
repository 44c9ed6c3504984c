import { beforeEach, describe, expect, it } from '@jest/globals';
import Keyv from 'keyv';
import { PipelineWorkflowService } from './pipeline-workflow.service';
import { CacheEngineService } from '../../cache/cache-engine.service';
import { ConversationHistoryService } from '../../history/conversation-history.service';
import { KeyvHistoryStore } from '../../history/history.store';
import { IntentClassifierService } from '../services/intent-classifier.service';
import { TopicResolverService } from '../services/topic-resolver.service';
import { RetrievalService } from '../services/retrieval.service';
import {
  GenerationProviderError,
  GenerationTimeoutError,
} from '../../providers/errors/generation-errors';
import type { ConfigSnapshot } from '../../config-store/types/config.types';
import {
  ControllableVectorStore,
  FakeEmbedder,
  MapKeyValueStore,
  ScriptedTextGenerator,
  type Responder,
} from '../../testing/fakes';
import { buildSnapshot } from '../../testing/fixtures';

const ORDERS_QUESTION = 'where is order 42?';

/** Routing model that names `primary` for the first topic prompt, `fallback` for the second */
function topicRouter(primary: string, fallback = 'None'): Responder {
  return (prompt) => (prompt.startsWith('PRIMARY') ? primary : fallback);
}

describe('PipelineWorkflowService', () => {
  let snapshot: ConfigSnapshot;
  let keyValueStore: MapKeyValueStore;
  let vectorStore: ControllableVectorStore;
  let embedder: FakeEmbedder;
  let history: ConversationHistoryService;

  beforeEach(async () => {
    snapshot = buildSnapshot();
    keyValueStore = new MapKeyValueStore();
    vectorStore = new ControllableVectorStore();
    embedder = new FakeEmbedder(4);
    history = new ConversationHistoryService(
      new KeyvHistoryStore(new Keyv(), 20),
      { promptTurns: 6, timeoutMs: 100 },
    );

    await vectorStore.ensureCollection('orders', 4);
    await vectorStore.upsert('orders', [
      {
        id: 'o-42',
        vector: [1, 1, 1, 1],
        payload: { order_id: '42', status: 'shipped' },
      },
    ]);
  });

  async function buildService(routingResponder: Responder, answerResponder: Responder) {
    const routing = new ScriptedTextGenerator('routing', routingResponder);
    const answer = new ScriptedTextGenerator('answer', answerResponder);
    const cacheEngine = new CacheEngineService(keyValueStore, vectorStore, {
      enabled: true,
      ttlSeconds: 60,
      similarityThreshold: 0.999,
      semanticCollection: 'prompt_response_cache',
      dimensions: 4,
      timeoutMs: 100,
    });
    await cacheEngine.onModuleInit();

    const service = new PipelineWorkflowService(
      cacheEngine,
      new IntentClassifierService(routing),
      new TopicResolverService(routing),
      new RetrievalService(vectorStore, { defaultLimit: 5, timeoutMs: 50 }),
      answer,
      embedder,
      history,
    );
    return { service, routing, answer };
  }

  it('answers a greeting from its template without embedding or model calls', async () => {
    const { service, routing, answer } = await buildService(
      () => 'unused',
      () => 'unused',
    );

    const result = await service.handle({ conversationId: 'c1', text: 'Hi' }, snapshot);

    expect(result).toEqual({ ok: true, kind: 'template', text: 'Hello from the test config' });
    expect(embedder.calls).toHaveLength(0);
    expect(routing.prompts).toHaveLength(0);
    expect(answer.prompts).toHaveLength(0);
    expect(keyValueStore.entries.size).toBe(0);
    expect((await history.recent('c1')).map((turn) => turn.text)).toEqual([
      'Hi',
      'Hello from the test config',
    ]);
  });

  it('retrieves from the inferred index and generates an answer', async () => {
    const { service, routing, answer } = await buildService(
      topicRouter('orders'),
      () => 'Order 42 has shipped',
    );

    const result = await service.handle(
      { conversationId: 'c1', text: '  Where is ORDER 42? ' },
      snapshot,
    );

    expect(result).toEqual({ ok: true, kind: 'generated', text: 'Order 42 has shipped' });
    expect(routing.prompts).toHaveLength(1);
    expect(answer.prompts).toHaveLength(1);
    expect(answer.prompts[0]).toMatch(
      /^SYSTEM\n\nANSWER topic=orders fields=order_id, status, total_amount docs=Document ID: o-42 \(Score: /,
    );
    expect(answer.prompts[0]).toContain('  - status: shipped');
    // One embedding serves the cache lookup, retrieval and cache population
    expect(embedder.calls).toEqual([ORDERS_QUESTION]);
    expect(keyValueStore.entries.size).toBe(1);
    expect(vectorStore.count('prompt_response_cache')).toBe(1);
  });

  it('serves a repeated query from the exact cache', async () => {
    const { service, routing, answer } = await buildService(
      topicRouter('orders'),
      () => 'Order 42 has shipped',
    );

    await service.handle({ conversationId: 'c1', text: 'Where is order 42?' }, snapshot);
    const second = await service.handle(
      { conversationId: 'c2', text: 'where is   order 42?' },
      snapshot,
    );

    expect(second).toEqual({ ok: true, kind: 'cache_hit', text: 'Order 42 has shipped' });
    expect(routing.prompts).toHaveLength(1);
    expect(answer.prompts).toHaveLength(1);
    expect(embedder.calls).toEqual([ORDERS_QUESTION]);
    expect((await history.recent('c2')).map((turn) => turn.role)).toEqual([
      'user',
      'assistant',
    ]);
  });

  it('generates without documents when retrieval times out', async () => {
    vectorStore.stalled.add('orders');
    const { service, answer } = await buildService(
      topicRouter('orders'),
      () => 'I could not find that order',
    );

    const result = await service.handle(
      { conversationId: 'c1', text: ORDERS_QUESTION },
      snapshot,
    );

    expect(result).toEqual({
      ok: true,
      kind: 'generated',
      text: 'I could not find that order',
    });
    expect(answer.prompts[0]).toContain('docs=No relevant documents found.');
  });

  it('resolves the topic in the fallback stage', async () => {
    const { service, routing, answer } = await buildService(
      topicRouter('None', 'profile'),
      () => 'You were born in 1990',
    );

    const result = await service.handle(
      { conversationId: 'c1', text: 'how old am i' },
      snapshot,
    );

    expect(result).toEqual({ ok: true, kind: 'generated', text: 'You were born in 1990' });
    expect(routing.prompts.map((prompt) => prompt.split(' ')[0])).toEqual([
      'PRIMARY',
      'FALLBACK',
    ]);
    expect(answer.prompts[0]).toContain(
      'ANSWER topic=profile fields=full_name, email, birth_date',
    );
  });

  it('asks for clarification when neither topic stage resolves', async () => {
    const { service, routing, answer } = await buildService(
      topicRouter('None', 'none'),
      () => 'unused',
    );

    const result = await service.handle(
      { conversationId: 'c1', text: 'tell me something' },
      snapshot,
    );

    expect(result).toEqual({
      ok: true,
      kind: 'clarification',
      text: 'Which records do you mean?',
    });
    expect(routing.prompts).toHaveLength(2);
    expect(answer.prompts).toHaveLength(0);
    expect(keyValueStore.entries.size).toBe(0);
  });

  it('answers small talk through the general conversation template with history', async () => {
    const { service, answer } = await buildService(
      () => 'unused',
      () => 'You are welcome',
    );

    await service.handle({ conversationId: 'c1', text: 'hi' }, snapshot);
    const result = await service.handle(
      { conversationId: 'c1', text: 'thanks a lot' },
      snapshot,
    );

    expect(result).toEqual({ ok: true, kind: 'generated', text: 'You are welcome' });
    expect(answer.prompts).toEqual([
      'SYSTEM\n\nCHAT H=Previous conversation:\n' +
        'User: hi\n' +
        'Assistant: Hello from the test config Q=thanks a lot',
    ]);
  });

  it('returns the generation_failed text when the answer model fails', async () => {
    const { service } = await buildService(topicRouter('orders'), () => {
      throw new GenerationProviderError('answer', new Error('model offline'));
    });

    const result = await service.handle(
      { conversationId: 'c1', text: ORDERS_QUESTION },
      snapshot,
    );

    expect(result.ok).toBe(false);
    expect(result.text).toBe('Generation failed, try again');
    if (!result.ok) {
      expect(result.error.code).toBe('GENERATION_PROVIDER_FAILURE');
    }
    expect(keyValueStore.entries.size).toBe(0);
  });

  it('ends the request when the routing model fails during topic inference', async () => {
    const { service, answer } = await buildService(() => {
      throw new GenerationTimeoutError('routing', 10);
    }, () => 'unused');

    const result = await service.handle(
      { conversationId: 'c1', text: ORDERS_QUESTION },
      snapshot,
    );

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('GENERATION_TIMEOUT');
    }
    expect(answer.prompts).toHaveLength(0);
  });

  it('never throws on unexpected failures', async () => {
    const { service } = await buildService(() => {
      throw new Error('unexpected');
    }, () => 'unused');

    const result = await service.handle(
      { conversationId: 'c1', text: ORDERS_QUESTION },
      snapshot,
    );

    expect(result.ok).toBe(false);
    expect(result.text).toBe('Generation failed, try again');
    if (!result.ok) {
      expect(result.error.code).toBe('PIPELINE_FAILED');
    }
  });
});
