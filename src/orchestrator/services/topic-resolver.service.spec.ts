import { describe, expect, it } from '@jest/globals';
import { TopicResolverService } from './topic-resolver.service';
import { UnresolvedTopicError } from '../errors/pipeline-errors';
import { GenerationProviderError } from '../../providers/errors/generation-errors';
import { buildIndexSchema } from '../../config-store/config-parser';
import { ScriptedTextGenerator } from '../../testing/fakes';
import { buildSnapshot, testSchema } from '../../testing/fixtures';

function routingModel(primary: string, fallback: string) {
  return new ScriptedTextGenerator('routing', (prompt) =>
    prompt.startsWith('PRIMARY') ? primary : fallback,
  );
}

describe('TopicResolverService', () => {
  const snapshot = buildSnapshot();

  it('uses the primary answer when it names a known index', async () => {
    const model = routingModel('orders', 'profile');
    const resolver = new TopicResolverService(model);

    const resolution = await resolver.resolve('where is order 42', snapshot);

    expect(resolution).toEqual({ resolved: true, index: 'orders', stage: 'primary' });
    expect(model.prompts).toHaveLength(1);
  });

  it('moves to the fallback prompt when the primary answers None', async () => {
    const model = routingModel('None', 'profile');
    const resolver = new TopicResolverService(model);

    const resolution = await resolver.resolve('how old is the user', snapshot);

    expect(resolution).toEqual({ resolved: true, index: 'profile', stage: 'fallback' });
    expect(model.prompts).toHaveLength(2);
    expect(model.prompts[0]).toContain('"name": "profile"');
    expect(model.prompts[0]).toContain('Q=how old is the user');
    expect(model.prompts[1]).toBe(
      'FALLBACK - profile: fields=full_name, email, birth_date\n' +
        '- orders: fields=order_id, status, total_amount Q=how old is the user',
    );
  });

  it('moves to the fallback prompt when the primary names an unknown index', async () => {
    const model = routingModel('customers', 'Profile');
    const resolver = new TopicResolverService(model);

    const resolution = await resolver.resolve('how old is the user', snapshot);

    expect(resolution).toEqual({ resolved: true, index: 'profile', stage: 'fallback' });
  });

  it('is unresolved when neither stage names a known index', async () => {
    const resolver = new TopicResolverService(routingModel('None', 'weather'));

    const resolution = await resolver.resolve('will it rain', snapshot);

    expect(resolution.resolved).toBe(false);
    if (!resolution.resolved) {
      expect(resolution.error).toBeInstanceOf(UnresolvedTopicError);
      expect(resolution.error.code).toBe('RESOLUTION_UNRESOLVED');
    }
  });

  it('does not call the model for an empty schema', async () => {
    const model = routingModel('profile', 'profile');
    const resolver = new TopicResolverService(model);

    const resolution = await resolver.resolve('anything', {
      prompts: snapshot.prompts,
      schema: buildIndexSchema([]),
    });

    expect(resolution.resolved).toBe(false);
    expect(model.prompts).toHaveLength(0);
  });

  it('lets provider failures through', async () => {
    const resolver = new TopicResolverService(
      new ScriptedTextGenerator('routing', () => {
        throw new GenerationProviderError('routing', new Error('503'));
      }),
    );

    await expect(resolver.resolve('anything', snapshot)).rejects.toBeInstanceOf(
      GenerationProviderError,
    );
  });

  describe('parseTopic', () => {
    const resolver = new TopicResolverService(routingModel('', ''));
    const schema = testSchema();

    it.each([
      ['profile', 'profile'],
      ['"Profile".', 'profile'],
      ['`orders`\nbecause the question mentions an order', 'orders'],
      ['  ORDERS  ', 'orders'],
      ['None', null],
      ['none.', null],
      ['', null],
      ['products', null],
    ])('reads %j as %p', (answer, expected) => {
      expect(resolver.parseTopic(answer, schema)).toBe(expected);
    });
  });
});
