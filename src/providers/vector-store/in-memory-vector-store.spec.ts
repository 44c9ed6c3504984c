import { beforeEach, describe, expect, it } from '@jest/globals';
import { InMemoryVectorStore, cosineSimilarity } from './in-memory-vector-store';

describe('InMemoryVectorStore', () => {
  let store: InMemoryVectorStore;

  beforeEach(async () => {
    store = new InMemoryVectorStore();
    await store.ensureCollection('orders', 2);
    await store.upsert('orders', [
      { id: 'east', vector: [1, 0], payload: { order_id: '1' } },
      { id: 'north', vector: [0, 1], payload: { order_id: '2' } },
      { id: 'diagonal', vector: [1, 1], payload: { order_id: '3' } },
    ]);
  });

  it('returns the nearest points, best first', async () => {
    const matches = await store.search('orders', [1, 0.1], 2);

    expect(matches.map((match) => match.id)).toEqual(['east', 'diagonal']);
    expect(matches[0].payload).toEqual({ order_id: '1' });
  });

  it('overwrites a point stored under the same id', async () => {
    await store.upsert('orders', [{ id: 'east', vector: [0, 1], payload: { order_id: '9' } }]);

    const [best] = await store.search('orders', [0, 1], 1);

    expect(store.count('orders')).toBe(3);
    expect(best.score).toBeCloseTo(1);
  });

  it('keeps an existing collection when ensured again', async () => {
    await store.ensureCollection('orders', 2);

    expect(store.count('orders')).toBe(3);
  });

  it('rejects vectors of the wrong dimension', async () => {
    await expect(
      store.upsert('orders', [{ id: 'x', vector: [1, 2, 3], payload: {} }]),
    ).rejects.toThrow('Vector dimension 3 does not match collection "orders" (2)');
  });

  it('fails searches on unknown collections', async () => {
    await expect(store.search('profile', [1, 0], 1)).rejects.toThrow(
      'Collection "profile" not found',
    );
  });

  it('describes collections by the payload keys of a sample point', async () => {
    await store.ensureCollection('empty', 2);

    expect(await store.describeCollections()).toEqual([
      { name: 'orders', fields: ['order_id'] },
      { name: 'empty', fields: [] },
    ]);
  });
});

describe('cosineSimilarity', () => {
  it.each([
    [[1, 0], [3, 4], 0.6],
    [[1, 2], [2, 4], 1],
    [[1, 0], [-1, 0], -1],
    [[0, 0], [1, 1], 0],
  ])('cos(%j, %j) = %d', (a, b, expected) => {
    expect(cosineSimilarity(a, b)).toBeCloseTo(expected);
  });

  it('refuses vectors of different lengths', () => {
    expect(() => cosineSimilarity([1], [1, 2])).toThrow('Vectors must have the same length');
  });
});
