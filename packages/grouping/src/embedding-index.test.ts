import { describe, it, expect } from 'vitest';
import { BudgetAwareInvoker, MalformedResponseError, type EmbeddingClient } from '@digest/llm';
import { EmbeddingSimilarityIndex } from './embedding-index.js';

function fakeClient(batchSize: number, dropLast = false): EmbeddingClient & { batches: string[][] } {
  const batches: string[][] = [];
  return {
    model: 'embed-test',
    batchSize,
    batches,
    async embed(texts) {
      batches.push([...texts]);
      const vectors = texts.map((text) => [text.length, 1]);
      return { value: dropLast ? vectors.slice(0, -1) : vectors, tokens: texts.length };
    },
  };
}

describe('EmbeddingSimilarityIndex', () => {
  it('encodes in batches and keeps input order', async () => {
    const client = fakeClient(2);
    const index = new EmbeddingSimilarityIndex(client);

    const vectors = await index.encode(['a', 'bb', 'ccc', 'dddd', 'eeeee']);

    expect(client.batches).toEqual([['a', 'bb'], ['ccc', 'dddd'], ['eeeee']]);
    expect(vectors.map((v) => v[0])).toEqual([1, 2, 3, 4, 5]);
  });

  it('routes every batch through the invoker', async () => {
    const client = fakeClient(2);
    const invoker = new BudgetAwareInvoker({
      limits: { requestsPerMinute: 100, tokensPerMinute: 10000, requestsPerDay: 100, tokensPerDay: 10000 },
      callDelayMs: 0,
      clock: { now: () => 0, sleep: async () => undefined },
    });
    const index = new EmbeddingSimilarityIndex(client, { invoker });

    await index.encode(['one', 'two', 'three']);

    expect(invoker.sendCount).toBe(2);
    expect(invoker.budgetState().tokensToday).toBe(3);
  });

  it('uses a smaller configured batch size', async () => {
    const client = fakeClient(100);
    const index = new EmbeddingSimilarityIndex(client, { batchSize: 1 });

    await index.encode(['x', 'y']);

    expect(client.batches).toEqual([['x'], ['y']]);
  });

  it('rejects a provider answer with missing vectors', async () => {
    const index = new EmbeddingSimilarityIndex(fakeClient(10, true));

    await expect(index.encode(['x', 'y'])).rejects.toBeInstanceOf(MalformedResponseError);
  });

  it('returns nothing for no texts', async () => {
    const client = fakeClient(10);
    const index = new EmbeddingSimilarityIndex(client);

    expect(await index.encode([])).toEqual([]);
    expect(client.batches).toEqual([]);
  });
});
