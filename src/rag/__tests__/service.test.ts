import { describe, it, expect, vi } from 'vitest';
import { LORE_UNAVAILABLE, RAGService, expandQuery } from '../service.js';
import type { ScoredChunk, VectorStore } from '../database.js';
import type { EmbeddingProvider } from '../embedding.js';
import { ProviderError } from '../../utils/errors.js';
import { InMemoryVectorStore, KeywordEmbedder } from './fakes.js';

const QUERY = 'the Imprisoning War';
const SUB_QUERIES = expandQuery(QUERY);

/**
 * Embeds each sub-query as its position so the store can script answers
 */
class PositionEmbedder implements EmbeddingProvider {
  readonly name = 'position-embedder';
  constructor(private readonly failing: number[] = []) {}

  isAvailable(): boolean {
    return true;
  }

  async embed(text: string): Promise<number[]> {
    const position = SUB_QUERIES.indexOf(text);
    if (this.failing.includes(position)) {
      throw new ProviderError('position-embedder', 'rate limited');
    }
    return [position];
  }

  async embedMany(texts: string[]): Promise<number[][]> {
    return Promise.all(texts.map(text => this.embed(text)));
  }
}

class ScriptedStore implements VectorStore {
  constructor(private readonly answers: string[][]) {}

  async initialize(): Promise<void> {}
  isInitialized(): boolean {
    return true;
  }
  async count(): Promise<number> {
    return this.answers.flat().length;
  }
  async has(): Promise<boolean> {
    return false;
  }
  async upsertIfAbsent(): Promise<boolean> {
    return true;
  }
  async query(embedding: number[], k: number): Promise<ScoredChunk[]> {
    const texts = this.answers[embedding[0] ?? -1] ?? [];
    return texts.slice(0, k).map((text, i) => ({ id: `c${i}`, text, score: 1 - i / 10, sourceId: 'ep1' }));
  }
}

const ANSWERS = [
  ['alpha one', 'beta two'],
  ['beta two', 'gamma three'],
  ['alpha one'],
  ['delta four'],
];

describe('expandQuery', () => {
  it('widens a question into four sub-queries', () => {
    expect(expandQuery('  Ganondorf ')).toEqual([
      'Ganondorf',
      'Background information on Ganondorf',
      'Historical context of Ganondorf',
      "Key events related to Ganondorf in Hyrule's history",
    ]);
  });
});

describe('RAGService.retrieveDetailed', () => {
  it('joins unique passages in retrieval order', async () => {
    const service = new RAGService(new ScriptedStore(ANSWERS), new PositionEmbedder());

    const result = await service.retrieveDetailed(QUERY);

    expect(result.status).toBe('ok');
    expect(result.context).toBe('alpha one beta two gamma three delta four');
    expect(result.chunkCount).toBe(4);
    expect(result.subQueries).toEqual(SUB_QUERIES);
  });

  it('cuts the context to the word budget', async () => {
    const service = new RAGService(new ScriptedStore(ANSWERS), new PositionEmbedder(), { wordBudget: 3 });

    expect(await service.retrieve(QUERY)).toBe('alpha one beta');
  });

  it('takes resultsPerQuery passages from each sub-query', async () => {
    const service = new RAGService(new ScriptedStore(ANSWERS), new PositionEmbedder());

    const result = await service.retrieveDetailed(QUERY, { resultsPerQuery: 1 });

    expect(result.context).toBe('alpha one beta two delta four');
  });

  it('skips a failing sub-query and keeps the rest', async () => {
    const service = new RAGService(new ScriptedStore(ANSWERS), new PositionEmbedder([1]));

    const result = await service.retrieveDetailed(QUERY);

    expect(result.status).toBe('ok');
    expect(result.failedQueries).toEqual([SUB_QUERIES[1]]);
    expect(result.context).toBe('alpha one beta two delta four');
  });

  it('answers in character when every sub-query fails', async () => {
    const service = new RAGService(new ScriptedStore(ANSWERS), new PositionEmbedder([0, 1, 2, 3]));

    const result = await service.retrieveDetailed(QUERY);

    expect(result.status).toBe('failed');
    expect(result.context).toBe('I could not reach my archives to find that. Let us try again shortly.');
  });

  it('reports an empty result without inventing context', async () => {
    const service = new RAGService(new ScriptedStore([]), new PositionEmbedder());

    const result = await service.retrieveDetailed(QUERY);

    expect(result.status).toBe('empty');
    expect(result.context).toBe('');
  });

  it('returns the unavailable sentinel when the store never opened', async () => {
    const store = new InMemoryVectorStore({ failInitialize: true });
    const embedder = new KeywordEmbedder(['zonai']);
    const service = new RAGService(store, embedder);

    await service.initialize();

    expect(service.isReady()).toBe(false);
    const result = await service.retrieveDetailed(QUERY);
    expect(result.status).toBe('unavailable');
    expect(result.context).toBe(LORE_UNAVAILABLE);
    expect(embedder.calls).toBe(0);
  });

  it('returns the unavailable sentinel without an embedding provider', async () => {
    const store = new InMemoryVectorStore();
    const service = new RAGService(store, new KeywordEmbedder([], false));
    await service.initialize();

    expect(await service.retrieve(QUERY)).toBe(LORE_UNAVAILABLE);
  });

  it('never exceeds the word budget however large the corpus', async () => {
    const store = new InMemoryVectorStore();
    const embedder = new KeywordEmbedder(['war', 'sages']);
    await store.initialize();
    for (let i = 0; i < 40; i++) {
      const text = `passage ${i} about the war and the sages ${'word '.repeat(i % 7)}`;
      await store.upsertIfAbsent({ id: `p${i}`, sourceId: 'ep', text, embedding: embedder.vectorize(text) });
    }
    const service = new RAGService(store, embedder, { resultsPerQuery: 10 });

    for (const budget of [1, 5, 17, 60]) {
      const context = await service.retrieve(QUERY, { wordBudget: budget });
      expect(context.split(/\s+/).filter(Boolean).length).toBeLessThanOrEqual(budget);
    }
  });
});

describe('RAGService.search', () => {
  it('filters by relevance', async () => {
    const store = new InMemoryVectorStore();
    const embedder = new KeywordEmbedder(['rauru', 'sonia']);
    await store.initialize();
    await store.upsertIfAbsent({ id: 'a', sourceId: 'ep1', text: 'rauru', embedding: embedder.vectorize('rauru') });
    await store.upsertIfAbsent({ id: 'b', sourceId: 'ep2', text: 'sonia', embedding: embedder.vectorize('sonia') });
    const service = new RAGService(store, embedder);
    const spy = vi.spyOn(store, 'query');

    const results = await service.search('rauru', { limit: 2, minRelevance: 0.5 });

    expect(spy).toHaveBeenCalledWith(embedder.vectorize('rauru'), 2);
    expect(results.map(r => r.id)).toEqual(['a']);
  });
});
