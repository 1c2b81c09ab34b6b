import { describe, it, expect } from 'vitest';
import { VectorSearcher, defaultNumCandidates } from '../vector.js';
import { EmbeddingFailureError, SearchUnavailableError } from '../errors.js';
import { fakeEmbedder, fakeStore, storeHit } from './fixtures.js';

describe('defaultNumCandidates', () => {
  it('не меньше 100 и 10 на каждый результат', () => {
    expect(defaultNumCandidates(5)).toBe(100);
    expect(defaultNumCandidates(10)).toBe(100);
    expect(defaultNumCandidates(25)).toBe(250);
  });
});

describe('VectorSearcher', () => {
  it('ищет по эмбеддингу запроса с пулом кандидатов по умолчанию', async () => {
    const store = fakeStore([], [storeHit('doc-1', 0.93), storeHit('doc-2', 0.81)]);
    const embedder = fakeEmbedder([1, 0, 0]);
    const searcher = new VectorSearcher(store, embedder, 'transcripts');

    const hits = await searcher.search('вопрос', 5);

    expect(embedder.embedQuery).toHaveBeenCalledWith('вопрос', undefined);
    expect(store.searchVector).toHaveBeenCalledWith('transcripts', [1, 0, 0], 5, 100);
    expect(hits.map((h) => [h.documentId, h.rank, h.sourceScore])).toEqual([
      ['doc-1', 1, 0.93],
      ['doc-2', 2, 0.81],
    ]);
  });

  it('явный numCandidates передаётся хранилищу', async () => {
    const store = fakeStore();
    const searcher = new VectorSearcher(store, fakeEmbedder(), 'transcripts');

    await searcher.search('q', 3, 40);

    expect(store.searchVector).toHaveBeenCalledWith('transcripts', [0.1, 0.2, 0.3], 3, 40);
  });

  it('numCandidates меньше numResults — ошибка валидации', async () => {
    const searcher = new VectorSearcher(fakeStore(), fakeEmbedder(), 'transcripts');

    await expect(searcher.search('q', 10, 5)).rejects.toThrow('numCandidates (5) must be >= numResults (10)');
  });

  it('ошибка эмбеддинга — EmbeddingFailureError, хранилище не вызывается', async () => {
    const store = fakeStore();
    const embedder = fakeEmbedder();
    embedder.embedQuery.mockRejectedValueOnce(new Error('Jina API error: 500 Internal Server Error'));
    const searcher = new VectorSearcher(store, embedder, 'transcripts');

    const error = await searcher.search('q', 5).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(EmbeddingFailureError);
    expect(error).toMatchObject({ message: 'Query embedding failed: Jina API error: 500 Internal Server Error' });
    expect(store.searchVector).not.toHaveBeenCalled();
  });

  it('ошибка хранилища — SearchUnavailableError', async () => {
    const store = fakeStore();
    store.searchVector.mockRejectedValueOnce(new Error('timeout'));
    const searcher = new VectorSearcher(store, fakeEmbedder(), 'transcripts');

    await expect(searcher.search('q', 5)).rejects.toThrow(SearchUnavailableError);
  });
});
