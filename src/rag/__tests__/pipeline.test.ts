import { describe, it, expect, vi } from 'vitest';
import { RagPipeline, buildAnswerPrompt } from '../pipeline.js';
import { HybridSearcher } from '../../search/coordinator.js';
import { LexicalSearcher } from '../../search/lexical.js';
import { VectorSearcher } from '../../search/vector.js';
import type { HybridResult } from '../../search/types.js';
import type { DocumentStore, StoreHit } from '../../storage/documents.js';
import type { TextEmbedder } from '../../embeddings/types.js';
import type { TextGenerator } from '../../llm/types.js';

function result(id: string, title: string, content: string, videoId: string): HybridResult {
  return {
    documentId: id,
    textFields: { content, title, description: '' },
    keywordFields: { video_id: videoId, author: '', upload_date: '' },
    scores: { lexical: null, vector: null, rrf: 0 },
  };
}

function storeHit(id: string, title: string, content: string): StoreHit {
  return {
    id,
    score: 1,
    fields: {
      textFields: { content, title, description: '' },
      keywordFields: { video_id: `vid-${id}`, author: '', upload_date: '' },
    },
  };
}

describe('buildAnswerPrompt', () => {
  it('нумерует сегменты контекста', () => {
    const prompt = buildAnswerPrompt('Как варить кофе?', [
      result('d1', 'Кофе', 'Турка и вода.', 'v1'),
      result('d2', '', 'Без заголовка.', 'v2'),
    ]);

    expect(prompt).toContain('QUESTION: Как варить кофе?');
    expect(prompt).toContain('1. Кофе (v1)\nТурка и вода.');
    expect(prompt).toContain('2. d2\nБез заголовка.');
  });

  it('пустой контекст отмечается явно', () => {
    expect(buildAnswerPrompt('q', [])).toContain('(no matching transcripts)');
  });
});

function setupSearcher() {
  const store: DocumentStore = {
    searchText: vi.fn(async () => [storeHit('d1', 'Кофе', 'Турка и вода.'), storeHit('d2', 'Чай', 'Заварка.')]),
    searchVector: vi.fn(async () => []),
  };
  const embedder: TextEmbedder = {
    dimensions: 1,
    model: 'fake',
    embed: vi.fn(async () => [1]),
    embedBatch: vi.fn(async () => [[1]]),
    embedQuery: vi.fn(async () => [1]),
  };
  const searcher = new HybridSearcher(
    new LexicalSearcher(store, 'transcripts'),
    new VectorSearcher(store, embedder, 'transcripts'),
    {
      method: 'text',
      fields: ['content', 'title'],
      boosts: {},
      numResults: 5,
      retrieveTopK: 10,
      timeoutMs: 1000,
      rrf: { k: 60 },
    },
  );
  return { store, searcher };
}

describe('RagPipeline', () => {
  it('ищет контекст и отдаёт промпт генератору', async () => {
    const { searcher } = setupSearcher();
    const generator = {
      model: 'fake',
      generate: vi.fn<TextGenerator['generate']>().mockResolvedValue('  В турке.  \n'),
    };

    const pipeline = new RagPipeline(searcher, generator, 1);
    const answer = await pipeline.answer('Как варить кофе?');

    expect(answer.answer).toBe('В турке.');
    expect(answer.context.map((r) => r.documentId)).toEqual(['d1']);
    const prompt = generator.generate.mock.calls[0]![0];
    expect(prompt).toContain('1. Кофе (vid-d1)\nТурка и вода.');
    expect(prompt).not.toContain('Заварка.');
  });

  it('без rewrite ищет по исходному вопросу, LLM вызывается один раз', async () => {
    const { store, searcher } = setupSearcher();
    const generator = {
      model: 'fake',
      generate: vi.fn<TextGenerator['generate']>().mockResolvedValue('ответ'),
    };

    const answer = await new RagPipeline(searcher, generator).answer('кофе');

    expect(answer.searchQuery).toBe('кофе');
    expect(store.searchText).toHaveBeenCalledWith('transcripts', 'кофе', expect.any(Object), 10);
    expect(generator.generate).toHaveBeenCalledOnce();
  });

  it('cot: поиск по переписанному запросу, ответ на исходный вопрос', async () => {
    const { store, searcher } = setupSearcher();
    const generator = {
      model: 'fake',
      generate: vi.fn<TextGenerator['generate']>()
        .mockResolvedValueOnce('Пользователь хочет рецепт.\nRewritten query: рецепт кофе в турке')
        .mockResolvedValueOnce('В турке.'),
    };

    const answer = await new RagPipeline(searcher, generator).answer('Как варить кофе?', { rewrite: 'cot' });

    expect(answer.searchQuery).toBe('рецепт кофе в турке');
    expect(store.searchText).toHaveBeenCalledWith('transcripts', 'рецепт кофе в турке', expect.any(Object), 10);
    const answerPrompt = generator.generate.mock.calls[1]![0];
    expect(answerPrompt).toContain('QUESTION: Как варить кофе?');
    expect(answer.answer).toBe('В турке.');
  });
});
