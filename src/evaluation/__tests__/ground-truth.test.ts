import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  formatGroundTruth,
  generateQuestions,
  loadGroundTruth,
  parseGroundTruth,
  saveGroundTruth,
} from '../ground-truth.js';
import type { TextGenerator } from '../../llm/types.js';

function fakeGenerator(output: string) {
  return {
    model: 'fake',
    generate: vi.fn<TextGenerator['generate']>().mockResolvedValue(output),
  };
}

const DOCUMENT = {
  id: 'doc-1',
  textFields: { content: 'Сегодня варим кофе в турке.', title: 'Кофе', description: '' },
  keywordFields: { video_id: 'vid-1', author: 'author', upload_date: '2024-03-01' },
};

describe('parseGroundTruth', () => {
  it('читает video_id и question, убирает дубликаты', () => {
    const csv = [
      'video_id,question,extra',
      'v1,Как сварить кофе?,x',
      'v1,Как сварить кофе?,y',
      'v2,"Вопрос, с запятой",z',
    ].join('\n');

    expect(parseGroundTruth(csv)).toEqual([
      { query: 'Как сварить кофе?', expectedDocumentId: 'v1' },
      { query: 'Вопрос, с запятой', expectedDocumentId: 'v2' },
    ]);
  });

  it('одинаковый вопрос к разным видео не считается дубликатом', () => {
    const csv = 'video_id,question\nv1,Что это?\nv2,Что это?\n';

    expect(parseGroundTruth(csv)).toHaveLength(2);
  });

  it('строка без вопроса — ошибка с номером строки', () => {
    const csv = 'video_id,question\nv1,Вопрос?\nv2,\n';

    expect(() => parseGroundTruth(csv)).toThrow('Invalid ground truth row 3');
  });

  it('файл без колонки question — ошибка', () => {
    expect(() => parseGroundTruth('video_id,text\nv1,abc\n')).toThrow('Invalid ground truth row 2');
  });

  it('только заголовок — пустой список', () => {
    expect(parseGroundTruth('video_id,question\n')).toEqual([]);
  });
});

describe('formatGroundTruth', () => {
  it('пишет заголовок и экранирует запятые', () => {
    const csv = formatGroundTruth([
      { query: 'Как сварить кофе?', expectedDocumentId: 'v1' },
      { query: 'Вопрос, с запятой', expectedDocumentId: 'v2' },
    ]);

    expect(csv).toBe('video_id,question\nv1,Как сварить кофе?\nv2,"Вопрос, с запятой"\n');
  });
});

describe('saveGroundTruth / loadGroundTruth', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'trag-gt-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('сохраняет во вложенную директорию и читает обратно', async () => {
    const path = join(dir, 'data', 'ground-truth.csv');
    const entries = [{ query: 'Какая температура воды?', expectedDocumentId: 'vid-9' }];

    await saveGroundTruth(path, entries);

    expect(await readFile(path, 'utf-8')).toBe('video_id,question\nvid-9,Какая температура воды?\n');
    expect(await loadGroundTruth(path)).toEqual(entries);
  });
});

describe('generateQuestions', () => {
  it('разбирает JSON из ответа модели и привязывает вопросы к video_id', async () => {
    const generator = fakeGenerator('```json\n{"questions": ["Как варить кофе?", "Сколько варить?", "Как варить кофе?"]}\n```');

    const entries = await generateQuestions(generator, DOCUMENT);

    expect(entries).toEqual([
      { query: 'Как варить кофе?', expectedDocumentId: 'vid-1' },
      { query: 'Сколько варить?', expectedDocumentId: 'vid-1' },
    ]);
    const prompt = generator.generate.mock.calls[0]![0];
    expect(prompt).toContain('Formulate 10 questions');
    expect(prompt).toContain('Сегодня варим кофе в турке.');
  });

  it('ограничивает число вопросов параметром count', async () => {
    const generator = fakeGenerator('{"questions": ["a?", "b?", "c?"]}');

    const entries = await generateQuestions(generator, DOCUMENT, 2);

    expect(entries.map((e) => e.query)).toEqual(['a?', 'b?']);
    expect(generator.generate.mock.calls[0]![0]).toContain('Formulate 2 questions');
  });

  it('без video_id субъект — id документа', async () => {
    const generator = fakeGenerator('{"questions": ["a?"]}');
    const document = { ...DOCUMENT, keywordFields: { ...DOCUMENT.keywordFields, video_id: '' } };

    const entries = await generateQuestions(generator, document);

    expect(entries).toEqual([{ query: 'a?', expectedDocumentId: 'doc-1' }]);
  });

  it('ответ без JSON — ошибка', async () => {
    await expect(generateQuestions(fakeGenerator('не могу помочь'), DOCUMENT)).rejects.toThrow(
      'LLM output contains no JSON object',
    );
  });

  it('пустой список вопросов — ошибка валидации', async () => {
    await expect(generateQuestions(fakeGenerator('{"questions": []}'), DOCUMENT)).rejects.toThrow();
  });
});
