import { describe, it, expect, vi } from 'vitest';
import { evaluateRag, formatJudgments, judgeAnswer } from '../judge.js';
import type { Answerer } from '../judge.js';
import type { GroundTruthEntry } from '../metrics.js';
import type { TextGenerator } from '../../llm/types.js';

const ENTRIES: GroundTruthEntry[] = [
  { query: 'q1', expectedDocumentId: 'v1' },
  { query: 'q2', expectedDocumentId: 'v2' },
  { query: 'q3', expectedDocumentId: 'v3' },
];

// Судья: PARTLY_RELEVANT для q2, RELEVANT для остальных.
function fakeJudge() {
  return {
    model: 'judge',
    generate: vi.fn<TextGenerator['generate']>(async (prompt) =>
      prompt.includes('Question: q2')
        ? '{"Relevance": "PARTLY_RELEVANT", "Explanation": "Неполный ответ."}'
        : '```json\n{"Relevance": "RELEVANT", "Explanation": "Ответ по делу."}\n```',
    ),
  };
}

function fakeAnswerer(failOn?: string): Answerer {
  return {
    answer: vi.fn(async (question: string) => {
      if (question === failOn) {
        throw new Error('LLM unavailable');
      }
      return { answer: `answer for ${question}` };
    }),
  };
}

describe('judgeAnswer', () => {
  it('возвращает метку и объяснение', async () => {
    const verdict = await judgeAnswer(fakeJudge(), 'q1', 'answer');

    expect(verdict).toEqual({ relevance: 'RELEVANT', explanation: 'Ответ по делу.' });
  });

  it('передаёт вопрос и ответ в промпт', async () => {
    const judge = fakeJudge();

    await judgeAnswer(judge, 'Как варить кофе?', 'В турке.');

    const prompt = judge.generate.mock.calls[0]![0];
    expect(prompt).toContain('Question: Как варить кофе?');
    expect(prompt).toContain('Generated Answer: В турке.');
  });

  it('неизвестная метка — ошибка', async () => {
    const judge = { model: 'judge', generate: vi.fn(async () => '{"Relevance": "GOOD", "Explanation": "?"}') };

    await expect(judgeAnswer(judge, 'q', 'a')).rejects.toThrow('Invalid judge output');
  });
});

describe('evaluateRag', () => {
  it('оценивает выборку и считает метки', async () => {
    const result = await evaluateRag(ENTRIES, fakeAnswerer(), fakeJudge(), { sampleSize: 10, seed: 5 });

    expect(result.judgments).toHaveLength(3);
    expect(result.counts).toEqual({ NON_RELEVANT: 0, PARTLY_RELEVANT: 1, RELEVANT: 2 });
    expect(result.failed).toBe(0);
    expect(result.seed).toBe(5);

    const q2 = result.judgments.find((j) => j.question === 'q2');
    expect(q2).toEqual({
      videoId: 'v2',
      question: 'q2',
      answer: 'answer for q2',
      relevance: 'PARTLY_RELEVANT',
      explanation: 'Неполный ответ.',
    });
  });

  it('упавший вопрос пропускается и учитывается в failed', async () => {
    const result = await evaluateRag(ENTRIES, fakeAnswerer('q3'), fakeJudge(), { sampleSize: 3, seed: 1 });

    expect(result.judgments.map((j) => j.question).sort()).toEqual(['q1', 'q2']);
    expect(result.failed).toBe(1);
  });

  it('выборка воспроизводима при одинаковом seed', async () => {
    const first = await evaluateRag(ENTRIES, fakeAnswerer(), fakeJudge(), { sampleSize: 2, seed: 99 });
    const second = await evaluateRag(ENTRIES, fakeAnswerer(), fakeJudge(), { sampleSize: 2, seed: 99, concurrency: 2 });

    expect(first.judgments).toHaveLength(2);
    expect(second.judgments).toEqual(first.judgments);
  });
});

describe('formatJudgments', () => {
  it('пишет CSV с заголовком', () => {
    const csv = formatJudgments([
      { videoId: 'v1', question: 'Q?', answer: 'A.', relevance: 'RELEVANT', explanation: 'ok' },
    ]);

    expect(csv).toBe('video_id,question,answer,relevance,explanation\nv1,Q?,A.,RELEVANT,ok\n');
  });
});
