// LLM-as-a-judge: оценка релевантности ответов RAG.
import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { stringify as stringifyCsv } from 'csv-stringify/sync';
import { z } from 'zod';
import type { TextGenerator } from '../llm/types.js';
import { parseLlmJson } from './json-output.js';
import type { GroundTruthEntry } from './metrics.js';
import { mapWithConcurrency } from './pool.js';
import type { EvaluationReporter } from './progress.js';
import { silentReporter } from './progress.js';
import { createRandom, freshSeed, sample } from './random.js';

// Метки релевантности ответа.
export const RELEVANCE_LABELS = ['NON_RELEVANT', 'PARTLY_RELEVANT', 'RELEVANT'] as const;
export type RelevanceLabel = typeof RELEVANCE_LABELS[number];

const VerdictSchema = z.object({
  Relevance: z.enum(RELEVANCE_LABELS),
  Explanation: z.string(),
});

// Вердикт судьи.
export interface Verdict {
  relevance: RelevanceLabel;
  explanation: string;
}

// Оценённый ответ.
export interface RagJudgment extends Verdict {
  videoId: string;
  question: string;
  answer: string;
}

// Отвечает на вопрос (обычно RagPipeline).
export interface Answerer {
  answer(question: string): Promise<{ answer: string }>;
}

export interface EvaluateRagOptions {
  sampleSize: number;
  seed?: number;
  concurrency?: number;
  reporter?: EvaluationReporter;
}

export interface RagEvaluationResult {
  judgments: RagJudgment[];
  counts: Record<RelevanceLabel, number>;
  failed: number;
  seed: number;
}

export function buildJudgePrompt(question: string, answer: string): string {
  return [
    'You are an expert evaluator for a Retrieval-Augmented Generation (RAG) system.',
    'Your task is to analyze the relevance of the generated answer to the given question.',
    'Based on the relevance of the generated answer, you will classify it',
    'as "NON_RELEVANT", "PARTLY_RELEVANT", or "RELEVANT".',
    '',
    'Here is the data for evaluation:',
    '',
    `Question: ${question}`,
    `Generated Answer: ${answer}`,
    '',
    'Please analyze the content and context of the generated answer in relation to the question',
    'and provide your evaluation in parsable JSON without using code blocks:',
    '',
    '{',
    '  "Relevance": "NON_RELEVANT" | "PARTLY_RELEVANT" | "RELEVANT",',
    '  "Explanation": "[Provide a brief explanation for your evaluation]"',
    '}',
  ].join('\n');
}

// Классифицирует ответ. Невалидный вывод модели -> Error.
export async function judgeAnswer(
  generator: TextGenerator,
  question: string,
  answer: string,
): Promise<Verdict> {
  const output = await generator.generate(buildJudgePrompt(question, answer));
  const result = VerdictSchema.safeParse(parseLlmJson(output));

  if (!result.success) {
    throw new Error(`Invalid judge output: ${result.error.issues[0]?.message ?? 'unknown error'}`);
  }

  return { relevance: result.data.Relevance, explanation: result.data.Explanation };
}

// Отвечает и оценивает случайную выборку вопросов. Упавшие вопросы пропускаются.
export async function evaluateRag(
  entries: readonly GroundTruthEntry[],
  answerer: Answerer,
  judge: TextGenerator,
  options: EvaluateRagOptions,
): Promise<RagEvaluationResult> {
  const seed = options.seed ?? freshSeed();
  const reporter = options.reporter ?? silentReporter;
  const selected = sample(entries, options.sampleSize, createRandom(seed));
  let completed = 0;

  const slots = await mapWithConcurrency(selected, options.concurrency ?? 1, async (entry) => {
    try {
      const { answer } = await answerer.answer(entry.query);
      const verdict = await judgeAnswer(judge, entry.query, answer);
      return { videoId: entry.expectedDocumentId, question: entry.query, answer, ...verdict };
    } catch (error) {
      reporter.onQueryFailed(entry.query, error);
      return null;
    } finally {
      completed++;
      reporter.onQueryComplete(completed, selected.length);
    }
  });

  const judgments = slots.filter((slot): slot is RagJudgment => slot !== null);
  const counts: Record<RelevanceLabel, number> = { NON_RELEVANT: 0, PARTLY_RELEVANT: 0, RELEVANT: 0 };
  for (const judgment of judgments) {
    counts[judgment.relevance]++;
  }

  return { judgments, counts, failed: slots.length - judgments.length, seed };
}

export function formatJudgments(judgments: readonly RagJudgment[]): string {
  return stringifyCsv(
    judgments.map((j) => [j.videoId, j.question, j.answer, j.relevance, j.explanation]),
    { header: true, columns: ['video_id', 'question', 'answer', 'relevance', 'explanation'] },
  );
}

export async function saveJudgments(path: string, judgments: readonly RagJudgment[]): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, formatJudgments(judgments), 'utf-8');
}
