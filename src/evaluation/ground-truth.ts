// Загрузка, сохранение и генерация размеченных вопросов.
import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { parse as parseCsv } from 'csv-parse/sync';
import { stringify as stringifyCsv } from 'csv-stringify/sync';
import { z } from 'zod';
import type { TextGenerator } from '../llm/types.js';
import type { DocumentFields } from '../search/types.js';
import { dedupe } from '../search/dedupe.js';
import { parseLlmJson } from './json-output.js';
import type { GroundTruthEntry } from './metrics.js';

// Строка CSV: субъект (video_id) и вопрос. Остальные колонки игнорируются.
const GroundTruthRowSchema = z.object({
  video_id: z.string().trim().min(1),
  question: z.string().trim().min(1),
});

// Ответ LLM при генерации вопросов.
const GeneratedQuestionsSchema = z.object({
  questions: z.array(z.string().trim().min(1)).min(1),
});

// Сколько вопросов генерировать на документ.
export const DEFAULT_QUESTION_COUNT = 10;

// Сколько символов транскрипта отдавать в промпт.
const MAX_TRANSCRIPT_CHARS = 12_000;

// Разбирает CSV с заголовком; дубликаты (video_id, question) отбрасываются.
export function parseGroundTruth(text: string): GroundTruthEntry[] {
  const records: unknown[] = parseCsv(text, {
    columns: true,
    skip_empty_lines: true,
    trim: true,
    bom: true,
  });

  const entries = records.map((record, index) => {
    const result = GroundTruthRowSchema.safeParse(record);
    if (!result.success) {
      // Строка 1 — заголовок.
      throw new Error(`Invalid ground truth row ${index + 2}: ${result.error.issues[0]?.message ?? 'unknown error'}`);
    }
    return { query: result.data.question, expectedDocumentId: result.data.video_id };
  });

  return dedupe(entries, (entry) => JSON.stringify([entry.expectedDocumentId, entry.query]));
}

// Читает файл ground truth.
export async function loadGroundTruth(path: string): Promise<GroundTruthEntry[]> {
  const text = await readFile(path, 'utf-8');
  return parseGroundTruth(text);
}

// Формирует CSV с колонками video_id, question.
export function formatGroundTruth(entries: readonly GroundTruthEntry[]): string {
  return stringifyCsv(
    entries.map((entry) => [entry.expectedDocumentId, entry.query]),
    { header: true, columns: ['video_id', 'question'] },
  );
}

// Записывает ground truth, создавая директорию.
export async function saveGroundTruth(path: string, entries: readonly GroundTruthEntry[]): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, formatGroundTruth(entries), 'utf-8');
}

// Промпт генерации вопросов по транскрипту.
export function buildQuestionPrompt(transcript: string, count: number): string {
  return [
    'You are an AI assistant tasked with generating questions based on a YouTube video transcript.',
    `Formulate ${count} questions that a user might ask based on the provided transcript.`,
    'Make the questions specific to the content of the transcript.',
    'The questions should be complete and not too short. Use as few words as possible from the transcript.',
    '',
    'The transcript:',
    '',
    transcript.slice(0, MAX_TRANSCRIPT_CHARS),
    '',
    'Provide the output in parsable JSON without using code blocks:',
    '',
    `{"questions": ["question1", "question2", ..., "question${count}"]}`,
  ].join('\n');
}

// Генерирует вопросы к документу; субъект — video_id (или id документа).
export async function generateQuestions(
  generator: TextGenerator,
  document: DocumentFields & { id: string },
  count: number = DEFAULT_QUESTION_COUNT,
): Promise<GroundTruthEntry[]> {
  const subject = document.keywordFields.video_id || document.id;
  const output = await generator.generate(buildQuestionPrompt(document.textFields.content, count));
  const { questions } = GeneratedQuestionsSchema.parse(parseLlmJson(output));

  const entries = questions.slice(0, count).map((question) => ({
    query: question,
    expectedDocumentId: subject,
  }));

  return dedupe(entries, (entry) => entry.query);
}
