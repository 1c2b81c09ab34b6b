// Оценка ответов по близости эмбеддингов: релевантность контекста и сходство с эталоном.
import type { TextEmbedder } from '../embeddings/types.js';
import type { HybridResult } from '../search/types.js';
import { mapWithConcurrency } from './pool.js';
import type { EvaluationReporter } from './progress.js';
import { silentReporter } from './progress.js';

// Сколько лучших документов усредняет relevanceScore.
export const DEFAULT_RELEVANCE_TOP_K = 5;

// Косинусное сходство; нулевой вектор даёт 0.
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) {
    throw new Error(`Vector length mismatch: ${a.length} vs ${b.length}`);
  }

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i]!;
    const y = b[i]!;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }

  if (normA === 0 || normB === 0) {
    return 0;
  }
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

function mean(values: readonly number[]): number {
  return values.length === 0 ? 0 : values.reduce((sum, value) => sum + value, 0) / values.length;
}

// Среднее сходство запроса с topK самыми близкими документами. Без документов — 0.
export async function relevanceScore(
  embedder: TextEmbedder,
  query: string,
  documents: readonly string[],
  topK: number = DEFAULT_RELEVANCE_TOP_K,
): Promise<number> {
  if (!Number.isInteger(topK) || topK <= 0) {
    throw new Error(`topK must be a positive integer, got ${topK}`);
  }
  if (documents.length === 0) {
    return 0;
  }

  const [queryVector, documentVectors] = await Promise.all([
    embedder.embedQuery(query),
    embedder.embedBatch([...documents]),
  ]);

  const similarities = documentVectors
    .map((vector) => cosineSimilarity(queryVector, vector))
    .sort((a, b) => b - a);

  return mean(similarities.slice(0, topK));
}

// Сходство сгенерированного ответа с эталонным.
export async function answerSimilarity(
  embedder: TextEmbedder,
  generated: string,
  reference: string,
): Promise<number> {
  const [generatedVector, referenceVector] = await embedder.embedBatch([generated, reference]);
  if (!generatedVector || !referenceVector) {
    throw new Error('Embedder returned fewer vectors than inputs');
  }
  return cosineSimilarity(generatedVector, referenceVector);
}

// Вопрос с эталонным ответом.
export interface ReferenceCase {
  question: string;
  referenceAnswer: string;
}

// Отвечает на вопрос и возвращает найденный контекст (обычно RagPipeline).
export interface ContextAnswerer {
  answer(question: string): Promise<{ answer: string; context: readonly HybridResult[] }>;
}

export interface AnswerScore {
  question: string;
  answer: string;
  relevance: number;
  similarity: number;
}

export interface AnswerQualityResult {
  scores: AnswerScore[];
  meanRelevance: number;
  meanSimilarity: number;
  failed: number;
}

export interface ScoreAnswersOptions {
  topK?: number;
  concurrency?: number;
  reporter?: EvaluationReporter;
}

// Прогоняет вопросы через answerer и оценивает ответы эмбеддингами.
// Упавший вопрос пропускается и учитывается в failed.
export async function scoreAnswers(
  cases: readonly ReferenceCase[],
  answerer: ContextAnswerer,
  embedder: TextEmbedder,
  options: ScoreAnswersOptions = {},
): Promise<AnswerQualityResult> {
  const reporter = options.reporter ?? silentReporter;
  let completed = 0;

  const slots = await mapWithConcurrency(cases, options.concurrency ?? 1, async (item) => {
    try {
      const { answer, context } = await answerer.answer(item.question);
      const [relevance, similarity] = await Promise.all([
        relevanceScore(embedder, item.question, context.map((result) => result.textFields.content), options.topK),
        answerSimilarity(embedder, answer, item.referenceAnswer),
      ]);
      return { question: item.question, answer, relevance, similarity };
    } catch (error) {
      reporter.onQueryFailed(item.question, error);
      return null;
    } finally {
      completed++;
      reporter.onQueryComplete(completed, cases.length);
    }
  });

  const scores = slots.filter((slot): slot is AnswerScore => slot !== null);

  return {
    scores,
    meanRelevance: mean(scores.map((score) => score.relevance)),
    meanSimilarity: mean(scores.map((score) => score.similarity)),
    failed: slots.length - scores.length,
  };
}
