// Метрики качества поиска: Hit Rate и MRR.
import { EmptyGroundTruthError } from './errors.js';
import { mapWithConcurrency } from './pool.js';
import { silentReporter } from './progress.js';
import type { EvaluationReporter } from './progress.js';

// Размеченный вопрос: единственный релевантный документ.
export interface GroundTruthEntry {
  query: string;
  expectedDocumentId: string;
}

// Итог одного прогона оценки.
export interface EvaluationRun {
  hitRate: number;
  mrr: number;
  timestamp: Date;
  totalQueries: number;
  // Вопросы, поиск по которым упал: засчитаны как промах.
  failedQueries: number;
}

// Поисковая функция: вопрос -> упорядоченные id документов.
export type SearchFunction = (query: string) => Promise<string[]> | string[];

export interface EvaluateOptions {
  concurrency?: number;
  reporter?: EvaluationReporter;
}

// relevant[i] = returned[i] совпадает с ожидаемым документом.
export function relevanceVector(returnedIds: readonly string[], expectedDocumentId: string): boolean[] {
  return returnedIds.map((id) => id === expectedDocumentId);
}

// Доля вопросов, где релевантный документ есть хоть на одной позиции.
export function hitRate(relevanceTotal: readonly boolean[][]): number {
  if (relevanceTotal.length === 0) {
    throw new EmptyGroundTruthError();
  }

  const hits = relevanceTotal.filter((line) => line.some(Boolean)).length;
  return hits / relevanceTotal.length;
}

// 1 / ранг первого релевантного результата, 0 при отсутствии.
export function reciprocalRank(line: readonly boolean[]): number {
  const index = line.indexOf(true);
  return index === -1 ? 0 : 1 / (index + 1);
}

// Среднее reciprocal rank по вопросам.
export function mrr(relevanceTotal: readonly boolean[][]): number {
  if (relevanceTotal.length === 0) {
    throw new EmptyGroundTruthError();
  }

  const sum = relevanceTotal.reduce((acc, line) => acc + reciprocalRank(line), 0);
  return sum / relevanceTotal.length;
}

// Прогоняет все вопросы через searchFn и считает метрики по каждому вопросу отдельно.
export async function evaluate(
  groundTruth: readonly GroundTruthEntry[],
  searchFn: SearchFunction,
  options: EvaluateOptions = {},
): Promise<EvaluationRun> {
  if (groundTruth.length === 0) {
    throw new EmptyGroundTruthError();
  }

  const reporter = options.reporter ?? silentReporter;
  let completed = 0;

  const outcomes = await mapWithConcurrency(groundTruth, options.concurrency ?? 1, async (entry) => {
    let relevance: boolean[];
    let failed = false;

    try {
      const returnedIds = await searchFn(entry.query);
      relevance = relevanceVector(returnedIds, entry.expectedDocumentId);
    } catch (error) {
      // Один упавший вопрос не прерывает прогон.
      reporter.onQueryFailed(entry.query, error);
      relevance = [];
      failed = true;
    }

    completed++;
    reporter.onQueryComplete(completed, groundTruth.length);
    return { relevance, failed };
  });

  // Единственная точка агрегации — после барьера пула.
  const relevanceTotal = outcomes.map((outcome) => outcome.relevance);

  return {
    hitRate: hitRate(relevanceTotal),
    mrr: mrr(relevanceTotal),
    timestamp: new Date(),
    totalQueries: groundTruth.length,
    failedQueries: outcomes.filter((outcome) => outcome.failed).length,
  };
}
