// Случайный поиск параметров, максимизирующий целевую функцию (MRR).
import { mapWithConcurrency } from './pool.js';
import { silentReporter } from './progress.js';
import type { EvaluationReporter } from './progress.js';
import { createRandom, freshSeed } from './random.js';

// Диапазон [min, max) каждого именованного параметра.
export type ParamRanges = Readonly<Record<string, readonly [number, number]>>;

// Одна конфигурация параметров.
export type ParamValues = Record<string, number>;

// Целевая функция: чистая функция параметров -> оценка, больше — лучше.
export type Objective = (params: ParamValues) => number | Promise<number>;

// Конфигурация и её оценка.
export interface ParameterSample {
  params: ParamValues;
  score: number;
}

export interface OptimizeOptions {
  iterations: number;
  // Без seed берётся свежий; использованный seed возвращается в результате.
  seed?: number;
  concurrency?: number;
  reporter?: EvaluationReporter;
}

export interface OptimizationResult {
  bestParams: ParamValues;
  bestScore: number;
  trials: ParameterSample[];
  seed: number;
}

// Проверяет диапазоны: хотя бы один параметр, конечные числа, min <= max.
function validateRanges(ranges: ParamRanges): Array<[string, readonly [number, number]]> {
  const entries = Object.entries(ranges);

  if (entries.length === 0) {
    throw new Error('Parameter ranges must name at least one parameter');
  }

  for (const [name, [min, max]] of entries) {
    if (!Number.isFinite(min) || !Number.isFinite(max) || min > max) {
      throw new Error(`Invalid range for "${name}": [${min}, ${max})`);
    }
  }

  return entries;
}

// Чистый random search: каждый параметр независимо и равномерно из [min, max),
// сохраняется попытка со строго большей оценкой, первая попытка — начальный лучший.
// Упавшая целевая функция даёт попытке оценку -Infinity.
export async function optimize(
  ranges: ParamRanges,
  objective: Objective,
  options: OptimizeOptions,
): Promise<OptimizationResult> {
  const { iterations } = options;

  if (!Number.isInteger(iterations) || iterations < 1) {
    throw new Error(`iterations must be an integer >= 1, got ${iterations}`);
  }

  const entries = validateRanges(ranges);
  const seed = options.seed ?? freshSeed();
  const random = createRandom(seed);
  const reporter = options.reporter ?? silentReporter;

  // Все выборки берутся последовательно из потока seed до вызовов objective:
  // префикс попыток не зависит от iterations и конкурентности.
  const candidates: ParamValues[] = [];
  for (let i = 0; i < iterations; i++) {
    const params: ParamValues = {};
    for (const [name, [min, max]] of entries) {
      params[name] = min + random() * (max - min);
    }
    candidates.push(params);
  }

  const scores = await mapWithConcurrency(candidates, options.concurrency ?? 1, async (params) => {
    try {
      const score = await objective(params);
      return Number.isNaN(score) ? Number.NEGATIVE_INFINITY : score;
    } catch (error) {
      reporter.onTrialFailed(params, error);
      return Number.NEGATIVE_INFINITY;
    }
  });

  // Агрегация лучшего — одна точка, в порядке попыток.
  const trials: ParameterSample[] = candidates.map((params, i) => ({ params, score: scores[i]! }));
  let best = trials[0]!;

  trials.forEach((trial, i) => {
    if (trial.score > best.score) {
      best = trial;
    }
    reporter.onTrialComplete(i + 1, iterations, trial.score, best.score);
  });

  return {
    bestParams: best.params,
    bestScore: best.score,
    trials,
    seed,
  };
}
