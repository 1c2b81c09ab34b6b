// Подбор весов текстовых полей BM25 по MRR.
import type { HybridSearcher } from '../search/coordinator.js';
import { MAX_FIELD_BOOST, TEXT_FIELDS, createFieldBoosts, isTextField } from '../search/types.js';
import type { SearchMethod } from '../search/types.js';
import { evaluate } from './metrics.js';
import type { GroundTruthEntry } from './metrics.js';
import { optimize } from './optimizer.js';
import type { Objective, OptimizationResult, ParamRanges } from './optimizer.js';
import type { EvaluationReporter } from './progress.js';
import { toSubjectIds } from './subjects.js';

export interface BoostObjectiveOptions {
  // text — бусты задают весь рейтинг; hybrid — только BM25-ветку слияния.
  method?: SearchMethod;
  numResults?: number;
  concurrency?: number;
}

export interface TuneOptions extends BoostObjectiveOptions {
  iterations: number;
  seed?: number;
  reporter?: EvaluationReporter;
}

// Целевая функция: параметры -> веса полей -> прогон оценки -> MRR.
// Имена параметров проверяются по закрытому набору текстовых полей.
export function createBoostObjective(
  groundTruth: readonly GroundTruthEntry[],
  searcher: HybridSearcher,
  options: BoostObjectiveOptions = {},
): Objective {
  return async (params) => {
    const boosts = createFieldBoosts(params);

    const run = await evaluate(
      groundTruth,
      async (query) => {
        const response = await searcher.search({
          query,
          boosts,
          method: options.method,
          numResults: options.numResults,
        });
        return toSubjectIds(response.results);
      },
      { concurrency: options.concurrency },
    );

    return run.mrr;
  };
}

// Random search весов полей.
export async function tuneFieldBoosts(
  groundTruth: readonly GroundTruthEntry[],
  searcher: HybridSearcher,
  ranges: ParamRanges,
  options: TuneOptions,
): Promise<OptimizationResult> {
  // Неверный диапазон — ошибка до запуска, а не -Infinity в каждой попытке.
  for (const [name, [min, max]] of Object.entries(ranges)) {
    if (!isTextField(name)) {
      throw new Error(`Unknown boost field "${name}", expected one of: ${TEXT_FIELDS.join(', ')}`);
    }
    if (min < 0 || max > MAX_FIELD_BOOST) {
      throw new Error(`Boost range for "${name}" must lie within [0, ${MAX_FIELD_BOOST}]`);
    }
  }

  const objective = createBoostObjective(groundTruth, searcher, options);

  return await optimize(ranges, objective, {
    iterations: options.iterations,
    seed: options.seed,
    reporter: options.reporter,
  });
}
