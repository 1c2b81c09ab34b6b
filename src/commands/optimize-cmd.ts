// Команда trag optimize — подбор весов полей random search.
import { Command } from 'commander';
import { loadConfig } from '../config/index.js';
import { ConsoleEvaluationReporter, loadGroundTruth, tuneFieldBoosts } from '../evaluation/index.js';
import type { ParamRanges } from '../evaluation/index.js';
import { EvaluationStorage, withDb } from '../storage/index.js';
import { buildSearcher, failCommand, formatScore, parseNonNegativeInt, parsePositiveInt } from './shared.js';
import type { ConfigOption } from './shared.js';

interface OptimizeCommandOptions extends ConfigOption {
  groundTruth?: string;
  iterations?: number;
  seed?: number;
  limit?: number;
}

export const optimizeCommand = new Command('optimize')
  .description('Tune field boosts by random search, maximizing MRR')
  .option('-g, --ground-truth <path>', 'Ground truth CSV (video_id,question)')
  .option('-i, --iterations <n>', 'Number of trials', parsePositiveInt)
  .option('-s, --seed <n>', 'Random seed for reproducible runs', parseNonNegativeInt)
  .option('-l, --limit <n>', 'Use only the first N ground truth questions', parsePositiveInt)
  .option('-c, --config <path>', 'Path to config file')
  .action(async (options: OptimizeCommandOptions) => {
    try {
      const config = await loadConfig(options.config);
      const allEntries = await loadGroundTruth(options.groundTruth ?? config.evaluation.groundTruthPath);
      const groundTruth = options.limit ? allEntries.slice(0, options.limit) : allEntries;
      const iterations = options.iterations ?? config.evaluation.iterations;

      // z.record даёт Partial: пропускаем отсутствующие поля.
      const ranges: Record<string, readonly [number, number]> = {};
      for (const [field, range] of Object.entries(config.evaluation.paramRanges)) {
        if (range) {
          ranges[field] = range;
        }
      }
      const paramRanges: ParamRanges = ranges;

      console.log(`Оптимизация весов полей: ${iterations} попыток, ${groundTruth.length} вопросов`);

      await withDb(config.database, async (sql) => {
        const result = await tuneFieldBoosts(groundTruth, buildSearcher(config, sql), paramRanges, {
          iterations,
          seed: options.seed ?? config.evaluation.seed,
          method: config.search.method,
          concurrency: config.evaluation.concurrency,
          reporter: new ConsoleEvaluationReporter(),
        });

        console.log('');
        console.log(`Лучший MRR: ${formatScore(result.bestScore)}`);
        console.log(`Параметры:  ${JSON.stringify(result.bestParams)}`);
        console.log(`Seed:       ${result.seed}`);

        await new EvaluationStorage(sql).saveParameters({
          collection: config.search.collection,
          params: result.bestParams,
          score: result.bestScore,
          seed: result.seed,
          iterations,
        });
      });
    } catch (error) {
      failCommand(error);
    }
  });
