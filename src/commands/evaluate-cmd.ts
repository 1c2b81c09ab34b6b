// Команда trag evaluate — Hit Rate и MRR по ground truth.
import { Command, Option } from 'commander';
import { loadConfig } from '../config/index.js';
import { ConsoleEvaluationReporter, evaluate, loadGroundTruth, toSubjectIds } from '../evaluation/index.js';
import type { SearchMethod } from '../search/index.js';
import { EvaluationStorage, withDb } from '../storage/index.js';
import { buildSearcher, failCommand, formatScore, parsePositiveInt } from './shared.js';
import type { ConfigOption } from './shared.js';

interface EvaluateCommandOptions extends ConfigOption {
  groundTruth?: string;
  method?: SearchMethod;
  concurrency?: number;
  save?: boolean;
}

export const evaluateCommand = new Command('evaluate')
  .description('Measure retrieval quality (hit rate, MRR) against ground truth')
  .option('-g, --ground-truth <path>', 'Ground truth CSV (video_id,question)')
  .addOption(new Option('-m, --method <method>', 'Search method').choices(['text', 'vector', 'hybrid']))
  .option('--concurrency <n>', 'Parallel queries', parsePositiveInt)
  .option('--no-save', 'Do not store the run in the database')
  .option('-c, --config <path>', 'Path to config file')
  .action(async (options: EvaluateCommandOptions) => {
    try {
      const config = await loadConfig(options.config);
      const method = options.method ?? config.search.method;
      const groundTruth = await loadGroundTruth(options.groundTruth ?? config.evaluation.groundTruthPath);

      console.log(`Оценка поиска (${method}): ${groundTruth.length} вопросов`);

      await withDb(config.database, async (sql) => {
        const searcher = buildSearcher(config, sql);
        const run = await evaluate(
          groundTruth,
          async (query) => toSubjectIds((await searcher.search({ query, method })).results),
          {
            concurrency: options.concurrency ?? config.evaluation.concurrency,
            reporter: new ConsoleEvaluationReporter(),
          },
        );

        console.log('');
        console.log(`Hit Rate: ${formatScore(run.hitRate)}`);
        console.log(`MRR:      ${formatScore(run.mrr)}`);
        if (run.failedQueries > 0) {
          console.log(`Ошибок поиска: ${run.failedQueries} из ${run.totalQueries}`);
        }

        if (options.save !== false) {
          await new EvaluationStorage(sql).saveRun({
            collection: config.search.collection,
            method,
            run,
            params: { boosts: config.search.boosts, numResults: config.search.numResults },
          });
        }
      });
    } catch (error) {
      failCommand(error);
    }
  });
