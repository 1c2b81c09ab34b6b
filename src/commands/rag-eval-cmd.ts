// Команда trag rag-eval — оценка ответов RAG через LLM-судью.
import { Command, Option } from 'commander';
import { loadConfig } from '../config/index.js';
import {
  ConsoleEvaluationReporter,
  RELEVANCE_LABELS,
  evaluateRag,
  loadGroundTruth,
  saveJudgments,
} from '../evaluation/index.js';
import { createTextGenerator } from '../llm/index.js';
import { RagPipeline, REWRITE_METHODS } from '../rag/index.js';
import type { RewriteMethod } from '../rag/index.js';
import { EvaluationStorage, withDb } from '../storage/index.js';
import { buildSearcher, failCommand, parseNonNegativeInt, parsePositiveInt } from './shared.js';
import type { ConfigOption } from './shared.js';

interface RagEvalOptions extends ConfigOption {
  groundTruth?: string;
  output?: string;
  sample?: number;
  seed?: number;
  rewrite: RewriteMethod;
}

export const ragEvalCommand = new Command('rag-eval')
  .description('Answer a sample of ground truth questions and judge relevance with the LLM')
  .option('-g, --ground-truth <path>', 'Ground truth CSV (video_id,question)')
  .option('-o, --output <path>', 'Judgments CSV (default: evaluation.outputPath)')
  .option('--sample <n>', 'Number of questions to sample', parsePositiveInt)
  .option('-s, --seed <n>', 'Sampling seed', parseNonNegativeInt)
  .addOption(
    new Option('-r, --rewrite <method>', 'Rewrite questions with the LLM before searching')
      .choices(REWRITE_METHODS)
      .default('none'),
  )
  .option('-c, --config <path>', 'Path to config file')
  .action(async (options: RagEvalOptions) => {
    try {
      const config = await loadConfig(options.config);
      const groundTruth = await loadGroundTruth(options.groundTruth ?? config.evaluation.groundTruthPath);
      const output = options.output ?? config.evaluation.outputPath;
      const generator = createTextGenerator(config.llm);

      await withDb(config.database, async (sql) => {
        const pipeline = new RagPipeline(buildSearcher(config, sql), generator, config.search.numResults);
        const answerer = {
          answer: (question: string) => pipeline.answer(question, { rewrite: options.rewrite }),
        };
        const result = await evaluateRag(groundTruth, answerer, generator, {
          sampleSize: options.sample ?? config.evaluation.sampleSize,
          seed: options.seed ?? config.evaluation.seed,
          concurrency: config.evaluation.concurrency,
          reporter: new ConsoleEvaluationReporter(),
        });

        await saveJudgments(output, result.judgments);
        await new EvaluationStorage(sql).saveJudgments(config.search.collection, result.judgments);

        const total = result.judgments.length;
        console.log('');
        for (const label of RELEVANCE_LABELS) {
          const count = result.counts[label];
          const share = total > 0 ? ((count / total) * 100).toFixed(1) : '0.0';
          console.log(`${label.padEnd(16)} ${count} (${share}%)`);
        }
        if (result.failed > 0) {
          console.log(`Ошибок: ${result.failed}`);
        }
        console.log(`Seed: ${result.seed}`);
        console.log(`Результаты сохранены в ${output}`);
      });
    } catch (error) {
      failCommand(error);
    }
  });
