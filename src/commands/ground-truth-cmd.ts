// Команда trag ground-truth — генерация вопросов по документам коллекции.
import { Command } from 'commander';
import { loadConfig } from '../config/index.js';
import { DEFAULT_QUESTION_COUNT, generateQuestions, saveGroundTruth } from '../evaluation/index.js';
import type { GroundTruthEntry } from '../evaluation/index.js';
import { createTextGenerator } from '../llm/index.js';
import { dedupe } from '../search/index.js';
import { DocumentStorage, toDocumentFields, withDb } from '../storage/index.js';
import { failCommand, parsePositiveInt } from './shared.js';
import type { ConfigOption } from './shared.js';

interface GroundTruthOptions extends ConfigOption {
  output?: string;
  limit?: number;
  count: number;
}

export const groundTruthCommand = new Command('ground-truth')
  .description('Generate ground truth questions for indexed documents with the LLM')
  .option('-o, --output <path>', 'Output CSV (default: evaluation.groundTruthPath)')
  .option('-l, --limit <n>', 'Maximum number of documents', parsePositiveInt)
  .option('--count <n>', 'Questions per document', parsePositiveInt, DEFAULT_QUESTION_COUNT)
  .option('-c, --config <path>', 'Path to config file')
  .action(async (options: GroundTruthOptions) => {
    try {
      const config = await loadConfig(options.config);
      const output = options.output ?? config.evaluation.groundTruthPath;
      const generator = createTextGenerator(config.llm);

      const rows = await withDb(config.database, (sql) =>
        new DocumentStorage(sql).list(config.search.collection, options.limit),
      );

      // Одно видео — один набор вопросов.
      const documents = dedupe(rows, (row) => row.video_id || row.id);
      console.log(`Генерация вопросов (${generator.model}): ${documents.length} документов`);

      const entries: GroundTruthEntry[] = [];
      let failed = 0;

      for (const [i, row] of documents.entries()) {
        try {
          entries.push(...(await generateQuestions(generator, { id: row.id, ...toDocumentFields(row) }, options.count)));
        } catch (error) {
          failed++;
          const message = error instanceof Error ? error.message : String(error);
          console.error(`  Документ ${row.id}: ${message}`);
        }
        process.stderr.write(`\r  Документы: ${i + 1}/${documents.length}`);
      }
      process.stderr.write('\n');

      await saveGroundTruth(output, entries);
      console.log(`Сохранено ${entries.length} вопросов в ${output}${failed > 0 ? ` (ошибок: ${failed})` : ''}`);
    } catch (error) {
      failCommand(error);
    }
  });
