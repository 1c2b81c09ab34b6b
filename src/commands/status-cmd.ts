// Команда trag status — статус системы.
import { Command } from 'commander';
import { loadConfig } from '../config/index.js';
import { collectStatus } from '../status.js';
import { withDb } from '../storage/index.js';
import { failCommand, formatScore } from './shared.js';
import type { ConfigOption } from './shared.js';

export const statusCommand = new Command('status')
  .description('Show system status')
  .option('-c, --config <path>', 'Path to config file')
  .action(async (options: ConfigOption) => {
    try {
      const config = await loadConfig(options.config);
      const status = await withDb(config.database, (sql) => collectStatus(sql, config));

      console.log('');
      console.log('=== Статус transcript-rag ===');
      console.log('');

      if (status.collections.length === 0) {
        console.log('Коллекции: нет');
      }
      for (const collection of status.collections) {
        const marker = collection.name === status.activeCollection ? '*' : ' ';
        console.log(
          `${marker} ${collection.name}: ${collection.documents} документов ` +
          `(${collection.embeddingModel}, ${collection.dimensions} dims)`,
        );
      }

      console.log('');
      console.log(`Провайдер эмбеддингов: ${status.providers.embeddings}`);
      console.log(`Провайдер LLM:         ${status.providers.llm}`);
      console.log(`Метод поиска:          ${status.search.method} (top ${status.search.numResults}, rrf k=${status.search.rrfK})`);

      console.log('');
      const last = status.lastEvaluation;
      console.log(
        last
          ? `Последняя оценка: hit rate ${formatScore(last.hitRate)}, MRR ${formatScore(last.mrr)} (${last.method}, ${last.totalQueries} вопросов)`
          : 'Последняя оценка: не выполнялась',
      );
      const best = status.bestParameters;
      console.log(
        best
          ? `Лучшие веса: ${JSON.stringify(best.params)} (MRR ${formatScore(best.score)}, seed ${best.seed})`
          : 'Лучшие веса: не подбирались',
      );

      console.log('');
      console.log(`Миграции: ${status.migrations.length > 0 ? status.migrations.join(', ') : 'не применены'}`);
    } catch (error) {
      failCommand(error);
    }
  });
