// Команда trag init — инициализация базы данных.
import { Command } from 'commander';
import { loadConfig } from '../config/index.js';
import { embeddingDimensions } from '../embeddings/index.js';
import { createVectorDimensionsMigration, initialMigration, runMigrations, withDb } from '../storage/index.js';
import { failCommand } from './shared.js';
import type { ConfigOption } from './shared.js';

export const initCommand = new Command('init')
  .description('Initialize database (run migrations)')
  .option('-c, --config <path>', 'Path to config file')
  .action(async (options: ConfigOption) => {
    try {
      const config = await loadConfig(options.config);
      const dimensions = embeddingDimensions(config.embeddings);

      console.log('Инициализация базы данных...');
      const applied = await withDb(config.database, (sql) =>
        runMigrations(sql, [initialMigration, createVectorDimensionsMigration(dimensions)]),
      );

      console.log(applied.length > 0 ? `Применены миграции: ${applied.join(', ')}` : 'Схема уже актуальна.');
      console.log(`Размерность векторов: ${dimensions}`);
    } catch (error) {
      failCommand(error);
    }
  });
