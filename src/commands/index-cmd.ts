// Команда trag index — индексация транскриптов из JSONL.
import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { Command } from 'commander';
import { loadConfig } from '../config/index.js';
import { createTextEmbedder } from '../embeddings/index.js';
import { ConsoleProgress, Indexer, parseDocumentsJsonl } from '../indexer/index.js';
import { DocumentStorage, withDb } from '../storage/index.js';
import { failCommand } from './shared.js';
import type { ConfigOption } from './shared.js';

interface IndexOptions extends ConfigOption {
  collection?: string;
}

export const indexCommand = new Command('index')
  .description('Index transcript documents from a JSONL file')
  .argument('<file>', 'JSONL file, one document per line')
  .option('--collection <name>', 'Target collection (default: search.collection)')
  .option('-c, --config <path>', 'Path to config file')
  .action(async (file: string, options: IndexOptions) => {
    try {
      const config = await loadConfig(options.config);
      const collection = options.collection ?? config.search.collection;
      const path = resolve(file);

      console.log(`Индексация: ${path}`);
      const documents = parseDocumentsJsonl(await readFile(path, 'utf-8'));

      if (documents.length === 0) {
        console.log('Файл не содержит документов.');
        return;
      }

      await withDb(config.database, async (sql) => {
        const indexer = new Indexer(
          new DocumentStorage(sql),
          createTextEmbedder(config.embeddings),
          new ConsoleProgress(),
        );
        await indexer.indexDocuments(collection, documents);
      });

      console.log('\nИндексация завершена.');
    } catch (error) {
      failCommand(error);
    }
  });
