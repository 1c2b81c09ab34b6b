// Команда trag search — гибридный поиск по коллекции.
import { Command, Option } from 'commander';
import { loadConfig } from '../config/index.js';
import { createTextGenerator } from '../llm/index.js';
import { QueryRewriter, REWRITE_METHODS } from '../rag/index.js';
import type { RewriteMethod } from '../rag/index.js';
import type { HybridResult, SearchMethod } from '../search/index.js';
import { withDb } from '../storage/index.js';
import { buildSearcher, failCommand, formatScore, parsePositiveInt } from './shared.js';
import type { ConfigOption } from './shared.js';

interface SearchOptions extends ConfigOption {
  method?: SearchMethod;
  numResults?: number;
  rewrite: RewriteMethod;
  json?: boolean;
}

// Длина фрагмента транскрипта в выводе.
const SNIPPET_LENGTH = 200;

function formatResult(result: HybridResult, position: number): string {
  const { title, content } = result.textFields;
  const { lexical, vector, rrf } = result.scores;
  const snippet = content.length > SNIPPET_LENGTH ? `${content.slice(0, SNIPPET_LENGTH)}...` : content;

  return [
    `${position}. ${title || result.documentId} [${result.keywordFields.video_id || result.documentId}]`,
    `   rrf=${formatScore(rrf)} bm25=${lexical === null ? '-' : formatScore(lexical)} vector=${vector === null ? '-' : formatScore(vector)}`,
    `   ${snippet.replace(/\s+/g, ' ')}`,
  ].join('\n');
}

export const searchCommand = new Command('search')
  .description('Search indexed transcripts')
  .argument('<query>', 'Search query')
  .addOption(new Option('-m, --method <method>', 'Search method').choices(['text', 'vector', 'hybrid']))
  .option('-n, --num-results <n>', 'Number of results', parsePositiveInt)
  .addOption(
    new Option('-r, --rewrite <method>', 'Rewrite the query with the LLM before searching')
      .choices(REWRITE_METHODS)
      .default('none'),
  )
  .option('--json', 'Print raw JSON response')
  .option('-c, --config <path>', 'Path to config file')
  .action(async (query: string, options: SearchOptions) => {
    try {
      const config = await loadConfig(options.config);

      const searchQuery = options.rewrite === 'none'
        ? query
        : await new QueryRewriter(createTextGenerator(config.llm)).rewrite(query, options.rewrite);

      const response = await withDb(config.database, (sql) =>
        buildSearcher(config, sql).search({
          query: searchQuery,
          method: options.method,
          numResults: options.numResults,
        }),
      );

      if (options.json) {
        console.log(JSON.stringify({ query: searchQuery, ...response }, null, 2));
        return;
      }

      if (searchQuery !== query) {
        console.log(`Запрос после переписывания: ${searchQuery}\n`);
      }

      if (response.results.length === 0) {
        console.log('Ничего не найдено.');
        return;
      }

      console.log(`Найдено кандидатов: ${response.totalCandidates}\n`);
      response.results.forEach((result, i) => console.log(`${formatResult(result, i + 1)}\n`));
    } catch (error) {
      failCommand(error);
    }
  });
