// Barrel-файл модуля индексации.
export { Indexer } from './indexer.js';
export type { DocumentWriter } from './indexer.js';
export { parseDocumentsJsonl, embeddingText } from './jsonl.js';
export type { DocumentInput } from './jsonl.js';
export { ConsoleProgress, silentProgress } from './progress.js';
export type { IndexResult, ProgressReporter } from './progress.js';
