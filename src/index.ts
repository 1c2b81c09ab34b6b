// Публичное API библиотеки transcript-rag.
export * from './search/index.js';
export * from './evaluation/index.js';
export * from './embeddings/index.js';
export * from './llm/index.js';
export * from './rag/index.js';
export * from './indexer/index.js';
export * from './storage/index.js';
export * from './config/index.js';
export { collectStatus, summarizeStatus } from './status.js';
export type { CollectionStatus, StatusSources, SystemStatus } from './status.js';
