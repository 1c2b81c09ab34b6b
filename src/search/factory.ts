// Сборка гибридного поиска из конфигурации.
import type { SearchConfig } from '../config/schema.js';
import type { TextEmbedder } from '../embeddings/types.js';
import type { DocumentStore } from '../storage/documents.js';
import { HybridSearcher } from './coordinator.js';
import { LexicalSearcher } from './lexical.js';
import { VectorSearcher } from './vector.js';

export function createHybridSearcher(
  store: DocumentStore,
  embedder: TextEmbedder,
  config: SearchConfig,
): HybridSearcher {
  return new HybridSearcher(
    new LexicalSearcher(store, config.collection),
    new VectorSearcher(store, embedder, config.collection),
    config,
  );
}
