import type { AppConfig } from './schema.js';

// Значения по умолчанию для конфигурации.
// Используются при deep-merge с пользовательским конфигом до валидации.
export const defaultConfig: AppConfig = {
  database: {
    host: 'localhost',
    port: 5432,
    name: 'transcript_rag',
    user: 'rag',
    password: 'rag',
  },
  embeddings: {
    provider: 'ollama',
  },
  llm: {
    provider: 'ollama',
  },
  search: {
    collection: 'transcripts',
    method: 'hybrid',
    fields: ['content', 'title', 'description'],
    boosts: {},
    numResults: 5,
    retrieveTopK: 10,
    timeoutMs: 10_000,
    rrf: {
      k: 60,
    },
  },
  evaluation: {
    groundTruthPath: 'data/ground-truth-retrieval.csv',
    outputPath: 'data/rag-evaluations.csv',
    iterations: 20,
    concurrency: 4,
    sampleSize: 200,
    paramRanges: {
      content: [0, 3],
    },
  },
};
