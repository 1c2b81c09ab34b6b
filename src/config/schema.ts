import { z } from 'zod';
import { FieldBoostsSchema, TEXT_FIELDS } from '../search/types.js';

// Схема подключения к PostgreSQL.
export const DatabaseConfigSchema = z.object({
  host: z.string().default('localhost'),
  port: z.number().default(5432),
  name: z.string().default('transcript_rag'),
  user: z.string().default('rag'),
  password: z.string().default('rag'),
});

// Схема Jina Embeddings.
export const JinaEmbeddingsSchema = z.object({
  apiKey: z.string(),
  model: z.string().default('jina-embeddings-v3'),
  dimensions: z.number().int().positive().default(1024),
});

// Схема OpenAI Embeddings.
export const OpenAIEmbeddingsSchema = z.object({
  apiKey: z.string(),
  model: z.string().default('text-embedding-3-small'),
  dimensions: z.number().int().positive().default(1536),
  baseUrl: z.string().default('https://api.openai.com/v1'),
});

// Схема эмбеддингов через Ollama (sentence-transformers модели).
export const OllamaEmbeddingsSchema = z.object({
  host: z.string().default('http://localhost:11434'),
  model: z.string().default('all-minilm'),
  dimensions: z.number().int().positive().default(384),
});

// Схема конфигурации эмбеддингов.
export const EmbeddingsConfigSchema = z.object({
  provider: z.enum(['ollama', 'jina', 'openai', 'mock']).default('ollama'),
  ollama: OllamaEmbeddingsSchema.optional(),
  jina: JinaEmbeddingsSchema.optional(),
  openai: OpenAIEmbeddingsSchema.optional(),
});

// Схема Ollama LLM.
export const OllamaLlmSchema = z.object({
  host: z.string().default('http://localhost:11434'),
  model: z.string().default('phi3.5'),
});

// Схема OpenAI-совместимого chat completions.
export const OpenAILlmSchema = z.object({
  apiKey: z.string(),
  model: z.string().default('gpt-4o-mini'),
  baseUrl: z.string().default('https://api.openai.com/v1'),
});

// Схема генератора ответов (LLM).
export const LlmConfigSchema = z.object({
  provider: z.enum(['ollama', 'openai']).default('ollama'),
  ollama: OllamaLlmSchema.optional(),
  openai: OpenAILlmSchema.optional(),
});

// Схема RRF (Reciprocal Rank Fusion).
export const RrfConfigSchema = z.object({
  k: z.number().positive().default(60),
});

// Схема параметров поиска.
export const SearchConfigSchema = z.object({
  collection: z.string().min(1).default('transcripts'),
  method: z.enum(['text', 'vector', 'hybrid']).default('hybrid'),
  fields: z.array(z.enum(TEXT_FIELDS)).min(1).default([...TEXT_FIELDS]),
  boosts: FieldBoostsSchema.default({}),
  // Итоговое число результатов.
  numResults: z.number().int().positive().default(5),
  // Глубина каждого источника перед слиянием.
  retrieveTopK: z.number().int().positive().default(10),
  // Размер пула кандидатов kNN; по умолчанию max(10 * retrieveTopK, 100).
  numCandidates: z.number().int().positive().optional(),
  timeoutMs: z.number().int().positive().default(10_000),
  rrf: RrfConfigSchema.default(() => ({ k: 60 })),
});

// Диапазон [min, max) одного параметра оптимизатора.
export const ParamRangeSchema = z.tuple([z.number().finite(), z.number().finite()])
  .refine(([min, max]) => min <= max, { message: 'range min must not exceed max' });

// Схема параметров оценки и оптимизации.
export const EvaluationConfigSchema = z.object({
  groundTruthPath: z.string().default('data/ground-truth-retrieval.csv'),
  outputPath: z.string().default('data/rag-evaluations.csv'),
  iterations: z.number().int().min(1).default(20),
  seed: z.number().int().nonnegative().optional(),
  concurrency: z.number().int().min(1).default(4),
  sampleSize: z.number().int().min(1).default(200),
  paramRanges: z.record(z.enum(TEXT_FIELDS), ParamRangeSchema)
    .default(() => ({ content: [0, 3] as [number, number] })),
});

// Корневая схема конфигурации приложения.
export const AppConfigSchema = z.object({
  database: DatabaseConfigSchema.default(() => ({
    host: 'localhost',
    port: 5432,
    name: 'transcript_rag',
    user: 'rag',
    password: 'rag',
  })),
  embeddings: EmbeddingsConfigSchema.default(() => ({
    provider: 'ollama' as const,
  })),
  llm: LlmConfigSchema.default(() => ({
    provider: 'ollama' as const,
  })),
  search: SearchConfigSchema.default(() => ({
    collection: 'transcripts',
    method: 'hybrid' as const,
    fields: [...TEXT_FIELDS],
    boosts: {},
    numResults: 5,
    retrieveTopK: 10,
    timeoutMs: 10_000,
    rrf: { k: 60 },
  })),
  evaluation: EvaluationConfigSchema.default(() => ({
    groundTruthPath: 'data/ground-truth-retrieval.csv',
    outputPath: 'data/rag-evaluations.csv',
    iterations: 20,
    concurrency: 4,
    sampleSize: 200,
    paramRanges: { content: [0, 3] as [number, number] },
  })),
});

// Типы, выведенные из схем.
export type DatabaseConfig = z.infer<typeof DatabaseConfigSchema>;
export type EmbeddingsConfig = z.infer<typeof EmbeddingsConfigSchema>;
export type LlmConfig = z.infer<typeof LlmConfigSchema>;
export type RrfConfig = z.infer<typeof RrfConfigSchema>;
export type SearchConfig = z.infer<typeof SearchConfigSchema>;
export type EvaluationConfig = z.infer<typeof EvaluationConfigSchema>;
export type AppConfig = z.infer<typeof AppConfigSchema>;
