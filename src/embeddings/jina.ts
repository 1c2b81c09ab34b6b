import { z } from 'zod';
import { postJson } from '../http/retry.js';
import type { RetryPolicy } from '../http/retry.js';
import { assertDimensions, toBatches } from './types.js';
import type { TextEmbedder } from './types.js';

// Конфигурация Jina Embeddings.
interface JinaConfig {
  apiKey: string;
  model: string;
  dimensions: number;
}

// Тип задачи для Jina API.
type JinaTask = 'retrieval.passage' | 'retrieval.query';

// Структура ответа Jina API.
const JinaEmbeddingResponseSchema = z.object({
  data: z.array(z.object({ index: z.number(), embedding: z.array(z.number()) })),
});

// Максимальное количество элементов в одном батче.
const BATCH_SIZE = 64;

// 429 у Jina — фиксированная задержка 60с * попытка; 5xx — экспоненциальная от 1с.
const RETRY_POLICY: RetryPolicy = {
  maxRetries: 5,
  baseDelayMs: 1000,
  rateLimitDelayMs: 60_000,
};

// URL Jina Embeddings API.
const JINA_API_URL = 'https://api.jina.ai/v1/embeddings';

// Реализация TextEmbedder для Jina Embeddings v3.
export class JinaTextEmbedder implements TextEmbedder {
  readonly dimensions: number;
  readonly model: string;
  private readonly apiKey: string;

  constructor(config: JinaConfig) {
    this.apiKey = config.apiKey;
    this.model = config.model;
    this.dimensions = config.dimensions;
  }

  async embed(input: string): Promise<number[]> {
    const [vector] = await this.callApi([input], 'retrieval.passage');
    return vector!;
  }

  // Батчи обрабатываются последовательно, чтобы не превысить rate limit.
  async embedBatch(inputs: string[]): Promise<number[][]> {
    const results: number[][] = [];
    for (const batch of toBatches(inputs, BATCH_SIZE)) {
      results.push(...await this.callApi(batch, 'retrieval.passage'));
    }
    return results;
  }

  async embedQuery(input: string, signal?: AbortSignal): Promise<number[]> {
    const [vector] = await this.callApi([input], 'retrieval.query', signal);
    return vector!;
  }

  private async callApi(input: string[], task: JinaTask, signal?: AbortSignal): Promise<number[][]> {
    const json = await postJson({
      url: JINA_API_URL,
      label: 'Jina API',
      retry: RETRY_POLICY,
      signal,
      headers: { Authorization: `Bearer ${this.apiKey}` },
      body: {
        model: this.model,
        input,
        task,
        dimensions: this.dimensions,
        // Автоматически обрезает тексты, превышающие лимит модели.
        truncate: true,
      },
    });

    const { data } = JinaEmbeddingResponseSchema.parse(json);

    // Сортируем по index для гарантии порядка.
    const sorted = [...data].sort((a, b) => a.index - b.index);
    return assertDimensions(sorted.map((item) => item.embedding), this.dimensions, 'Jina API');
  }
}
