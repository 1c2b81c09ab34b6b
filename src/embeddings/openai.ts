import { z } from 'zod';
import { postJson } from '../http/retry.js';
import type { RetryPolicy } from '../http/retry.js';
import { assertDimensions, toBatches } from './types.js';
import type { TextEmbedder } from './types.js';

// Конфигурация OpenAI Embeddings.
interface OpenAIConfig {
  apiKey: string;
  model: string;
  dimensions: number;
  baseUrl: string;
}

const OpenAIEmbeddingResponseSchema = z.object({
  data: z.array(z.object({ index: z.number(), embedding: z.array(z.number()) })),
});

const BATCH_SIZE = 100;

// Экспоненциальная задержка: 1с, 2с, 4с.
const RETRY_POLICY: RetryPolicy = {
  maxRetries: 3,
  baseDelayMs: 1000,
};

// Реализация TextEmbedder для OpenAI-совместимого /embeddings.
export class OpenAITextEmbedder implements TextEmbedder {
  readonly dimensions: number;
  readonly model: string;
  private readonly apiKey: string;
  private readonly baseUrl: string;

  constructor(config: OpenAIConfig) {
    this.apiKey = config.apiKey;
    this.model = config.model;
    this.dimensions = config.dimensions;
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
  }

  async embed(input: string): Promise<number[]> {
    const [vector] = await this.callApi([input]);
    return vector!;
  }

  async embedBatch(inputs: string[]): Promise<number[][]> {
    const results: number[][] = [];
    for (const batch of toBatches(inputs, BATCH_SIZE)) {
      results.push(...await this.callApi(batch));
    }
    return results;
  }

  // OpenAI не различает passage и query.
  async embedQuery(input: string, signal?: AbortSignal): Promise<number[]> {
    const [vector] = await this.callApi([input], signal);
    return vector!;
  }

  private async callApi(input: string[], signal?: AbortSignal): Promise<number[][]> {
    const json = await postJson({
      url: `${this.baseUrl}/embeddings`,
      label: 'OpenAI API',
      retry: RETRY_POLICY,
      signal,
      headers: { Authorization: `Bearer ${this.apiKey}` },
      body: {
        model: this.model,
        input,
        dimensions: this.dimensions,
      },
    });

    const { data } = OpenAIEmbeddingResponseSchema.parse(json);
    const sorted = [...data].sort((a, b) => a.index - b.index);
    return assertDimensions(sorted.map((item) => item.embedding), this.dimensions, 'OpenAI API');
  }
}
