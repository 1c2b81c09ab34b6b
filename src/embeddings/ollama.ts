import { z } from 'zod';
import { postJson } from '../http/retry.js';
import type { RetryPolicy } from '../http/retry.js';
import { assertDimensions, toBatches } from './types.js';
import type { TextEmbedder } from './types.js';

// Конфигурация локальной модели эмбеддингов в Ollama.
interface OllamaEmbeddingsConfig {
  host: string;
  model: string;
  dimensions: number;
}

const OllamaEmbedResponseSchema = z.object({
  embeddings: z.array(z.array(z.number())),
});

const BATCH_SIZE = 32;

// Локальный сервер: короткие паузы, без отдельной политики для 429.
const RETRY_POLICY: RetryPolicy = {
  maxRetries: 2,
  baseDelayMs: 500,
};

// Реализация TextEmbedder поверх Ollama /api/embed (sentence-transformers модели вроде all-minilm).
export class OllamaTextEmbedder implements TextEmbedder {
  readonly dimensions: number;
  readonly model: string;
  private readonly host: string;

  constructor(config: OllamaEmbeddingsConfig) {
    this.host = config.host.replace(/\/+$/, '');
    this.model = config.model;
    this.dimensions = config.dimensions;
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

  async embedQuery(input: string, signal?: AbortSignal): Promise<number[]> {
    const [vector] = await this.callApi([input], signal);
    return vector!;
  }

  private async callApi(input: string[], signal?: AbortSignal): Promise<number[][]> {
    const json = await postJson({
      url: `${this.host}/api/embed`,
      label: 'Ollama API',
      retry: RETRY_POLICY,
      signal,
      body: { model: this.model, input },
    });

    const { embeddings } = OllamaEmbedResponseSchema.parse(json);
    return assertDimensions(embeddings, this.dimensions, 'Ollama API');
  }
}
