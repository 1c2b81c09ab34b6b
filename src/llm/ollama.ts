import { z } from 'zod';
import { postJson } from '../http/retry.js';
import type { RetryPolicy } from '../http/retry.js';
import type { TextGenerator } from './types.js';

interface OllamaConfig {
  host: string;
  model: string;
}

// Ответ /api/generate без стриминга.
const OllamaGenerateResponseSchema = z.object({
  response: z.string(),
});

const RETRY_POLICY: RetryPolicy = {
  maxRetries: 2,
  baseDelayMs: 1000,
};

// Генерация через локальный Ollama.
export class OllamaTextGenerator implements TextGenerator {
  readonly model: string;
  private readonly host: string;

  constructor(config: OllamaConfig) {
    this.host = config.host.replace(/\/+$/, '');
    this.model = config.model;
  }

  async generate(prompt: string): Promise<string> {
    const json = await postJson({
      url: `${this.host}/api/generate`,
      label: 'Ollama API',
      retry: RETRY_POLICY,
      body: { model: this.model, prompt, stream: false },
    });

    return OllamaGenerateResponseSchema.parse(json).response.trim();
  }
}
