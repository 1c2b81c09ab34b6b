import { z } from 'zod';
import { postJson } from '../http/retry.js';
import type { RetryPolicy } from '../http/retry.js';
import type { TextGenerator } from './types.js';

interface OpenAIChatConfig {
  apiKey: string;
  model: string;
  baseUrl: string;
}

const ChatCompletionResponseSchema = z.object({
  choices: z.array(z.object({
    message: z.object({ content: z.string().nullable() }),
  })).min(1),
});

const RETRY_POLICY: RetryPolicy = {
  maxRetries: 3,
  baseDelayMs: 1000,
};

// Генерация через OpenAI-совместимый /chat/completions (одно user-сообщение).
export class OpenAITextGenerator implements TextGenerator {
  readonly model: string;
  private readonly apiKey: string;
  private readonly baseUrl: string;

  constructor(config: OpenAIChatConfig) {
    this.apiKey = config.apiKey;
    this.model = config.model;
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
  }

  async generate(prompt: string): Promise<string> {
    const json = await postJson({
      url: `${this.baseUrl}/chat/completions`,
      label: 'OpenAI API',
      retry: RETRY_POLICY,
      headers: { Authorization: `Bearer ${this.apiKey}` },
      body: {
        model: this.model,
        messages: [{ role: 'user', content: prompt }],
        temperature: 0,
      },
    });

    const { choices } = ChatCompletionResponseSchema.parse(json);
    return (choices[0]?.message.content ?? '').trim();
  }
}
