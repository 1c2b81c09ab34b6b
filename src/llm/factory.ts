import type { LlmConfig } from '../config/schema.js';
import { OllamaTextGenerator } from './ollama.js';
import { OpenAITextGenerator } from './openai.js';
import type { TextGenerator } from './types.js';

// Создание экземпляра TextGenerator по конфигурации.
export function createTextGenerator(config: LlmConfig): TextGenerator {
  switch (config.provider) {
  case 'ollama':
    return new OllamaTextGenerator({
      host: config.ollama?.host ?? 'http://localhost:11434',
      model: config.ollama?.model ?? 'phi3.5',
    });
  case 'openai': {
    if (!config.openai) {
      throw new Error('OpenAI LLM config is required when provider is "openai"');
    }
    return new OpenAITextGenerator({
      apiKey: config.openai.apiKey,
      model: config.openai.model,
      baseUrl: config.openai.baseUrl,
    });
  }
  default:
    throw new Error(`Unsupported LLM provider: ${config.provider as string}`);
  }
}
