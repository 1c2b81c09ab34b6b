import type { EmbeddingsConfig } from '../config/schema.js';
import type { TextEmbedder } from './types.js';
import { JinaTextEmbedder } from './jina.js';
import { MockTextEmbedder } from './mock.js';
import { OllamaTextEmbedder } from './ollama.js';
import { OpenAITextEmbedder } from './openai.js';

// Создание экземпляра TextEmbedder по конфигурации.
export function createTextEmbedder(config: EmbeddingsConfig): TextEmbedder {
  switch (config.provider) {
  case 'ollama':
    return new OllamaTextEmbedder({
      host: config.ollama?.host ?? 'http://localhost:11434',
      model: config.ollama?.model ?? 'all-minilm',
      dimensions: config.ollama?.dimensions ?? 384,
    });
  case 'jina': {
    if (!config.jina) {
      throw new Error('Jina embeddings config is required when provider is "jina"');
    }
    return new JinaTextEmbedder({
      apiKey: config.jina.apiKey,
      model: config.jina.model,
      dimensions: config.jina.dimensions,
    });
  }
  case 'mock':
    return new MockTextEmbedder();
  case 'openai': {
    if (!config.openai) {
      throw new Error('OpenAI embeddings config is required when provider is "openai"');
    }
    return new OpenAITextEmbedder({
      apiKey: config.openai.apiKey,
      model: config.openai.model,
      dimensions: config.openai.dimensions,
      baseUrl: config.openai.baseUrl,
    });
  }
  default:
    throw new Error(`Unsupported embeddings provider: ${config.provider as string}`);
  }
}

// Размерность векторов провайдера (для миграции 002).
export function embeddingDimensions(config: EmbeddingsConfig): number {
  return createTextEmbedder(config).dimensions;
}
