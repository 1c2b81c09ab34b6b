// Barrel-файл модуля LLM.
export type { TextGenerator } from './types.js';

export { OllamaTextGenerator } from './ollama.js';
export { OpenAITextGenerator } from './openai.js';
export { createTextGenerator } from './factory.js';
