// Генератор текста (LLM): prompt -> ответ. Для ядра поиска — непрозрачная функция.
export interface TextGenerator {
  generate(prompt: string): Promise<string>;

  readonly model: string;
}
