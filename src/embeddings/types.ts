// Интерфейс генератора эмбеддингов текста.
// Реализации детерминированы: одинаковый текст и модель дают одинаковый вектор.
export interface TextEmbedder {
  // Эмбеддинг индексируемого текста (passage).
  embed(input: string): Promise<number[]>;

  // Батч-генерация эмбеддингов (passage).
  embedBatch(inputs: string[]): Promise<number[][]>;

  // Эмбеддинг поискового запроса (у некоторых моделей отличается task prefix).
  // signal отменяет HTTP-запрос и ожидание повторов.
  embedQuery(input: string, signal?: AbortSignal): Promise<number[]>;

  // Размерность вектора.
  readonly dimensions: number;

  // Идентификатор модели: векторы разных моделей несравнимы.
  readonly model: string;
}

// Разбивает входные данные на батчи заданного размера.
export function toBatches<T>(items: readonly T[], size: number): T[][] {
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    batches.push(items.slice(i, i + size));
  }
  return batches;
}

// Проверяет, что провайдер вернул вектор ожидаемой размерности.
export function assertDimensions(vectors: number[][], dimensions: number, label: string): number[][] {
  for (const vector of vectors) {
    if (vector.length !== dimensions) {
      throw new Error(`${label}: expected ${dimensions}-dimensional embedding, got ${vector.length}`);
    }
  }
  return vectors;
}
