// Mock embedder для тестов и локального прогона без внешнего API.
// Векторы детерминированы: строятся из SHA-256 текста.
import { createHash } from 'node:crypto';
import type { TextEmbedder } from './types.js';

// Генерирует единичный вектор из хэша seed-строки.
function hashToVector(input: string, dimensions: number): number[] {
  const hash = createHash('sha256').update(input).digest();
  const vector: number[] = [];

  for (let i = 0; i < dimensions; i++) {
    // Байты хэша циклически, нормализованные в [-1, 1].
    const byte = hash[i % hash.length]!;
    vector.push((byte / 127.5) - 1);
  }

  const norm = Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0));
  return vector.map((v) => v / norm);
}

export class MockTextEmbedder implements TextEmbedder {
  readonly dimensions: number;
  readonly model = 'mock';

  constructor(dimensions = 384) {
    this.dimensions = dimensions;
  }

  async embed(input: string): Promise<number[]> {
    return hashToVector(input, this.dimensions);
  }

  async embedBatch(inputs: string[]): Promise<number[][]> {
    return inputs.map((input) => hashToVector(input, this.dimensions));
  }

  // Запрос и passage с одинаковым текстом дают один вектор: точное совпадение находится первым.
  async embedQuery(input: string): Promise<number[]> {
    return hashToVector(input, this.dimensions);
  }
}
