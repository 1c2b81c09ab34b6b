// Миграция для изменения размерности вектора эмбеддинга.
import type { Migration } from '../migrator.js';

// Фабрика миграции: создаёт migration с заданной размерностью вектора.
// Применяется один раз, размерность берётся из конфигурации эмбеддингов.
export function createVectorDimensionsMigration(dimensions: number): Migration {
  if (!Number.isInteger(dimensions) || dimensions <= 0) {
    throw new Error(`Vector dimensions must be a positive integer, got ${dimensions}`);
  }

  return {
    name: '002_vector_dimensions',

    async up(sql) {
      // Удаляем HNSW-индекс перед изменением типа колонки.
      await sql`DROP INDEX IF EXISTS idx_documents_embedding`;

      // Старые векторы другой размерности несовместимы — обнуляем.
      await sql`UPDATE documents SET embedding = NULL`;

      await sql`
        ALTER TABLE documents
          ALTER COLUMN embedding TYPE vector(${sql.unsafe(String(dimensions))})
      `;

      // Пересоздаём HNSW-индекс.
      await sql`
        CREATE INDEX idx_documents_embedding ON documents
          USING hnsw (embedding vector_cosine_ops)
          WITH (m = 16, ef_construction = 200)
      `;
    },
  };
}
