// Хранилище документов: полнотекстовый и векторный поиск по коллекции.
import pgvector from 'pgvector';
import type postgres from 'postgres';
import { SearchUnavailableError } from '../search/errors.js';
import type { Document, DocumentFields, TextField } from '../search/types.js';
import type { CollectionRow, DocumentHitRow, DocumentRow } from './schema.js';

// Размер пачки для batch-вставки.
const BATCH_SIZE = 100;

// Допустимый диапазон hnsw.ef_search в pgvector.
const MAX_EF_SEARCH = 1000;

// Результат поиска хранилища: id, сырая оценка, поля без эмбеддинга.
export interface StoreHit {
  id: string;
  score: number;
  fields: DocumentFields;
}

// Вес каждого текстового поля в запросе; 0 — поле не участвует.
export type FieldWeights = Record<TextField, number>;

// Контракт хранилища, которым пользуются поисковики.
export interface DocumentStore {
  searchText(
    collection: string,
    query: string,
    weights: FieldWeights,
    limit: number,
  ): Promise<StoreHit[]>;

  searchVector(
    collection: string,
    embedding: number[],
    limit: number,
    numCandidates: number,
  ): Promise<StoreHit[]>;
}

// Строка документа/результата -> поля без эмбеддинга.
export function toDocumentFields(row: DocumentRow | DocumentHitRow): DocumentFields {
  return {
    textFields: {
      content: row.content,
      title: row.title,
      description: row.description,
    },
    keywordFields: {
      video_id: row.video_id,
      author: row.author,
      upload_date: row.upload_date,
    },
  };
}

// Хранилище документов в PostgreSQL (tsvector + pgvector).
export class DocumentStorage implements DocumentStore {
  constructor(private sql: postgres.Sql) {}

  // Создаёт коллекцию, если её ещё нет.
  async ensureCollection(
    name: string,
    dimensions: number,
    embeddingModel: string,
  ): Promise<CollectionRow> {
    const rows = await this.sql<CollectionRow[]>`
      INSERT INTO collections (name, dimensions, embedding_model)
      VALUES (${name}, ${dimensions}, ${embeddingModel})
      ON CONFLICT (name) DO UPDATE SET name = EXCLUDED.name
      RETURNING *
    `;

    const collection = rows[0]!;

    // Векторы разных моделей несравнимы между собой.
    if (collection.dimensions !== dimensions || collection.embedding_model !== embeddingModel) {
      throw new Error(
        `Collection "${name}" uses ${collection.embedding_model} (${collection.dimensions} dims), ` +
        `got ${embeddingModel} (${dimensions} dims)`,
      );
    }

    return collection;
  }

  // Возвращает коллекцию по имени или null.
  async getCollection(name: string): Promise<CollectionRow | null> {
    const rows = await this.sql<CollectionRow[]>`
      SELECT * FROM collections WHERE name = ${name}
    `;

    return rows[0] ?? null;
  }

  // Возвращает все коллекции.
  async getCollections(): Promise<CollectionRow[]> {
    return await this.sql<CollectionRow[]>`
      SELECT * FROM collections ORDER BY name
    `;
  }

  // Вставляет или обновляет документы пачками по BATCH_SIZE в транзакции.
  async upsertBatch(collection: string, documents: Document[]): Promise<void> {
    for (let i = 0; i < documents.length; i += BATCH_SIZE) {
      const batch = documents.slice(i, i + BATCH_SIZE);

      // Type assertion нужен: TransactionSql работает как tagged template в runtime,
      // но TypeScript-типы пакета postgres не отражают это корректно.
      await this.sql.begin(async (tx: unknown) => {
        const query = tx as postgres.Sql;
        for (const doc of batch) {
          const vectorStr = pgvector.toSql(doc.embedding) as string;

          await query`
            INSERT INTO documents (
              id, collection, content, title, description,
              video_id, author, upload_date, embedding
            )
            VALUES (
              ${doc.id},
              ${collection},
              ${doc.textFields.content},
              ${doc.textFields.title},
              ${doc.textFields.description},
              ${doc.keywordFields.video_id},
              ${doc.keywordFields.author},
              ${doc.keywordFields.upload_date},
              ${vectorStr}::vector
            )
            ON CONFLICT (collection, id) DO UPDATE SET
              content = EXCLUDED.content,
              title = EXCLUDED.title,
              description = EXCLUDED.description,
              video_id = EXCLUDED.video_id,
              author = EXCLUDED.author,
              upload_date = EXCLUDED.upload_date,
              embedding = EXCLUDED.embedding
          `;
        }
      });
    }
  }

  // Multi-field полнотекстовый поиск: сумма ts_rank_cd по полям, умноженных на вес.
  async searchText(
    collection: string,
    query: string,
    weights: FieldWeights,
    limit: number,
  ): Promise<StoreHit[]> {
    await this.assertCollection(collection);

    const rows = await this.sql<DocumentHitRow[]>`
      SELECT id, content, title, description, video_id, author, upload_date,
        (
          ${weights.content}::float8 * ts_rank_cd(content_tsv, q) +
          ${weights.title}::float8 * ts_rank_cd(title_tsv, q) +
          ${weights.description}::float8 * ts_rank_cd(description_tsv, q)
        ) AS score
      FROM documents, plainto_tsquery('simple', ${query}) q
      WHERE collection = ${collection}
        AND (
          (${weights.content > 0}::boolean AND content_tsv @@ q) OR
          (${weights.title > 0}::boolean AND title_tsv @@ q) OR
          (${weights.description > 0}::boolean AND description_tsv @@ q)
        )
      ORDER BY score DESC, id
      LIMIT ${limit}
    `;

    return rows.map((row) => ({ id: row.id, score: row.score, fields: toDocumentFields(row) }));
  }

  // Векторный поиск по cosine distance; numCandidates задаёт hnsw.ef_search.
  async searchVector(
    collection: string,
    embedding: number[],
    limit: number,
    numCandidates: number,
  ): Promise<StoreHit[]> {
    await this.assertCollection(collection);

    const vectorStr = pgvector.toSql(embedding) as string;
    const efSearch = Math.min(Math.max(Math.trunc(numCandidates), 1), MAX_EF_SEARCH);
    let rows: DocumentHitRow[] = [];

    // SET LOCAL действует только внутри транзакции.
    await this.sql.begin(async (tx: unknown) => {
      const query = tx as postgres.Sql;
      await query.unsafe(`SET LOCAL hnsw.ef_search = ${efSearch}`);

      rows = await query<DocumentHitRow[]>`
        SELECT id, content, title, description, video_id, author, upload_date,
          1 - (embedding <=> ${vectorStr}::vector) AS score
        FROM documents
        WHERE collection = ${collection}
          AND embedding IS NOT NULL
        ORDER BY embedding <=> ${vectorStr}::vector
        LIMIT ${limit}
      `;
    });

    return rows.map((row) => ({ id: row.id, score: row.score, fields: toDocumentFields(row) }));
  }

  // Документы коллекции по порядку id (для генерации вопросов).
  async list(collection: string, limit?: number): Promise<DocumentRow[]> {
    return await this.sql<DocumentRow[]>`
      SELECT id, collection, content, title, description, video_id, author, upload_date, created_at
      FROM documents
      WHERE collection = ${collection}
      ORDER BY id
      ${limit === undefined ? this.sql`` : this.sql`LIMIT ${limit}`}
    `;
  }

  // Количество документов в коллекции.
  async count(collection: string): Promise<number> {
    const result = await this.sql<Array<{ count: string }>>`
      SELECT COUNT(*)::text AS count FROM documents WHERE collection = ${collection}
    `;

    return parseInt(result[0]!.count, 10);
  }

  // Бросает SearchUnavailableError, если коллекции нет.
  private async assertCollection(collection: string): Promise<void> {
    if (!(await this.getCollection(collection))) {
      throw new SearchUnavailableError(`Collection "${collection}" does not exist`);
    }
  }
}
