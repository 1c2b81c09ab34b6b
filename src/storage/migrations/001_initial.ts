// Начальная миграция: расширение pgvector, коллекции, документы, результаты оценки.
import type { Migration } from '../migrator.js';

const migration: Migration = {
  name: '001_initial',

  async up(sql) {
    // Подключаем расширение pgvector.
    await sql`CREATE EXTENSION IF NOT EXISTS vector`;

    // Именованные коллекции документов.
    await sql`
      CREATE TABLE collections (
        name            TEXT PRIMARY KEY,
        dimensions      INTEGER NOT NULL,
        embedding_model TEXT NOT NULL,
        created_at      TIMESTAMPTZ NOT NULL DEFAULT now()
      )
    `;

    // Документы: текстовые поля с tsvector на каждое поле, keyword-поля, эмбеддинг.
    await sql`
      CREATE TABLE documents (
        id              TEXT NOT NULL,
        collection      TEXT NOT NULL REFERENCES collections(name) ON DELETE CASCADE,
        content         TEXT NOT NULL DEFAULT '',
        title           TEXT NOT NULL DEFAULT '',
        description     TEXT NOT NULL DEFAULT '',
        video_id        TEXT NOT NULL DEFAULT '',
        author          TEXT NOT NULL DEFAULT '',
        upload_date     TEXT NOT NULL DEFAULT '',
        embedding       vector(1024),
        content_tsv     tsvector
          GENERATED ALWAYS AS (to_tsvector('simple', content)) STORED,
        title_tsv       tsvector
          GENERATED ALWAYS AS (to_tsvector('simple', title)) STORED,
        description_tsv tsvector
          GENERATED ALWAYS AS (to_tsvector('simple', description)) STORED,
        created_at      TIMESTAMPTZ NOT NULL DEFAULT now(),
        PRIMARY KEY (collection, id)
      )
    `;

    await sql`CREATE INDEX idx_documents_video ON documents(collection, video_id)`;
    await sql`
      CREATE INDEX idx_documents_embedding ON documents
        USING hnsw (embedding vector_cosine_ops)
        WITH (m = 16, ef_construction = 200)
    `;
    await sql`CREATE INDEX idx_documents_content_fts ON documents USING GIN (content_tsv)`;
    await sql`CREATE INDEX idx_documents_title_fts ON documents USING GIN (title_tsv)`;
    await sql`CREATE INDEX idx_documents_description_fts ON documents USING GIN (description_tsv)`;

    // Итоги оценки поиска (hit rate, MRR).
    await sql`
      CREATE TABLE evaluation_runs (
        id             UUID PRIMARY KEY DEFAULT gen_random_uuid(),
        collection     TEXT NOT NULL,
        method         TEXT NOT NULL,
        hit_rate       DOUBLE PRECISION NOT NULL,
        mrr            DOUBLE PRECISION NOT NULL,
        total_queries  INTEGER NOT NULL,
        failed_queries INTEGER NOT NULL DEFAULT 0,
        params         JSONB NOT NULL DEFAULT '{}',
        created_at     TIMESTAMPTZ NOT NULL DEFAULT now()
      )
    `;

    // Лучшие параметры, найденные оптимизатором.
    await sql`
      CREATE TABLE search_parameters (
        id          UUID PRIMARY KEY DEFAULT gen_random_uuid(),
        collection  TEXT NOT NULL,
        params      JSONB NOT NULL,
        score       DOUBLE PRECISION NOT NULL,
        seed        BIGINT NOT NULL,
        iterations  INTEGER NOT NULL,
        created_at  TIMESTAMPTZ NOT NULL DEFAULT now()
      )
    `;

    // LLM-оценки ответов RAG.
    await sql`
      CREATE TABLE rag_evaluations (
        id          UUID PRIMARY KEY DEFAULT gen_random_uuid(),
        collection  TEXT NOT NULL,
        video_id    TEXT NOT NULL,
        question    TEXT NOT NULL,
        answer      TEXT NOT NULL,
        relevance   TEXT NOT NULL,
        explanation TEXT NOT NULL,
        created_at  TIMESTAMPTZ NOT NULL DEFAULT now()
      )
    `;
  },
};

export default migration;
