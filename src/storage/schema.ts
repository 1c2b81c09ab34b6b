// TypeScript-типы строк таблиц PostgreSQL.

// Строка таблицы collections — именованная коллекция документов.
export interface CollectionRow {
  name: string;
  dimensions: number;
  embedding_model: string;
  created_at: Date;
}

// Строка таблицы documents (без колонок tsvector и эмбеддинга).
export interface DocumentRow {
  id: string;
  collection: string;
  content: string;
  title: string;
  description: string;
  video_id: string;
  author: string;
  upload_date: string;
  created_at: Date;
}

// Строка результата поиска по documents.
export interface DocumentHitRow {
  id: string;
  content: string;
  title: string;
  description: string;
  video_id: string;
  author: string;
  upload_date: string;
  score: number;
}

// Строка таблицы evaluation_runs — итог оценки поиска.
export interface EvaluationRunRow {
  id: string;
  collection: string;
  method: string;
  hit_rate: number;
  mrr: number;
  total_queries: number;
  failed_queries: number;
  params: Record<string, unknown>;
  created_at: Date;
}

// Строка таблицы search_parameters — лучшие найденные параметры.
export interface SearchParametersRow {
  id: string;
  collection: string;
  params: Record<string, number>;
  score: number;
  // BIGINT приходит из postgres строкой.
  seed: string;
  iterations: number;
  created_at: Date;
}

// Строка таблицы rag_evaluations — LLM-оценка ответа.
export interface RagEvaluationRow {
  id: string;
  collection: string;
  video_id: string;
  question: string;
  answer: string;
  relevance: string;
  explanation: string;
  created_at: Date;
}
