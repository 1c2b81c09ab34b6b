// Типы модуля поиска.
import { z } from 'zod';

// Текстовые поля документа (полнотекстовый поиск, бусты).
export const TEXT_FIELDS = ['content', 'title', 'description'] as const;
export type TextField = typeof TEXT_FIELDS[number];

// Поля точного совпадения.
export const KEYWORD_FIELDS = ['video_id', 'author', 'upload_date'] as const;
export type KeywordField = typeof KEYWORD_FIELDS[number];

// Метод поиска.
export type SearchMethod = 'text' | 'vector' | 'hybrid';

// Поля документа, возвращаемые хранилищем (без эмбеддинга).
export interface DocumentFields {
  textFields: Record<TextField, string>;
  keywordFields: Record<KeywordField, string>;
}

// Индексируемый документ.
export interface Document extends DocumentFields {
  id: string;
  embedding: number[];
}

// Один результат одного источника (BM25 или vector).
export interface RankedHit {
  documentId: string;
  // 1-based позиция в списке источника.
  rank: number;
  // Сырая оценка источника, между источниками не сравнима.
  sourceScore: number;
  fields: DocumentFields;
}

// Результат RRF-слияния.
export interface FusedResult {
  documentId: string;
  fusedScore: number;
}

// Верхняя граница веса поля.
export const MAX_FIELD_BOOST = 100;

// Схема весов полей: закрытый набор имён, ограниченные значения.
export const FieldBoostsSchema = z.object({
  content: z.number().finite().min(0).max(MAX_FIELD_BOOST).optional(),
  title: z.number().finite().min(0).max(MAX_FIELD_BOOST).optional(),
  description: z.number().finite().min(0).max(MAX_FIELD_BOOST).optional(),
}).strict();

// Веса текстовых полей для BM25. Отсутствующее поле имеет вес 1.
export type FieldBoosts = z.infer<typeof FieldBoostsSchema>;

// Валидирует произвольный объект весов (например, параметры оптимизатора).
export function createFieldBoosts(input: unknown): FieldBoosts {
  return FieldBoostsSchema.parse(input);
}

// Проверка имени поля.
export function isTextField(name: string): name is TextField {
  return TEXT_FIELDS.some((field) => field === name);
}

// Запрос на гибридный поиск.
export interface SearchQuery {
  query: string;
  method?: SearchMethod;
  numResults?: number;
  fields?: TextField[];
  boosts?: FieldBoosts;
}

// Оценки результата по источникам.
export interface HybridScores {
  lexical: number | null;
  vector: number | null;
  rrf: number;
}

// Результат гибридного поиска — документ с оценками.
export interface HybridResult extends DocumentFields {
  documentId: string;
  scores: HybridScores;
}

// Ответ поиска с мета-информацией.
export interface SearchResponse {
  results: HybridResult[];
  totalCandidates: number;
}
