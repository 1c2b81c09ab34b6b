// Barrel-файл модуля хранения.
export { createDb, closeDb, withDb } from './db.js';

export type {
  CollectionRow,
  DocumentRow,
  DocumentHitRow,
  EvaluationRunRow,
  SearchParametersRow,
  RagEvaluationRow,
} from './schema.js';

export type { Migration } from './migrator.js';
export { runMigrations, getAppliedMigrations } from './migrator.js';

export { default as initialMigration } from './migrations/001_initial.js';
export { createVectorDimensionsMigration } from './migrations/002_vector_dimensions.js';

export type { DocumentStore, StoreHit, FieldWeights } from './documents.js';
export { DocumentStorage, toDocumentFields } from './documents.js';
export { EvaluationStorage } from './evaluations.js';
