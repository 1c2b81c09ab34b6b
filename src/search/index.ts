// Barrel-файл модуля поиска.
export type {
  TextField,
  KeywordField,
  SearchMethod,
  DocumentFields,
  Document,
  RankedHit,
  FusedResult,
  FieldBoosts,
  SearchQuery,
  HybridScores,
  HybridResult,
  SearchResponse,
} from './types.js';
export {
  TEXT_FIELDS,
  KEYWORD_FIELDS,
  MAX_FIELD_BOOST,
  FieldBoostsSchema,
  createFieldBoosts,
  isTextField,
} from './types.js';

export { rrfFuse, DEFAULT_RRF_K } from './hybrid.js';
export type { RankedItem } from './hybrid.js';
export { dedupe } from './dedupe.js';
export { SearchUnavailableError, EmbeddingFailureError } from './errors.js';
export { LexicalSearcher, resolveFieldWeights, toRankedHits } from './lexical.js';
export { VectorSearcher, defaultNumCandidates } from './vector.js';
export { withTimeout } from './timeout.js';
export { HybridSearcher } from './coordinator.js';
export type { HybridSearchOptions } from './coordinator.js';
export { createHybridSearcher } from './factory.js';
