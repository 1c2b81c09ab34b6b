// Векторный kNN-поиск: эмбеддинг запроса + cosine similarity по полю embedding.
import type { TextEmbedder } from '../embeddings/types.js';
import type { DocumentStore } from '../storage/documents.js';
import { EmbeddingFailureError, SearchUnavailableError, describeError } from './errors.js';
import { toRankedHits } from './lexical.js';
import type { RankedHit } from './types.js';

// Множитель и нижняя граница пула кандидатов по умолчанию.
const CANDIDATES_PER_RESULT = 10;
const MIN_CANDIDATES = 100;

// Размер пула кандидатов approximate kNN по умолчанию.
export function defaultNumCandidates(numResults: number): number {
  return Math.max(CANDIDATES_PER_RESULT * numResults, MIN_CANDIDATES);
}

export class VectorSearcher {
  constructor(
    private store: DocumentStore,
    private embedder: TextEmbedder,
    private collection: string,
  ) {}

  async search(
    query: string,
    numResults: number,
    numCandidates: number = defaultNumCandidates(numResults),
    signal?: AbortSignal,
  ): Promise<RankedHit[]> {
    if (!Number.isInteger(numResults) || numResults <= 0) {
      throw new Error(`numResults must be a positive integer, got ${numResults}`);
    }
    if (numCandidates < numResults) {
      throw new Error(`numCandidates (${numCandidates}) must be >= numResults (${numResults})`);
    }

    let embedding: number[];
    try {
      embedding = await this.embedder.embedQuery(query, signal);
    } catch (error) {
      throw new EmbeddingFailureError(`Query embedding failed: ${describeError(error)}`, { cause: error });
    }

    try {
      const hits = await this.store.searchVector(this.collection, embedding, numResults, numCandidates);
      return toRankedHits(hits);
    } catch (error) {
      if (error instanceof SearchUnavailableError) {
        throw error;
      }
      throw new SearchUnavailableError(`Vector search failed: ${describeError(error)}`, { cause: error });
    }
  }
}
