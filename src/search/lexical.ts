// Полнотекстовый multi-field поиск поверх хранилища документов.
import type { DocumentStore, FieldWeights, StoreHit } from '../storage/documents.js';
import { dedupe } from './dedupe.js';
import { SearchUnavailableError, describeError } from './errors.js';
import { TEXT_FIELDS } from './types.js';
import type { FieldBoosts, RankedHit, TextField } from './types.js';

// Переводит упорядоченные хиты хранилища в RankedHit с 1-based рангом.
// Повторный id от хранилища отбрасывается до присвоения рангов.
export function toRankedHits(hits: StoreHit[]): RankedHit[] {
  return dedupe(hits, (hit) => hit.id).map((hit, index) => ({
    documentId: hit.id,
    rank: index + 1,
    sourceScore: hit.score,
    fields: hit.fields,
  }));
}

// Веса полей для запроса: поле вне списка — 0, без явного буста — 1.
export function resolveFieldWeights(fields: readonly TextField[], boosts: FieldBoosts = {}): FieldWeights {
  const weights: FieldWeights = { content: 0, title: 0, description: 0 };

  for (const field of TEXT_FIELDS) {
    if (fields.includes(field)) {
      weights[field] = boosts[field] ?? 1;
    }
  }

  return weights;
}

export class LexicalSearcher {
  constructor(
    private store: DocumentStore,
    private collection: string,
  ) {}

  // Ищет query по полям fields; ранги — в порядке релевантности хранилища.
  async search(
    query: string,
    fields: readonly TextField[],
    numResults: number,
    boosts?: FieldBoosts,
  ): Promise<RankedHit[]> {
    if (fields.length === 0) {
      throw new Error('Lexical search requires at least one field');
    }
    if (!Number.isInteger(numResults) || numResults <= 0) {
      throw new Error(`numResults must be a positive integer, got ${numResults}`);
    }

    const weights = resolveFieldWeights(fields, boosts);
    let hits: StoreHit[];

    try {
      hits = await this.store.searchText(this.collection, query, weights, numResults);
    } catch (error) {
      if (error instanceof SearchUnavailableError) {
        throw error;
      }
      throw new SearchUnavailableError(`Lexical search failed: ${describeError(error)}`, { cause: error });
    }

    return toRankedHits(hits);
  }
}
