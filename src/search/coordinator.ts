// Координатор поиска — параллельный сбор BM25 + vector, затем RRF.
import type { SearchConfig } from '../config/schema.js';
import { rrfFuse } from './hybrid.js';
import type { LexicalSearcher } from './lexical.js';
import { withTimeout } from './timeout.js';
import type { VectorSearcher } from './vector.js';
import { defaultNumCandidates } from './vector.js';
import type {
  DocumentFields,
  FusedResult,
  HybridResult,
  RankedHit,
  SearchQuery,
  SearchResponse,
} from './types.js';

// Параметры координатора (срез SearchConfig).
export type HybridSearchOptions = Pick<
  SearchConfig,
  'method' | 'fields' | 'boosts' | 'numResults' | 'retrieveTopK' | 'numCandidates' | 'timeoutMs' | 'rrf'
>;

// Оркестратор гибридного поиска.
export class HybridSearcher {
  constructor(
    private lexical: LexicalSearcher,
    private vector: VectorSearcher,
    private options: HybridSearchOptions,
  ) {}

  // text -> только BM25, vector -> только kNN, hybrid -> оба + RRF.
  async search(query: SearchQuery): Promise<SearchResponse> {
    const method = query.method ?? this.options.method;
    const numResults = query.numResults ?? this.options.numResults;

    if (!Number.isInteger(numResults) || numResults <= 0) {
      throw new Error(`numResults must be a positive integer, got ${numResults}`);
    }

    // Глубина источников не меньше итогового числа результатов.
    const depth = Math.max(this.options.retrieveTopK, numResults);

    // Фаза сбора: независимые запросы параллельно, барьер Promise.all.
    // Ошибка любой ветки пробрасывается, без деградации до одного источника.
    const [vectorHits, lexicalHits] = await Promise.all([
      method === 'text' ? Promise.resolve<RankedHit[]>([]) : this.searchVector(query.query, depth),
      method === 'vector' ? Promise.resolve<RankedHit[]>([]) : this.searchLexical(query, depth),
    ]);

    // Фаза слияния: vector первым — его документы выигрывают равенство оценок.
    const fused = rrfFuse([vectorHits, lexicalHits], this.options.rrf.k);

    return {
      results: this.buildResults(fused.slice(0, numResults), lexicalHits, vectorHits),
      totalCandidates: fused.length,
    };
  }

  // Только id итоговых документов (для оценки).
  async searchIds(query: SearchQuery): Promise<string[]> {
    const response = await this.search(query);
    return response.results.map((result) => result.documentId);
  }

  private searchLexical(query: SearchQuery, depth: number): Promise<RankedHit[]> {
    const fields = query.fields ?? this.options.fields;
    const boosts = query.boosts ?? this.options.boosts;

    // Запрос к БД по таймауту не отменяется: сигнал доходит только до эмбеддинга запроса.
    return withTimeout(
      () => this.lexical.search(query.query, fields, depth, boosts),
      this.options.timeoutMs,
      'Lexical search',
    );
  }

  private searchVector(text: string, depth: number): Promise<RankedHit[]> {
    const numCandidates = Math.max(this.options.numCandidates ?? defaultNumCandidates(depth), depth);

    return withTimeout(
      (signal) => this.vector.search(text, depth, numCandidates, signal),
      this.options.timeoutMs,
      'Vector search',
    );
  }

  // Собирает документы с оценками по источникам в порядке слияния.
  private buildResults(
    fused: FusedResult[],
    lexicalHits: RankedHit[],
    vectorHits: RankedHit[],
  ): HybridResult[] {
    const lexicalMap = new Map(lexicalHits.map((hit) => [hit.documentId, hit]));
    const vectorMap = new Map(vectorHits.map((hit) => [hit.documentId, hit]));
    const results: HybridResult[] = [];

    for (const { documentId, fusedScore } of fused) {
      const lexicalHit = lexicalMap.get(documentId);
      const vectorHit = vectorMap.get(documentId);
      const fields: DocumentFields | undefined = vectorHit?.fields ?? lexicalHit?.fields;

      if (!fields) {
        continue;
      }

      results.push({
        documentId,
        textFields: fields.textFields,
        keywordFields: fields.keywordFields,
        scores: {
          lexical: lexicalHit?.sourceScore ?? null,
          vector: vectorHit?.sourceScore ?? null,
          rrf: fusedScore,
        },
      });
    }

    return results;
  }
}
