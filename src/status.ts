// Сводка состояния системы для trag status и MCP-инструмента status.
import type postgres from 'postgres';
import type { AppConfig } from './config/schema.js';
import { DocumentStorage, EvaluationStorage, getAppliedMigrations } from './storage/index.js';

export interface CollectionStatus {
  name: string;
  documents: number;
  dimensions: number;
  embeddingModel: string;
}

export interface SystemStatus {
  schemaVersion: string | null;
  migrations: string[];
  collections: CollectionStatus[];
  activeCollection: string;
  lastEvaluation: { method: string; hitRate: number; mrr: number; totalQueries: number; at: string } | null;
  bestParameters: { params: Record<string, number>; score: number; seed: string; at: string } | null;
  providers: { embeddings: string; llm: string };
  search: {
    method: string;
    numResults: number;
    retrieveTopK: number;
    rrfK: number;
    boosts: Record<string, number | undefined>;
  };
}

// Источники данных сводки (в тестах — фейки).
export interface StatusSources {
  migrations: () => Promise<string[]>;
  documents: Pick<DocumentStorage, 'getCollections' | 'count'>;
  evaluations: Pick<EvaluationStorage, 'getRecentRuns' | 'getBestParameters'>;
}

// Сводка состояния по подключению к БД.
export async function collectStatus(sql: postgres.Sql, config: AppConfig): Promise<SystemStatus> {
  return await summarizeStatus({
    migrations: () => getAppliedMigrations(sql),
    documents: new DocumentStorage(sql),
    evaluations: new EvaluationStorage(sql),
  }, config);
}

export async function summarizeStatus(sources: StatusSources, config: AppConfig): Promise<SystemStatus> {
  const { documents, evaluations } = sources;
  const collection = config.search.collection;

  const [migrations, collectionRows, recentRuns, best] = await Promise.all([
    sources.migrations(),
    documents.getCollections(),
    evaluations.getRecentRuns(collection, 1),
    evaluations.getBestParameters(collection),
  ]);

  const collections = await Promise.all(collectionRows.map(async (row) => ({
    name: row.name,
    documents: await documents.count(row.name),
    dimensions: row.dimensions,
    embeddingModel: row.embedding_model,
  })));

  const lastRun = recentRuns[0];

  return {
    schemaVersion: migrations.at(-1) ?? null,
    migrations,
    collections,
    activeCollection: collection,
    lastEvaluation: lastRun
      ? {
        method: lastRun.method,
        hitRate: lastRun.hit_rate,
        mrr: lastRun.mrr,
        totalQueries: lastRun.total_queries,
        at: lastRun.created_at.toISOString(),
      }
      : null,
    bestParameters: best
      ? { params: best.params, score: best.score, seed: best.seed, at: best.created_at.toISOString() }
      : null,
    providers: {
      embeddings: config.embeddings.provider,
      llm: config.llm.provider,
    },
    search: {
      method: config.search.method,
      numResults: config.search.numResults,
      retrieveTopK: config.search.retrieveTopK,
      rrfK: config.search.rrf.k,
      boosts: config.search.boosts,
    },
  };
}
