// Хранение результатов оценки: прогоны поиска, параметры, LLM-оценки ответов.
import type postgres from 'postgres';
import type { EvaluationRun } from '../evaluation/metrics.js';
import type { RagJudgment } from '../evaluation/judge.js';
import type { EvaluationRunRow, SearchParametersRow } from './schema.js';

// Приводим Record<string, unknown> к типу, совместимому с postgres.JSONValue.
type JsonSafe = postgres.JSONValue;

// Хранилище результатов оценки.
export class EvaluationStorage {
  constructor(private sql: postgres.Sql) {}

  // Сохраняет итог оценки поиска.
  async saveRun(data: {
    collection: string;
    method: string;
    run: EvaluationRun;
    params?: Record<string, unknown>;
  }): Promise<EvaluationRunRow> {
    const rows = await this.sql<EvaluationRunRow[]>`
      INSERT INTO evaluation_runs (
        collection, method, hit_rate, mrr, total_queries, failed_queries, params, created_at
      )
      VALUES (
        ${data.collection},
        ${data.method},
        ${data.run.hitRate},
        ${data.run.mrr},
        ${data.run.totalQueries},
        ${data.run.failedQueries},
        ${this.sql.json((data.params ?? {}) as JsonSafe)},
        ${data.run.timestamp}
      )
      RETURNING *
    `;

    return rows[0]!;
  }

  // Последние прогоны оценки коллекции.
  async getRecentRuns(collection: string, limit = 10): Promise<EvaluationRunRow[]> {
    return await this.sql<EvaluationRunRow[]>`
      SELECT * FROM evaluation_runs
      WHERE collection = ${collection}
      ORDER BY created_at DESC
      LIMIT ${limit}
    `;
  }

  // Сохраняет лучшие параметры оптимизатора.
  async saveParameters(data: {
    collection: string;
    params: Record<string, number>;
    score: number;
    seed: number;
    iterations: number;
  }): Promise<SearchParametersRow> {
    const rows = await this.sql<SearchParametersRow[]>`
      INSERT INTO search_parameters (collection, params, score, seed, iterations)
      VALUES (
        ${data.collection},
        ${this.sql.json(data.params)},
        ${data.score},
        ${data.seed},
        ${data.iterations}
      )
      RETURNING *
    `;

    return rows[0]!;
  }

  // Лучшие сохранённые параметры коллекции или null.
  async getBestParameters(collection: string): Promise<SearchParametersRow | null> {
    const rows = await this.sql<SearchParametersRow[]>`
      SELECT * FROM search_parameters
      WHERE collection = ${collection}
      ORDER BY score DESC, created_at DESC
      LIMIT 1
    `;

    return rows[0] ?? null;
  }

  // Сохраняет LLM-оценки ответов в одной транзакции.
  async saveJudgments(collection: string, judgments: RagJudgment[]): Promise<void> {
    if (judgments.length === 0) {
      return;
    }

    // Type assertion нужен: TransactionSql работает как tagged template в runtime,
    // но TypeScript-типы пакета postgres не отражают это корректно.
    await this.sql.begin(async (tx: unknown) => {
      const query = tx as postgres.Sql;
      for (const judgment of judgments) {
        await query`
          INSERT INTO rag_evaluations (collection, video_id, question, answer, relevance, explanation)
          VALUES (
            ${collection},
            ${judgment.videoId},
            ${judgment.question},
            ${judgment.answer},
            ${judgment.relevance},
            ${judgment.explanation}
          )
        `;
      }
    });
  }
}
