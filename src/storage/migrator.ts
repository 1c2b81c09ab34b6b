// Миграции схемы: упорядоченный список, журнал в _migrations.
import type postgres from 'postgres';

export interface Migration {
  name: string;
  up(sql: postgres.Sql): Promise<void>;
}

async function ensureMigrationsTable(sql: postgres.Sql): Promise<void> {
  await sql`
    CREATE TABLE IF NOT EXISTS _migrations (
      name TEXT PRIMARY KEY,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT now()
    )
  `;
}

// Имена применённых миграций в порядке применения.
export async function getAppliedMigrations(sql: postgres.Sql): Promise<string[]> {
  await ensureMigrationsTable(sql);

  const rows = await sql<{ name: string }[]>`
    SELECT name FROM _migrations ORDER BY applied_at, name
  `;

  return rows.map((row) => row.name);
}

// Применяет недостающие миграции по порядку; каждая вместе с записью в журнал
// в одной транзакции. Возвращает имена применённых за этот вызов.
export async function runMigrations(
  sql: postgres.Sql,
  migrations: Migration[],
): Promise<string[]> {
  const names = migrations.map((migration) => migration.name);
  if (new Set(names).size !== names.length) {
    throw new Error(`Duplicate migration names: ${names.join(', ')}`);
  }

  const applied = new Set(await getAppliedMigrations(sql));
  const pending = migrations.filter((migration) => !applied.has(migration.name));

  for (const migration of pending) {
    // Type assertion нужен: TransactionSql работает как tagged template в runtime,
    // но TypeScript-типы пакета postgres не отражают это корректно.
    await sql.begin(async (tx: unknown) => {
      const query = tx as postgres.Sql;
      await migration.up(query);
      await query`INSERT INTO _migrations (name) VALUES (${migration.name})`;
    });
  }

  return pending.map((migration) => migration.name);
}
