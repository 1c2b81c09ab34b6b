// Подключение к PostgreSQL.
import postgres from 'postgres';
import type { DatabaseConfig } from '../config/schema.js';

// Пул соединений по конфигурации.
export function createDb(config: DatabaseConfig): postgres.Sql {
  return postgres({
    host: config.host,
    port: config.port,
    database: config.name,
    username: config.user,
    password: config.password,
    // NOTICE от CREATE ... IF NOT EXISTS не нужны в выводе CLI.
    onnotice: () => {},
  });
}

export async function closeDb(sql: postgres.Sql): Promise<void> {
  await sql.end();
}

// Открывает пул, выполняет fn и всегда закрывает пул.
export async function withDb<T>(
  config: DatabaseConfig,
  fn: (sql: postgres.Sql) => Promise<T>,
): Promise<T> {
  const sql = createDb(config);
  try {
    return await fn(sql);
  } finally {
    await closeDb(sql);
  }
}
