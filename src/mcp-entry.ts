#!/usr/bin/env node

// Точка входа MCP-сервера. stdout занят протоколом, логи только в stderr.
import { parseArgs } from 'node:util';
import { loadConfig } from './config/index.js';
import { createDb, closeDb } from './storage/db.js';
import { startMcpServer } from './mcp/server.js';

async function main(): Promise<void> {
  const { values } = parseArgs({
    options: { config: { type: 'string', short: 'c' } },
    strict: false,
  });
  const configPath = typeof values.config === 'string' ? values.config : undefined;

  const config = await loadConfig(configPath);
  const sql = createDb(config.database);

  const shutdown = async (): Promise<void> => {
    await closeDb(sql);
    process.exit(0);
  };

  process.on('SIGINT', () => { void shutdown(); });
  process.on('SIGTERM', () => { void shutdown(); });

  await startMcpServer(config, sql);
}

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`MCP server startup error: ${message}`);
  process.exit(1);
});
