// MCP stdio-сервер transcript-rag: search, status.
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import type postgres from 'postgres';
import type { AppConfig } from '../config/schema.js';
import { createTextEmbedder } from '../embeddings/factory.js';
import { createHybridSearcher } from '../search/factory.js';
import { DocumentStorage } from '../storage/documents.js';
import { registerSearchTool } from './tools/search.js';
import { registerStatusTool } from './tools/status.js';

// Регистрирует инструменты на сервере (без транспорта).
export function createMcpServer(config: AppConfig, sql: postgres.Sql): McpServer {
  const server = new McpServer({
    name: 'transcript-rag',
    version: '0.1.0',
  });

  const searcher = createHybridSearcher(
    new DocumentStorage(sql),
    createTextEmbedder(config.embeddings),
    config.search,
  );

  registerSearchTool(server, searcher);
  registerStatusTool(server, sql, config);

  return server;
}

// Запускает сервер на stdio.
export async function startMcpServer(config: AppConfig, sql: postgres.Sql): Promise<void> {
  const server = createMcpServer(config, sql);
  await server.connect(new StdioServerTransport());

  console.error('transcript-rag MCP server started');
}
