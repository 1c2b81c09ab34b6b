// MCP-инструмент status — состояние transcript-rag.
import type postgres from 'postgres';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { AppConfig } from '../../config/schema.js';
import { collectStatus } from '../../status.js';

export function registerStatusTool(
  server: McpServer,
  sql: postgres.Sql,
  config: AppConfig,
): void {
  server.registerTool(
    'status',
    {
      description: 'Get the current status of transcript-rag: database connectivity, ' +
        'collections with document counts, latest evaluation and tuned field boosts.',
      inputSchema: {},
    },
    async () => {
      try {
        const status = await collectStatus(sql, config);
        return {
          content: [{
            type: 'text' as const,
            text: JSON.stringify({ database: { connected: true }, ...status }, null, 2),
          }],
        };
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        return {
          content: [{
            type: 'text' as const,
            text: JSON.stringify({ database: { connected: false, error: message } }, null, 2),
          }],
          isError: true,
        };
      }
    },
  );
}
