// MCP-инструмент search — гибридный поиск по транскриптам.
import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { HybridSearcher } from '../../search/coordinator.js';
import { FieldBoostsSchema } from '../../search/types.js';

export function registerSearchTool(server: McpServer, searcher: HybridSearcher): void {
  server.registerTool(
    'search',
    {
      description: 'Hybrid search over indexed video transcripts. ' +
        'Fuses full-text (BM25-style) and vector similarity rankings with Reciprocal Rank Fusion.',
      inputSchema: {
        query: z.string().min(1).describe('Search query'),
        method: z.enum(['text', 'vector', 'hybrid']).optional().describe('Search method (default from config)'),
        numResults: z.number().int().min(1).max(50).optional().describe('Number of results to return'),
        boosts: FieldBoostsSchema.optional().describe('Field weights for full-text search: content, title, description'),
      },
    },
    async (args) => {
      try {
        const response = await searcher.search({
          query: args.query,
          method: args.method,
          numResults: args.numResults,
          boosts: args.boosts,
        });

        return {
          content: [{
            type: 'text' as const,
            text: JSON.stringify(response, null, 2),
          }],
        };
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        return {
          content: [{ type: 'text' as const, text: `Search error: ${message}` }],
          isError: true,
        };
      }
    },
  );
}
