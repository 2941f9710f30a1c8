import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';

import { errorResponse, jsonResponse, parseArgs, type ToolContext, type ToolResponse } from './types.js';

const Args = z.object({
  query: z.string().min(1),
  limit: z.number().int().min(1).max(50).default(5),
  language: z.string().min(1).optional(),
  pathPrefix: z.string().min(1).optional()
});

export const definition: Tool = {
  name: 'search_project',
  description:
    'Semantic search over the active project. Returns matching code chunks with file locations.',
  inputSchema: {
    type: 'object',
    properties: {
      query: { type: 'string', description: 'Natural language search query' },
      limit: { type: 'number', description: 'Maximum number of results (default: 5)', default: 5 },
      language: { type: 'string', description: 'Filter by language' },
      pathPrefix: { type: 'string', description: 'Filter by relative path prefix' }
    },
    required: ['query']
  }
};

export async function handle(args: Record<string, unknown>, ctx: ToolContext): Promise<ToolResponse> {
  const parsed = parseArgs(Args, args);
  if (!parsed.ok) return parsed.response;

  try {
    const { query, limit, language, pathPrefix } = parsed.value;
    const { projectId, results } = await ctx.app.indexer.searchActiveProject(query, limit, {
      language,
      pathPrefix
    });

    return jsonResponse({
      projectId,
      query,
      totalResults: results.length,
      results: results.map(({ chunk, score }) => ({
        file: `${chunk.relativePath}:${chunk.startLine}-${chunk.endLine}`,
        language: chunk.language,
        score: Math.round(score * 1000) / 1000,
        snippet: chunk.content
      }))
    });
  } catch (error) {
    return errorResponse(error);
  }
}
