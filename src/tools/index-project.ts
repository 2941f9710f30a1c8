import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';

import { errorResponse, jsonResponse, parseArgs, type ToolContext, type ToolResponse } from './types.js';

const Args = z.object({
  timeoutMs: z.number().int().optional()
});

export const definition: Tool = {
  name: 'index_project',
  description:
    "Rebuild the active project's vector index: scan, chunk and embed its source files. " +
    'Unchanged chunks are served from the embedding cache.',
  inputSchema: {
    type: 'object',
    properties: {
      timeoutMs: { type: 'number', description: 'Wall-clock limit for file discovery' }
    }
  }
};

export async function handle(args: Record<string, unknown>, ctx: ToolContext): Promise<ToolResponse> {
  const parsed = parseArgs(Args, args);
  if (!parsed.ok) return parsed.response;

  try {
    const summary = await ctx.app.indexer.indexActiveProject({ timeoutMs: parsed.value.timeoutMs });
    return jsonResponse({ status: 'indexed', ...summary, cache: await ctx.app.cache.stats() });
  } catch (error) {
    return errorResponse(error);
  }
}
