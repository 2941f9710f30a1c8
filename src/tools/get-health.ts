import type { Tool } from '@modelcontextprotocol/sdk/types.js';

import { errorResponse, jsonResponse, type ToolContext, type ToolResponse } from './types.js';

export const definition: Tool = {
  name: 'get_health',
  description:
    'Health of the switchboard: "healthy", "degraded" (a resource failed to load) or ' +
    '"unavailable" (the registry cannot be read). Includes embedding cache statistics.',
  inputSchema: {
    type: 'object',
    properties: {}
  }
};

export async function handle(_args: Record<string, unknown>, ctx: ToolContext): Promise<ToolResponse> {
  try {
    return jsonResponse(await ctx.app.orchestrator.health());
  } catch (error) {
    return errorResponse(error);
  }
}
