import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';

import { errorResponse, jsonResponse, parseArgs, type ToolContext, type ToolResponse } from './types.js';

const Args = z.object({
  projectId: z.string().min(1)
});

export const definition: Tool = {
  name: 'switch_project',
  description:
    'Make a project active: opens its vector index, loads its adapter and restores its conversation. ' +
    'Succeeds in degraded mode when some artifacts are missing; check "degraded" and "managers".',
  inputSchema: {
    type: 'object',
    properties: {
      projectId: { type: 'string', description: 'Project id from list_projects' }
    },
    required: ['projectId']
  }
};

export async function handle(args: Record<string, unknown>, ctx: ToolContext): Promise<ToolResponse> {
  const parsed = parseArgs(Args, args);
  if (!parsed.ok) return parsed.response;

  try {
    const result = await ctx.app.orchestrator.switchProject(parsed.value.projectId);
    return jsonResponse(result, !result.success);
  } catch (error) {
    return errorResponse(error);
  }
}
