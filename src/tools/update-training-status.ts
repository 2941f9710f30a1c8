import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';

import { TRAINING_STATUSES } from '../types/index.js';
import { errorResponse, jsonResponse, parseArgs, type ToolContext, type ToolResponse } from './types.js';

const Args = z.object({
  projectId: z.string().min(1),
  status: z.enum(TRAINING_STATUSES)
});

export const definition: Tool = {
  name: 'update_training_status',
  description:
    'Record adapter training progress. Status only moves forward: pending -> training -> completed | failed.',
  inputSchema: {
    type: 'object',
    properties: {
      projectId: { type: 'string' },
      status: { type: 'string', enum: [...TRAINING_STATUSES] }
    },
    required: ['projectId', 'status']
  }
};

export async function handle(args: Record<string, unknown>, ctx: ToolContext): Promise<ToolResponse> {
  const parsed = parseArgs(Args, args);
  if (!parsed.ok) return parsed.response;

  try {
    const { projectId, status } = parsed.value;
    const project = await ctx.app.registry.updateStatus(projectId, status);
    return jsonResponse({ status: 'updated', project });
  } catch (error) {
    return errorResponse(error);
  }
}
