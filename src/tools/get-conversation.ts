import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';

import { DEFAULT_RECENT_CONTEXT_CHARS } from '../managers/context-manager.js';
import { errorResponse, jsonResponse, parseArgs, type ToolContext, type ToolResponse } from './types.js';

const Args = z.object({
  maxChars: z.number().int().min(1).default(DEFAULT_RECENT_CONTEXT_CHARS),
  limit: z.number().int().min(1).optional()
});

export const definition: Tool = {
  name: 'get_conversation',
  description:
    "Conversation history of the active project, plus the most recent turns formatted for a model prompt.",
  inputSchema: {
    type: 'object',
    properties: {
      maxChars: {
        type: 'number',
        description: `Character budget for the formatted context (default: ${DEFAULT_RECENT_CONTEXT_CHARS})`
      },
      limit: { type: 'number', description: 'Only the last N messages' }
    }
  }
};

export async function handle(args: Record<string, unknown>, ctx: ToolContext): Promise<ToolResponse> {
  const parsed = parseArgs(Args, args);
  if (!parsed.ok) return parsed.response;

  try {
    const { context } = ctx.app;
    return jsonResponse({
      projectId: context.current(),
      recentContext: context.getRecentContext(parsed.value.maxChars),
      messages: context.getHistory(parsed.value.limit)
    });
  } catch (error) {
    return errorResponse(error);
  }
}
