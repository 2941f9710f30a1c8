import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';

import { MESSAGE_ROLES } from '../managers/context-manager.js';
import { errorResponse, jsonResponse, parseArgs, type ToolContext, type ToolResponse } from './types.js';

const Args = z.object({
  role: z.enum(MESSAGE_ROLES),
  content: z.string().min(1)
});

export const definition: Tool = {
  name: 'add_message',
  description: "Append a message to the active project's conversation history.",
  inputSchema: {
    type: 'object',
    properties: {
      role: { type: 'string', enum: [...MESSAGE_ROLES] },
      content: { type: 'string' }
    },
    required: ['role', 'content']
  }
};

export async function handle(args: Record<string, unknown>, ctx: ToolContext): Promise<ToolResponse> {
  const parsed = parseArgs(Args, args);
  if (!parsed.ok) return parsed.response;

  try {
    const { context } = ctx.app;
    const projectId = context.current();
    const message = await context.addMessage(parsed.value.role, parsed.value.content);
    return jsonResponse({ status: 'added', projectId, message });
  } catch (error) {
    return errorResponse(error);
  }
}
