import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';

import { errorResponse, jsonResponse, parseArgs, type ToolContext, type ToolResponse } from './types.js';

const Args = z.object({
  name: z.string().min(1),
  sourcePath: z.string().min(1),
  language: z.string().min(1).optional()
});

export const definition: Tool = {
  name: 'register_project',
  description:
    'Register a codebase as a project. The project starts with training status "pending". ' +
    'Names must be unique (case-insensitive); the source path must exist.',
  inputSchema: {
    type: 'object',
    properties: {
      name: { type: 'string', description: 'Display name for the project' },
      sourcePath: { type: 'string', description: 'Path to the project source directory' },
      language: { type: 'string', description: 'Primary language, if known' }
    },
    required: ['name', 'sourcePath']
  }
};

export async function handle(args: Record<string, unknown>, ctx: ToolContext): Promise<ToolResponse> {
  const parsed = parseArgs(Args, args);
  if (!parsed.ok) return parsed.response;

  try {
    const { name, sourcePath, language } = parsed.value;
    const project = await ctx.app.registry.register(name, sourcePath, language);
    return jsonResponse({ status: 'registered', project });
  } catch (error) {
    return errorResponse(error);
  }
}
