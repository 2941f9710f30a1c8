import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';

import { TRAINING_STATUSES } from '../types/index.js';
import { errorResponse, jsonResponse, parseArgs, type ToolContext, type ToolResponse } from './types.js';

const Args = z.object({
  status: z.enum(TRAINING_STATUSES).optional()
});

export const definition: Tool = {
  name: 'list_projects',
  description: 'List registered projects, optionally filtered by training status. Marks the active project.',
  inputSchema: {
    type: 'object',
    properties: {
      status: {
        type: 'string',
        enum: [...TRAINING_STATUSES],
        description: 'Only projects with this training status'
      }
    }
  }
};

export async function handle(args: Record<string, unknown>, ctx: ToolContext): Promise<ToolResponse> {
  const parsed = parseArgs(Args, args);
  if (!parsed.ok) return parsed.response;

  try {
    const { registry, orchestrator } = ctx.app;
    const projects = parsed.value.status
      ? await registry.listByStatus(parsed.value.status)
      : await registry.list();
    const activeProjectId = orchestrator.currentProjectId();

    return jsonResponse({
      activeProjectId,
      totalProjects: projects.length,
      projects: projects.map((project) => ({ ...project, active: project.id === activeProjectId }))
    });
  } catch (error) {
    return errorResponse(error);
  }
}
