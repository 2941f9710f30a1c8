import type { Tool } from '@modelcontextprotocol/sdk/types.js';

import { errorResponse, jsonResponse, type ToolContext, type ToolResponse } from './types.js';

export const definition: Tool = {
  name: 'current_project',
  description: 'Show the active project and the load status of each of its resources.',
  inputSchema: {
    type: 'object',
    properties: {}
  }
};

export async function handle(_args: Record<string, unknown>, ctx: ToolContext): Promise<ToolResponse> {
  try {
    const { orchestrator, adapterLoader } = ctx.app;
    const snapshot = orchestrator.snapshot();
    const project = await orchestrator.currentProject();
    const adapter = adapterLoader.getActiveAdapter();

    return jsonResponse({
      projectId: snapshot.currentProjectId,
      project,
      managers: snapshot.managers,
      errors: snapshot.errors,
      adapter: adapter ? { path: adapter.path, metadata: adapter.metadata, files: adapter.files } : null,
      updatedAt: snapshot.updatedAt,
      ...(snapshot.currentProjectId ? {} : { hint: 'Use switch_project to activate a project.' })
    });
  } catch (error) {
    return errorResponse(error);
  }
}
