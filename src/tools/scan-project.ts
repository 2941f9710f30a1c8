import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';

import { scanDirectory } from '../discovery/scanner.js';
import { NoActiveProjectError } from '../errors/index.js';
import { errorResponse, jsonResponse, parseArgs, type ToolContext, type ToolResponse } from './types.js';

const MAX_LISTED_FILES = 200;

const Args = z.object({
  projectId: z.string().min(1).optional(),
  sourceOnly: z.boolean().optional(),
  timeoutMs: z.number().int().optional()
});

export const definition: Tool = {
  name: 'scan_project',
  description:
    "Discover the files of a project's source tree (the active project by default) within a time limit. " +
    'Read-only: the recorded file count changes only when the project is indexed.',
  inputSchema: {
    type: 'object',
    properties: {
      projectId: { type: 'string', description: 'Defaults to the active project' },
      sourceOnly: { type: 'boolean', description: 'Only list source code files', default: false },
      timeoutMs: { type: 'number', description: 'Wall-clock limit for the scan' }
    }
  }
};

export async function handle(args: Record<string, unknown>, ctx: ToolContext): Promise<ToolResponse> {
  const parsed = parseArgs(Args, args);
  if (!parsed.ok) return parsed.response;

  try {
    const { app } = ctx;
    const projectId = parsed.value.projectId ?? app.orchestrator.currentProjectId();
    if (!projectId) throw new NoActiveProjectError('scan_project');

    const project = await app.registry.require(projectId);
    const progress: string[] = [];
    const result = await scanDirectory(project.sourcePath, {
      timeoutMs: parsed.value.timeoutMs ?? app.settings.discoveryTimeoutMs,
      sourceOnly: parsed.value.sourceOnly,
      progress: { onProgress: (message) => progress.push(message) }
    });

    const sourceFiles = result.files.filter((file) => file.isSource).length;

    return jsonResponse({
      projectId,
      rootPath: result.rootPath,
      totalFiles: result.files.length,
      sourceFiles,
      visited: result.visited,
      skipped: result.skipped,
      durationMs: result.durationMs,
      files: result.files.slice(0, MAX_LISTED_FILES).map((file) => ({
        path: file.relativePath,
        type: file.detectedType,
        language: file.language,
        size: file.size
      })),
      truncated: result.files.length > MAX_LISTED_FILES,
      progress
    });
  } catch (error) {
    return errorResponse(error);
  }
}
