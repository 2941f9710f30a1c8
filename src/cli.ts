/**
 * CLI subcommands for project-switchboard.
 * Every command maps onto an MCP tool, so the CLI and the server behave the same.
 */

import { loadSettings } from './config/settings.js';
import { createSwitchboard, type Switchboard } from './core/app.js';
import { formatJson } from './cli-formatters.js';
import { errorMessage } from './errors/index.js';
import { dispatchTool } from './tools/index.js';
import type { ToolContext } from './tools/index.js';

export const CLI_COMMANDS = [
  'projects',
  'add',
  'remove',
  'status',
  'switch',
  'scan',
  'index',
  'search',
  'health',
  'training'
] as const;

type CliCommand = (typeof CLI_COMMANDS)[number];

export function isCliCommand(value: string | undefined): value is CliCommand {
  return CLI_COMMANDS.some((command) => command === value);
}

// Commands that act on the active project need the previous process's selection back
const NEEDS_ACTIVE_PROJECT = new Set<CliCommand>(['projects', 'status', 'scan', 'index', 'search', 'health']);

function printUsage(): void {
  console.log('project-switchboard <command> [options]');
  console.log('');
  console.log('Commands:');
  console.log('  projects [--status <s>]                      List registered projects');
  console.log('  add --name <n> --path <p> [--language <l>]   Register a project');
  console.log('  remove --id <id>                             Remove a project and its artifacts');
  console.log('  status                                       Active project and resource status');
  console.log('  switch --id <id>                             Make a project active');
  console.log('  scan [--id <id>] [--source-only] [--timeout <ms>]  Discover project files');
  console.log('  index [--timeout <ms>]                       Rebuild the active project index');
  console.log('  search --query <q> [--limit <n>] [--lang <l>] [--path <prefix>]');
  console.log('  health                                       Health report');
  console.log('  training --id <id> --status <s>              Update training status');
  console.log('');
  console.log('Global flags:');
  console.log('  --json    Output raw JSON (default: human-readable)');
  console.log('  --help    Show this help');
  console.log('');
  console.log('Environment:');
  console.log('  SWITCHBOARD_DATA_DIR    Data directory (default: ~/.project-switchboard)');
  console.log('  EMBEDDING_PROVIDER      ollama | openai');
}

export function parseFlags(argv: string[]): Record<string, string | boolean> {
  const flags: Record<string, string | boolean> = {};
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (!arg || arg === '--json' || !arg.startsWith('--')) continue;
    const key = arg.slice(2);
    const next = argv[i + 1];
    if (next && !next.startsWith('--')) {
      flags[key] = next;
      i++;
    } else {
      flags[key] = true;
    }
  }
  return flags;
}

function stringFlag(flags: Record<string, string | boolean>, key: string): string | undefined {
  const value = flags[key];
  return typeof value === 'string' ? value : undefined;
}

function numberFlag(flags: Record<string, string | boolean>, key: string): number | undefined {
  const value = stringFlag(flags, key);
  return value === undefined ? undefined : Number(value);
}

function requireFlag(flags: Record<string, string | boolean>, key: string, usage: string): string {
  const value = stringFlag(flags, key);
  if (!value) {
    console.error(`Error: --${key} is required`);
    console.error(`Usage: project-switchboard ${usage}`);
    process.exit(1);
  }
  return value;
}

function extractText(result: { content?: Array<{ type: string; text: string }> }): string {
  return result.content?.[0]?.text ?? '';
}

function toolFor(
  command: CliCommand,
  flags: Record<string, string | boolean>
): { toolName: string; toolArgs: Record<string, unknown> } {
  switch (command) {
    case 'projects':
      return { toolName: 'list_projects', toolArgs: { ...(flags.status ? { status: flags.status } : {}) } };
    case 'add':
      return {
        toolName: 'register_project',
        toolArgs: {
          name: requireFlag(flags, 'name', 'add --name <n> --path <p>'),
          sourcePath: requireFlag(flags, 'path', 'add --name <n> --path <p>'),
          ...(stringFlag(flags, 'language') ? { language: stringFlag(flags, 'language') } : {})
        }
      };
    case 'status':
      return { toolName: 'current_project', toolArgs: {} };
    case 'switch':
      return { toolName: 'switch_project', toolArgs: { projectId: requireFlag(flags, 'id', 'switch --id <id>') } };
    case 'scan':
      return {
        toolName: 'scan_project',
        toolArgs: {
          ...(stringFlag(flags, 'id') ? { projectId: stringFlag(flags, 'id') } : {}),
          ...(flags['source-only'] ? { sourceOnly: true } : {}),
          ...(numberFlag(flags, 'timeout') !== undefined ? { timeoutMs: numberFlag(flags, 'timeout') } : {})
        }
      };
    case 'index':
      return {
        toolName: 'index_project',
        toolArgs: {
          ...(numberFlag(flags, 'timeout') !== undefined ? { timeoutMs: numberFlag(flags, 'timeout') } : {})
        }
      };
    case 'search':
      return {
        toolName: 'search_project',
        toolArgs: {
          query: requireFlag(flags, 'query', 'search --query <text> [--limit <n>]'),
          ...(numberFlag(flags, 'limit') !== undefined ? { limit: numberFlag(flags, 'limit') } : {}),
          ...(stringFlag(flags, 'lang') ? { language: stringFlag(flags, 'lang') } : {}),
          ...(stringFlag(flags, 'path') ? { pathPrefix: stringFlag(flags, 'path') } : {})
        }
      };
    case 'health':
      return { toolName: 'get_health', toolArgs: {} };
    case 'training':
      return {
        toolName: 'update_training_status',
        toolArgs: {
          projectId: requireFlag(flags, 'id', 'training --id <id> --status <s>'),
          status: requireFlag(flags, 'status', 'training --id <id> --status <s>')
        }
      };
    case 'remove':
      throw new Error('remove is handled without a tool');
  }
}

async function runRemove(app: Switchboard, flags: Record<string, string | boolean>, useJson: boolean): Promise<void> {
  const projectId = requireFlag(flags, 'id', 'remove --id <id>');
  const removed = await app.orchestrator.removeProject(projectId);
  if (useJson) {
    console.log(JSON.stringify({ status: 'removed', project: removed }, null, 2));
  } else {
    console.log(`Removed ${removed.name} (${removed.id})`);
  }
}

export async function handleCliCommand(argv: string[]): Promise<void> {
  const command = argv[0];

  if (!command || command === '--help') {
    printUsage();
    return;
  }

  if (!isCliCommand(command)) {
    console.error(`Unknown command: ${command}`);
    console.error('');
    printUsage();
    process.exit(1);
  }

  const useJson = argv.includes('--json');
  const flags = parseFlags(argv.slice(1));
  // Validate required flags before touching any state
  const tool = command === 'remove' ? null : toolFor(command, flags);

  let app: Switchboard;
  try {
    app = createSwitchboard(loadSettings());
  } catch (error) {
    console.error('Error:', errorMessage(error));
    process.exit(1);
  }

  try {
    if (NEEDS_ACTIVE_PROJECT.has(command)) {
      await app.orchestrator.restoreActiveProject();
    }

    if (!tool) {
      await runRemove(app, flags, useJson);
      return;
    }

    const ctx: ToolContext = { app };
    const result = await dispatchTool(tool.toolName, tool.toolArgs, ctx);
    if (result.isError) {
      console.error(extractText(result));
      process.exit(1);
    }
    formatJson(extractText(result), useJson, command);
  } catch (error) {
    console.error('Error:', errorMessage(error));
    process.exit(1);
  } finally {
    await app.shutdown();
  }
}
