#!/usr/bin/env node

/**
 * MCP Server for project-switchboard
 * Keeps one project active at a time and exposes switching, indexing, search and context tools
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';

import { handleCliCommand, isCliCommand } from './cli.js';
import { loadSettings } from './config/settings.js';
import { createSwitchboard, type Switchboard } from './core/app.js';
import { errorMessage } from './errors/index.js';
import { TOOLS, dispatchTool } from './tools/index.js';
import { createLogger } from './utils/logger.js';

const SERVER_NAME = 'project-switchboard';
const SERVER_VERSION = '0.1.0';

const logger = createLogger('server');

export function createServer(app: Switchboard): Server {
  const server = new Server(
    { name: SERVER_NAME, version: SERVER_VERSION },
    { capabilities: { tools: {} } }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return { tools: TOOLS };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    try {
      return await dispatchTool(name, args ?? {}, { app });
    } catch (error) {
      logger.error('Tool failed', { tool: name, error: errorMessage(error) });
      return {
        content: [{ type: 'text', text: JSON.stringify({ error: errorMessage(error), tool: name }, null, 2) }],
        isError: true
      };
    }
  });

  return server;
}

async function main(): Promise<void> {
  const settings = loadSettings();
  const app = createSwitchboard(settings);

  logger.info('Starting', { dataDir: settings.dataDir, embedding: settings.embedding.provider });

  const restored = await app.orchestrator.restoreActiveProject();
  if (restored) {
    logger.info('Restored active project', { projectId: restored.projectId, degraded: restored.degraded });
  }

  const server = createServer(app);
  const shutdown = async (): Promise<void> => {
    try {
      await app.shutdown();
      await server.close();
    } catch (error) {
      logger.error('Shutdown failed', { error: errorMessage(error) });
    }
    process.exit(0);
  };
  process.once('SIGINT', () => void shutdown());
  process.once('SIGTERM', () => void shutdown());

  const transport = new StdioServerTransport();
  await server.connect(transport);

  logger.info('Server ready', { tools: TOOLS.length });
}

// Export server components for programmatic use
export { main, TOOLS };

// Only auto-start when run directly (not when imported as module)
const isDirectRun =
  process.argv[1]?.replace(/\\/g, '/').endsWith('index.js') ||
  process.argv[1]?.replace(/\\/g, '/').endsWith('index.ts');

if (isDirectRun) {
  const command = process.argv[2];
  const run = isCliCommand(command) || command === '--help' ? handleCliCommand(process.argv.slice(2)) : main();
  run.catch((error: unknown) => {
    console.error('Fatal:', errorMessage(error));
    process.exit(1);
  });
}
