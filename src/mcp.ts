/**
 * Task bridge MCP server (stdio transport)
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import { loadConfig } from './config/index.js';
import { createTaskStore } from './storage/index.js';
import { createServiceContext } from './commands/context.js';
import { ServiceContext } from './commands/types.js';
import { GeneratedToolHandlers, tools } from './tools/generated.js';
import { logger } from './utils/logger.js';

export const SERVER_NAME = 'task-bridge';
export const SERVER_VERSION = '0.1.0';

/**
 * Build the MCP server for a service context; the caller picks the transport
 */
export function createMCPServer(context: ServiceContext): Server {
  const toolHandlers = new GeneratedToolHandlers(context);

  const server = new Server(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return {
      tools
    };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    return toolHandlers.handleToolCall(request);
  });

  return server;
}

export async function runMCPServer(): Promise<void> {
  const config = loadConfig();
  logger.configure({ ...config.logging, stderrOnly: true });
  logger.info('Starting MCP server', { homeDir: config.storage.homeDir });

  const store = createTaskStore(config);
  await store.initialize();

  const server = createMCPServer(createServiceContext(config, store));
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info('MCP server is running', { toolCount: tools.length });

  process.on('SIGINT', () => {
    logger.info('Shutting down MCP server');
    store.close().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error('Failed to close task store', {}, error instanceof Error ? error : undefined);
        process.exit(1);
      }
    );
  });
}
