/**
 * MCP Server setup
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import type { EventAgent } from '../agent/index.js';
import { registerTools } from './tools/index.js';

export interface ServerOptions {
  name?: string;
  version?: string;
}

export async function createServer(
  agent: EventAgent,
  options: ServerOptions = {}
): Promise<McpServer> {
  const server = new McpServer({
    name: options.name ?? 'event-scout',
    version: options.version ?? '1.0.0',
  });

  registerTools(server, agent);

  return server;
}

export async function startStdioServer(
  agent: EventAgent,
  options: ServerOptions = {}
): Promise<void> {
  const server = await createServer(agent, options);
  const transport = new StdioServerTransport();

  await server.connect(transport);

  const shutdown = (): void => {
    agent.close()
      .catch((error: unknown) => {
        console.error('Error closing rating store:', error instanceof Error ? error.message : error);
      })
      .finally(() => process.exit(0));
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

export { registerTools } from './tools/index.js';
