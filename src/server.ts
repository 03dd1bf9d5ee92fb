/**
 * MCP server construction
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { registerDryRunTools } from './tools/registry.js';
import type { AppConfig } from './types/config.js';
import { SERVER_NAME, VERSION } from './version.js';

/**
 * Create an MCP server with every dry-run tool registered
 */
export function createServer(config: AppConfig): Server {
  const server = new Server(
    {
      name: SERVER_NAME,
      version: VERSION,
    },
    {
      capabilities: { tools: {} },
    }
  );

  registerDryRunTools(server, { getConfig: () => config });

  return server;
}
