#!/usr/bin/env node
/**
 * crustdata-mcp - Crustdata people and web tools MCP Server
 *
 * Exposes enrichment, social posts, people search, web search and web fetch
 * tools. Every tool validates its input and returns the request it would
 * send instead of calling the API.
 */

import { parseArgs } from './cli/parser.js';
import { startServer } from './cli/main-entry.js';
import { cliLogger } from './utils/logger.js';

/**
 * Main entry point
 */
async function main(): Promise<void> {
  const options = parseArgs(process.argv.slice(2));
  const result = await startServer(options);

  if (!result.success) {
    cliLogger.fatal({ error: result.error }, 'Failed to start server');
    process.exit(1);
  }

  if (result.message !== undefined) {
    process.stdout.write(`${result.message}\n`);
    return;
  }

  const stop = result.stop;
  if (stop) {
    process.on('SIGINT', () => {
      cliLogger.info('Shutting down...');
      stop().then(
        () => process.exit(0),
        (error: unknown) => {
          cliLogger.error({ error }, 'Shutdown failed');
          process.exit(1);
        }
      );
    });
  }
}

main().catch((error: unknown) => {
  cliLogger.fatal({ error }, 'Failed to start server');
  process.exit(1);
});
