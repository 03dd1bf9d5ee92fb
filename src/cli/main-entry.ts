/**
 * Main Entry Point for crustdata-mcp
 *
 * Handles startup based on CLI options.
 */

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { ConfigLoader } from '../config/loader.js';
import { createServer } from '../server.js';
import { describeTools } from '../tools/registry.js';
import { getErrorMessage } from '../types/errors.js';
import { cliLogger } from '../utils/logger.js';
import { SERVER_NAME, VERSION } from '../version.js';
import { type CLIOptions, getHelpMessage, getVersion } from './parser.js';

/**
 * Server mode type
 */
export type ServerMode = 'stdio' | 'help' | 'version' | 'list-tools';

/**
 * Server start result
 */
export interface ServerStartResult {
  /** Server mode */
  mode: ServerMode;
  /** Whether startup was successful */
  success: boolean;
  /** Error message if failed */
  error?: string;
  /** Output for help, version and list-tools modes */
  message?: string;
  /** Close the stdio server */
  stop?: () => Promise<void>;
}

export interface StartServerOptions {
  env?: NodeJS.ProcessEnv;
}

/**
 * Start the server based on CLI options
 * @param options - Parsed CLI options
 * @returns Server start result
 */
export async function startServer(
  options: CLIOptions,
  startOptions: StartServerOptions = {}
): Promise<ServerStartResult> {
  if (options.help) {
    return { mode: 'help', success: true, message: getHelpMessage() };
  }

  if (options.version) {
    return { mode: 'version', success: true, message: getVersion() };
  }

  if (options.listTools) {
    return { mode: 'list-tools', success: true, message: JSON.stringify(describeTools(), null, 2) };
  }

  try {
    const config = ConfigLoader.load({
      env: startOptions.env,
      overrides: { baseUrl: options.baseUrl },
    });
    const server = createServer(config);
    const transport = new StdioServerTransport();
    await server.connect(transport);

    cliLogger.info({ baseUrl: config.baseUrl }, `${SERVER_NAME} v${VERSION} started in Stdio mode`);

    return {
      mode: 'stdio',
      success: true,
      stop: async () => {
        await server.close();
      },
    };
  } catch (error) {
    return {
      mode: 'stdio',
      success: false,
      error: getErrorMessage(error),
    };
  }
}
