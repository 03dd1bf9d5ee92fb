/**
 * CLI Parser for crustdata-mcp
 *
 * Parses command line arguments to determine the startup mode
 * and configuration overrides.
 */

import { SERVER_NAME, VERSION } from '../version.js';
import { ENV_API_TOKEN, ENV_BASE_URL, DEFAULT_BASE_URL } from '../types/config.js';

/**
 * CLI Options interface
 */
export interface CLIOptions {
  /** Show help message */
  help: boolean;
  /** Show version */
  version: boolean;
  /** Print the tool catalogue as JSON */
  listTools: boolean;
  /** API origin override */
  baseUrl?: string;
}

/**
 * Get the value of an argument that takes a parameter
 * @param args - Command line arguments
 * @param longFlag - Long flag (e.g., '--base-url')
 * @returns The value or undefined
 */
function getArgValue(args: string[], longFlag: string): string | undefined {
  const prefixed = args.find((arg) => arg.startsWith(`${longFlag}=`));
  if (prefixed) {
    return prefixed.slice(longFlag.length + 1);
  }

  const index = args.indexOf(longFlag);
  if (index !== -1 && index + 1 < args.length) {
    const value = args[index + 1];
    // Make sure it's not another flag
    if (!value.startsWith('-')) {
      return value;
    }
  }

  return undefined;
}

/**
 * Check if a boolean flag is present in the arguments
 */
function hasFlag(args: string[], longFlag: string, shortFlag?: string): boolean {
  return args.includes(longFlag) || (shortFlag ? args.includes(shortFlag) : false);
}

/**
 * Parse command line arguments
 * @param args - Command line arguments (without node and script path)
 * @returns Parsed CLI options
 */
export function parseArgs(args: string[]): CLIOptions {
  return {
    help: hasFlag(args, '--help', '-h'),
    version: hasFlag(args, '--version', '-v'),
    listTools: hasFlag(args, '--list-tools'),
    baseUrl: getArgValue(args, '--base-url'),
  };
}

/**
 * Generate help message
 */
export function getHelpMessage(): string {
  return `
${SERVER_NAME} - Crustdata people and web tools over MCP (dry-run)

Usage:
  ${SERVER_NAME} [options]

Options:
  --base-url <url>       API origin shown in rendered requests (default: ${DEFAULT_BASE_URL})
  --list-tools           Print the tool catalogue as JSON and exit
  --help, -h             Show this help message
  --version, -v          Show version

Environment Variables:
  ${ENV_BASE_URL}   API origin (overridden by --base-url)
  ${ENV_API_TOKEN}      API token; rendered only as a redacted header
  LOG_LEVEL                trace, debug, info, warn, error, fatal or silent (default: info)
`.trim();
}

/**
 * Get version string
 */
export function getVersion(): string {
  return VERSION;
}
