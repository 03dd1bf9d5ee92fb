/**
 * Logger Utility
 * Provides structured logging with pino
 *
 * stdout carries the MCP stdio protocol, so every logger writes to stderr.
 */

import pino from 'pino';

/**
 * Log level type
 */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Get log level from environment variable
 */
export function getLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const level = env.LOG_LEVEL?.toLowerCase();
  if (level && isLogLevel(level)) {
    return level;
  }
  return 'info';
}

/**
 * Check if running in development mode
 */
function isDevelopment(env: NodeJS.ProcessEnv = process.env): boolean {
  return env.NODE_ENV === 'development';
}

/**
 * Create pino transport options for pretty printing in development
 */
export function getTransport(env: NodeJS.ProcessEnv = process.env): pino.TransportSingleOptions | undefined {
  if (isDevelopment(env)) {
    return {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
        destination: 2,
      },
    };
  }
  return undefined;
}

function createRootLogger(): pino.Logger {
  const transport = getTransport();
  if (transport) {
    return pino({ level: getLogLevel(), transport });
  }
  return pino({ level: getLogLevel() }, pino.destination(2));
}

/**
 * Default logger instance
 * Uses pino-pretty in development, JSON in production
 */
export const logger = createRootLogger();

/**
 * Create a child logger with a specific component name
 * @param component - Component name for log context
 */
export function createLogger(component: string): pino.Logger {
  return logger.child({ component });
}

/**
 * Pre-configured loggers for common components
 */
export const mcpLogger = createLogger('mcp');
export const cliLogger = createLogger('cli');
export const configLogger = createLogger('config');
