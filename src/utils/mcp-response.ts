/**
 * MCP Tool Response Utilities
 *
 * Provides standardized response formatting for MCP tools.
 */

import type { ToolResponse } from '../tools/types.js';

/**
 * Creates a plain-text MCP tool response
 *
 * @example
 * return createTextResponse(formatDryRun(request, options));
 */
export function createTextResponse(text: string): ToolResponse {
  return {
    content: [
      {
        type: 'text',
        text,
      },
    ],
  };
}

/**
 * Creates an error response for MCP tools
 *
 * The message is passed through unchanged so callers see exactly
 * which constraint failed.
 *
 * @example
 * return createErrorResponse(error.message);
 */
export function createErrorResponse(message: string): ToolResponse {
  return {
    ...createTextResponse(message),
    isError: true,
  };
}
