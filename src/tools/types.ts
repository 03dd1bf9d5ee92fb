/**
 * Tool Types
 *
 * Common type definitions for MCP tool handlers.
 */

import type { AppConfig } from '../types/config.js';

/**
 * MCP Tool Response content item
 */
export type ToolResponseContent = {
  type: 'text';
  text: string;
};

/**
 * MCP Tool Response
 *
 * Standard response format for all MCP tools. Declared as type aliases so
 * they stay assignable to the SDK's open CallToolResult shape.
 */
export type ToolResponse = {
  content: ToolResponseContent[];
  isError?: boolean;
};

/**
 * Context handed to tool handlers instead of global state
 */
export interface DryRunToolsContext {
  getConfig: () => AppConfig;
}
