/**
 * Tool Registry
 *
 * The catalogue of dry-run tools and the tools/list and tools/call handlers
 * that serve it.
 */

import type { Server } from '@modelcontextprotocol/sdk/server/index.js';
import {
  CallToolRequestSchema,
  ErrorCode,
  ListToolsRequestSchema,
  McpError,
  type ToolAnnotations,
} from '@modelcontextprotocol/sdk/types.js';
import { CrustdataErrorImpl, ErrorType, getErrorMessage } from '../types/errors.js';
import { mcpLogger } from '../utils/logger.js';
import { handleDryRunTool } from './handlers.js';
import {
  peopleTools,
  toJsonSchema,
  webTools,
  type DryRunToolDefinition,
  type McpInputSchema,
} from './shared/index.js';
import type { DryRunToolsContext } from './types.js';

/**
 * Every tool, in registration order
 */
export const dryRunTools: readonly DryRunToolDefinition[] = [...peopleTools, ...webTools];

/**
 * Machine-readable description of one tool
 */
export type ToolDescription = {
  name: string;
  title: string;
  description: string;
  inputSchema: McpInputSchema;
  annotations: ToolAnnotations;
};

/**
 * Look up a tool by name
 * Throws UNKNOWN_TOOL if no tool has that name
 */
export function getTool(name: string): DryRunToolDefinition {
  const tool = dryRunTools.find((candidate) => candidate.name === name);
  if (!tool) {
    throw new CrustdataErrorImpl(ErrorType.UNKNOWN_TOOL, 'TOOL_NOT_FOUND', `Unknown tool: ${name}`, {
      recoverable: false,
      suggestions: [`Available tools: ${dryRunTools.map((t) => t.name).join(', ')}`],
    });
  }
  return tool;
}

/**
 * Describe every tool with its JSON Schema input
 */
export function describeTools(): ToolDescription[] {
  return dryRunTools.map((tool) => ({
    name: tool.name,
    title: tool.title,
    description: tool.description,
    inputSchema: toJsonSchema(tool.schema),
    annotations: tool.annotations,
  }));
}

/**
 * Serve the tool catalogue on the server
 *
 * Arguments are validated by the tool handler, so invalid input comes back
 * as an error result carrying the validation message.
 */
export function registerDryRunTools(server: Server, ctx: DryRunToolsContext): void {
  server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools: describeTools() }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;

    let tool: DryRunToolDefinition;
    try {
      tool = getTool(name);
    } catch (error) {
      mcpLogger.warn({ tool: name }, 'Unknown tool requested');
      throw new McpError(ErrorCode.InvalidParams, getErrorMessage(error));
    }

    return handleDryRunTool(ctx, tool, args ?? {});
  });

  mcpLogger.info({ count: dryRunTools.length }, 'Registered dry-run tools');
}
