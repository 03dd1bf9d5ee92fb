/**
 * Dry-Run Tool Handlers
 *
 * validate -> build -> format, shared by every tool. Handlers hold no state;
 * concurrent calls never observe each other.
 */

import type { z } from 'zod';
import { formatDryRun } from '../client/dry-run-formatter.js';
import { mcpLogger } from '../utils/logger.js';
import { createErrorResponse, createTextResponse } from '../utils/mcp-response.js';
import { validateToolInput, type DryRunToolDefinition } from './shared/types.js';
import type { DryRunToolsContext, ToolResponse } from './types.js';

/**
 * Render the dry-run output for already validated input
 */
export function renderDryRun<TSchema extends z.AnyZodObject>(
  ctx: DryRunToolsContext,
  tool: DryRunToolDefinition<TSchema>,
  input: z.output<TSchema>
): string {
  const config = ctx.getConfig();
  const request = tool.buildRequest(input);

  mcpLogger.debug({ tool: tool.name, method: request.method, path: request.path }, 'Dry-run request built');

  return formatDryRun(request, {
    baseUrl: config.baseUrl,
    authenticated: config.apiToken !== undefined,
  });
}

/**
 * Handle a call to any dry-run tool
 *
 * Validation failures are returned as an error result carrying the
 * ValidationError message verbatim.
 */
export async function handleDryRunTool<TSchema extends z.AnyZodObject>(
  ctx: DryRunToolsContext,
  tool: DryRunToolDefinition<TSchema>,
  args: unknown
): Promise<ToolResponse> {
  const validation = validateToolInput(tool, args);

  if (!validation.success) {
    mcpLogger.warn({ tool: tool.name, issues: validation.error.issues }, 'Tool input rejected');
    return createErrorResponse(validation.error.message);
  }

  return createTextResponse(renderDryRun(ctx, tool, validation.data));
}
