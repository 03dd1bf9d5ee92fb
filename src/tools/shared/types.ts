/**
 * Shared Tool Definition Types
 *
 * A tool bundles its MCP metadata, the zod schema for its input and the
 * function that turns validated input into a request descriptor.
 */

import type { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import type { ToolAnnotations } from '@modelcontextprotocol/sdk/types.js';
import type { RequestDescriptor } from '../../types/request.js';
import { ValidationError } from '../../types/errors.js';

/**
 * Annotations shared by every dry-run tool: nothing is written, calls can be
 * repeated, and the remote API is an open world.
 */
export const READ_ONLY_ANNOTATIONS = {
  readOnlyHint: true,
  destructiveHint: false,
  idempotentHint: true,
  openWorldHint: true,
} as const;

/**
 * Tool definition
 */
export interface DryRunToolDefinition<TSchema extends z.AnyZodObject = z.AnyZodObject> {
  /** Unique tool name */
  name: string;
  /** Short display title */
  title: string;
  /** Human-readable description */
  description: string;
  /** Zod schema for input validation */
  schema: TSchema;
  annotations: ToolAnnotations;
  /** Map validated input to the request the live transport would send */
  buildRequest(input: z.output<TSchema>): RequestDescriptor;
}

export type ValidationResult<T> =
  | { success: true; data: T }
  | { success: false; error: ValidationError };

/**
 * JSON Schema of a tool input
 */
export type McpInputSchema = {
  type: 'object';
  properties: Record<string, object>;
  required?: string[];
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Convert a Zod schema to JSON Schema
 */
export function toJsonSchema(schema: z.ZodTypeAny): McpInputSchema {
  const jsonSchema = zodToJsonSchema(schema, { target: 'jsonSchema7' }) as Record<string, unknown>;

  const { properties, required } = jsonSchema;
  return {
    type: 'object',
    properties: isRecord(properties)
      ? Object.fromEntries(
          Object.entries(properties).filter(
            (entry): entry is [string, object] => typeof entry[1] === 'object' && entry[1] !== null
          )
        )
      : {},
    required: Array.isArray(required)
      ? required.filter((key): key is string => typeof key === 'string')
      : undefined,
  };
}

/**
 * Create a tool definition
 */
export function defineTool<TSchema extends z.AnyZodObject>(
  definition: Omit<DryRunToolDefinition<TSchema>, 'annotations'>
): DryRunToolDefinition<TSchema> {
  return {
    ...definition,
    annotations: { title: definition.title, ...READ_ONLY_ANNOTATIONS },
  };
}

/**
 * Validate raw input against a tool's schema
 *
 * Applies trimming and defaults; never coerces types.
 */
export function validateToolInput<TSchema extends z.AnyZodObject>(
  tool: DryRunToolDefinition<TSchema>,
  raw: unknown
): ValidationResult<z.output<TSchema>> {
  const result = tool.schema.safeParse(raw);

  if (result.success) {
    return { success: true, data: result.data };
  }

  return { success: false, error: ValidationError.fromZodError(tool.name, result.error) };
}
