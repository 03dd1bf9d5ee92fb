/**
 * Configuration validation schemas using Zod
 * Provides runtime type validation for server configuration
 */

import { z } from 'zod';
import { DEFAULT_BASE_URL } from '../types/config.js';

/**
 * Server configuration schema
 */
export const AppConfigSchema = z.object({
  baseUrl: z
    .string()
    .url()
    .transform((url) => url.replace(/\/+$/, ''))
    .default(DEFAULT_BASE_URL),
  apiToken: z.string().min(1).optional(),
});

/**
 * Validate server configuration
 * @param config - The raw configuration to validate
 * @returns Validation result with parsed data or error
 */
export function validateAppConfig(config: unknown): {
  success: boolean;
  data?: ValidatedAppConfig;
  error?: z.ZodError;
} {
  const result = AppConfigSchema.safeParse(config);

  if (result.success) {
    return {
      success: true,
      data: result.data,
    };
  }

  return {
    success: false,
    error: result.error,
  };
}

export type ValidatedAppConfig = z.infer<typeof AppConfigSchema>;
