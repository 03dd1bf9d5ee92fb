/**
 * Test Helpers Module
 *
 * Shared configuration and context factories for tool tests.
 */

import type { AppConfig } from '../../src/types/config.js';
import type { DryRunToolsContext } from '../../src/tools/types.js';

export const TEST_BASE_URL = 'https://api.example.test';

export const TEST_CONFIG: AppConfig = {
  baseUrl: TEST_BASE_URL,
};

export const AUTHENTICATED_TEST_CONFIG: AppConfig = {
  baseUrl: TEST_BASE_URL,
  apiToken: 'test-secret',
};

/**
 * Create a handler context around a fixed config
 */
export function createMockDryRunContext(config: AppConfig = TEST_CONFIG): DryRunToolsContext {
  return {
    getConfig: jest.fn(() => config),
  };
}

/**
 * n distinct example URLs
 */
export function exampleUrls(count: number, prefix = 'https://example.com/page-'): string[] {
  return Array.from({ length: count }, (_, i) => `${prefix}${i + 1}`);
}
