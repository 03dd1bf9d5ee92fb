/**
 * Shared Tool Definitions
 *
 * Usage:
 *   import { webSearchTool, validateToolInput } from './tools/shared/index.js';
 *   const result = validateToolInput(webSearchTool, { query: 'vector databases' });
 *   if (result.success) {
 *     const request = webSearchTool.buildRequest(result.data);
 *   }
 */

// Types and utilities
export {
  type DryRunToolDefinition,
  type McpInputSchema,
  type ValidationResult,
  READ_ONLY_ANNOTATIONS,
  defineTool,
  toJsonSchema,
  validateToolInput,
} from './types.js';

export { JsonValueSchema } from './json-value.js';

// People tools
export {
  EnrichPersonInputSchema,
  GetSocialPostsInputSchema,
  PersonSearchFilterSchema,
  SearchPeopleInputSchema,
  type EnrichPersonInput,
  type GetSocialPostsInput,
  type PersonSearchFilter,
  type SearchPeopleInput,
  enrichPersonTool,
  getSocialPostsTool,
  searchPeopleTool,
  peopleTools,
} from './people-tools.js';

// Web tools
export {
  SEARCH_SOURCES,
  WebSearchInputSchema,
  WebFetchInputSchema,
  type SearchSource,
  type WebSearchInput,
  type WebFetchInput,
  webSearchTool,
  webFetchTool,
  webTools,
} from './web-tools.js';
