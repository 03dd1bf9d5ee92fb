/**
 * Web Tool Definitions
 *
 * Web search and web page fetch.
 */

import { z } from 'zod';
import { defineTool } from './types.js';
import { buildWebFetchRequest, buildWebSearchRequest } from '../web/requests.js';

export const MAX_QUERY_LENGTH = 1000;
export const MAX_FETCH_URLS = 10;

export const SEARCH_SOURCES = [
  'news',
  'web',
  'scholar-articles',
  'scholar-articles-enriched',
  'scholar-author',
] as const;

export type SearchSource = (typeof SEARCH_SOURCES)[number];

export const WebSearchInputSchema = z.object({
  query: z
    .string()
    .trim()
    .min(1)
    .max(MAX_QUERY_LENGTH)
    .describe('Search query text (1-1000 characters)'),
  geolocation: z
    .string()
    .trim()
    .length(2)
    .optional()
    .describe("ISO 3166-1 alpha-2 country code, e.g. 'US', 'GB', 'DE'"),
  sources: z
    .array(z.enum(SEARCH_SOURCES))
    .optional()
    .describe("Sources to search: 'news', 'web', 'scholar-articles', 'scholar-articles-enriched', 'scholar-author'"),
  site: z
    .string()
    .trim()
    .optional()
    .describe("Restrict results to one domain, e.g. 'github.com'"),
  start_date: z
    .number()
    .int()
    .optional()
    .describe('Only results published after this unix timestamp (seconds)'),
  end_date: z
    .number()
    .int()
    .optional()
    .describe('Only results published before this unix timestamp (seconds)'),
  fetch_content: z
    .boolean()
    .default(false)
    .describe('Also fetch the full HTML of every result URL (default: false)'),
});

export const WebFetchInputSchema = z.object({
  urls: z
    .array(z.string().trim())
    .min(1)
    .max(MAX_FETCH_URLS)
    .describe('URLs to fetch, each starting with http:// or https:// (1-10)'),
});

export type WebSearchInput = z.output<typeof WebSearchInputSchema>;
export type WebFetchInput = z.output<typeof WebFetchInputSchema>;

/**
 * crustdata_web_search tool
 */
export const webSearchTool = defineTool({
  name: 'crustdata_web_search',
  title: 'Web Search',
  description:
    'Search the web through the Crustdata SERP API. Results carry titles, URLs, snippets and positions, ' +
    'typically 5-15 per search without pagination. Live rate limit: 15 requests per minute. ' +
    'Runs in dry-run mode and returns the request that would be sent.',
  schema: WebSearchInputSchema,
  buildRequest: buildWebSearchRequest,
});

/**
 * crustdata_web_fetch tool
 */
export const webFetchTool = defineTool({
  name: 'crustdata_web_fetch',
  title: 'Web Fetch',
  description:
    'Fetch the title and full HTML of up to 10 publicly accessible pages. ' +
    'URLs must start with http:// or https://. ' +
    'Runs in dry-run mode and returns the request that would be sent.',
  schema: WebFetchInputSchema,
  buildRequest: buildWebFetchRequest,
});

/**
 * All web-related tools
 */
export const webTools = [webSearchTool, webFetchTool] as const;
