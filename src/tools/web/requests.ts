/**
 * Web Request Builders
 *
 * Pure mappings from validated web-tool input to request descriptors.
 */

import { buildRequest } from '../../client/request-builder.js';
import type { JsonObject, RequestDescriptor } from '../../types/request.js';
import type { WebFetchInput, WebSearchInput } from '../shared/web-tools.js';

export const WEB_SEARCH_PATH = '/screener/web-search';
export const WEB_FETCH_PATH = '/screener/web-fetch';

/**
 * Request body for a web search. Optional fields appear only when supplied;
 * an empty source list or site counts as not supplied. Dates are renamed to
 * the API's camelCase.
 */
export function toWebSearchBody(input: WebSearchInput): JsonObject {
  const body: JsonObject = { query: input.query };

  if (input.geolocation !== undefined) {
    body.geolocation = input.geolocation;
  }
  if (input.sources !== undefined && input.sources.length > 0) {
    body.sources = [...input.sources];
  }
  if (input.site !== undefined && input.site !== '') {
    body.site = input.site;
  }
  if (input.start_date !== undefined) {
    body.startDate = input.start_date;
  }
  if (input.end_date !== undefined) {
    body.endDate = input.end_date;
  }

  return body;
}

/**
 * POST /screener/web-search[?fetch_content=true]
 */
export function buildWebSearchRequest(input: WebSearchInput): RequestDescriptor {
  return buildRequest({
    method: 'POST',
    path: WEB_SEARCH_PATH,
    params: input.fetch_content ? { fetch_content: 'true' } : undefined,
    jsonBody: toWebSearchBody(input),
  });
}

/**
 * POST /screener/web-fetch with { urls }
 */
export function buildWebFetchRequest(input: WebFetchInput): RequestDescriptor {
  return buildRequest({
    method: 'POST',
    path: WEB_FETCH_PATH,
    jsonBody: { urls: [...input.urls] },
  });
}
