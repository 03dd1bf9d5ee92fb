/**
 * Request Builder
 *
 * Turns a method, path, query parameters and JSON body into a frozen
 * RequestDescriptor. Query values are stringified; undefined entries are dropped.
 */

import type { HttpMethod, JsonValue, RequestDescriptor } from '../types/request.js';

export type QueryParamValue = string | number | boolean | undefined;

export interface BuildRequestOptions {
  method: HttpMethod;
  path: string;
  params?: Record<string, QueryParamValue>;
  jsonBody?: JsonValue;
}

/**
 * Build a request descriptor
 *
 * @example
 * buildRequest({ method: 'GET', path: '/screener/social_posts', params: { page: 2 } });
 * // => { method: 'GET', path: '/screener/social_posts', query: { page: '2' } }
 */
export function buildRequest(options: BuildRequestOptions): RequestDescriptor {
  const { method, path, params, jsonBody } = options;
  const query = normalizeQuery(params);

  return Object.freeze({
    method,
    path,
    ...(query ? { query } : {}),
    ...(jsonBody !== undefined ? { body: jsonBody } : {}),
  });
}

function normalizeQuery(
  params: Record<string, QueryParamValue> | undefined
): Readonly<Record<string, string>> | undefined {
  if (!params) {
    return undefined;
  }

  const query: Record<string, string> = {};
  for (const [key, value] of Object.entries(params)) {
    if (value === undefined) continue;
    query[key] = String(value);
  }

  return Object.keys(query).length > 0 ? Object.freeze(query) : undefined;
}
