/**
 * Dry-Run Formatter
 *
 * Renders a RequestDescriptor as the text a tool returns instead of
 * sending the request. Output depends only on the descriptor and options.
 */

import type { RequestDescriptor } from '../types/request.js';

export const DRY_RUN_BANNER = '[DRY RUN] Request not sent';

export interface DryRunFormatOptions {
  /** API origin without trailing slash, e.g. https://api.crustdata.com */
  baseUrl: string;
  /** Whether an API token is configured; the token itself is never printed */
  authenticated?: boolean;
}

/**
 * Build the full request URL, query parameters in insertion order
 */
export function formatRequestUrl(request: RequestDescriptor, baseUrl: string): string {
  const url = `${baseUrl}${request.path}`;
  if (!request.query) {
    return url;
  }
  return `${url}?${new URLSearchParams(request.query).toString()}`;
}

/**
 * Headers the live transport would send with this request
 */
export function formatHeaders(request: RequestDescriptor, authenticated: boolean): string[] {
  const headers = ['Accept: application/json'];
  if (authenticated) {
    headers.push('Authorization: Token [REDACTED]');
  }
  if (request.body !== undefined) {
    headers.push('Content-Type: application/json');
  }
  return headers;
}

/**
 * Render a request descriptor for dry-run display
 *
 * @example
 * formatDryRun(request, { baseUrl: 'https://api.crustdata.com' });
 * // [DRY RUN] Request not sent
 * // POST https://api.crustdata.com/screener/web-fetch
 * // Headers:
 * //   Accept: application/json
 * //   Content-Type: application/json
 * // Body:
 * // {
 * //   "urls": [ ... ]
 * // }
 */
export function formatDryRun(request: RequestDescriptor, options: DryRunFormatOptions): string {
  const lines = [
    DRY_RUN_BANNER,
    `${request.method} ${formatRequestUrl(request, options.baseUrl)}`,
    'Headers:',
    ...formatHeaders(request, options.authenticated ?? false).map((header) => `  ${header}`),
  ];

  if (request.body !== undefined) {
    lines.push('Body:', JSON.stringify(request.body, null, 2));
  }

  return lines.join('\n');
}
