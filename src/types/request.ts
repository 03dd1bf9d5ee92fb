/**
 * Outbound request types
 */

export type HttpMethod = 'GET' | 'POST';

/**
 * Any value that survives a JSON round trip
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

/**
 * Normalized description of one outbound API call.
 * `query` and `body` are absent, never empty, when the call has none.
 */
export interface RequestDescriptor {
  readonly method: HttpMethod;
  readonly path: string;
  readonly query?: Readonly<Record<string, string>>;
  readonly body?: JsonValue;
}
