/**
 * Configuration type definitions
 */

export const DEFAULT_BASE_URL = 'https://api.crustdata.com';

/**
 * Environment variables read at startup
 */
export const ENV_BASE_URL = 'CRUSTDATA_API_BASE_URL';
export const ENV_API_TOKEN = 'CRUSTDATA_API_TOKEN';

export interface AppConfig {
  /** API origin, no trailing slash */
  baseUrl: string;
  /** Token the live transport would send; only its presence is rendered */
  apiToken?: string;
}
