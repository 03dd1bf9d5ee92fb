/**
 * Configuration loader
 * Resolves server configuration from environment variables and CLI overrides
 */

import type { AppConfig } from '../types/config.js';
import { ENV_API_TOKEN, ENV_BASE_URL } from '../types/config.js';
import { CrustdataErrorImpl, ErrorType } from '../types/errors.js';
import { configLogger } from '../utils/logger.js';
import { validateAppConfig } from './validation.js';

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  /** Values from CLI flags; these win over the environment */
  overrides?: Partial<AppConfig>;
}

function nonEmpty(value: string | undefined): string | undefined {
  return value && value.length > 0 ? value : undefined;
}

export class ConfigLoader {
  /**
   * Load and validate the configuration
   * Throws CONFIG_ERROR if a value is invalid
   */
  static load(options: LoadConfigOptions = {}): AppConfig {
    const env = options.env ?? process.env;
    const overrides = options.overrides ?? {};

    const raw = {
      baseUrl: nonEmpty(overrides.baseUrl) ?? nonEmpty(env[ENV_BASE_URL]),
      apiToken: nonEmpty(overrides.apiToken) ?? nonEmpty(env[ENV_API_TOKEN]),
    };

    const validation = validateAppConfig(raw);
    if (!validation.success || !validation.data) {
      const message = validation.error?.issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ');
      throw new CrustdataErrorImpl(
        ErrorType.CONFIG_ERROR,
        'CONFIG_INVALID',
        `Invalid configuration: ${message ?? 'unknown error'}`,
        {
          recoverable: false,
          suggestions: [`Check ${ENV_BASE_URL} or --base-url`],
        }
      );
    }

    configLogger.debug(
      { baseUrl: validation.data.baseUrl, authenticated: validation.data.apiToken !== undefined },
      'Configuration loaded'
    );

    return validation.data;
  }
}
