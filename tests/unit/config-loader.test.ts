/**
 * Config Loader Unit Tests
 */

import { ConfigLoader } from '../../src/config/loader.js';
import { validateAppConfig } from '../../src/config/validation.js';
import { DEFAULT_BASE_URL } from '../../src/types/config.js';
import { CrustdataErrorImpl, ErrorType } from '../../src/types/errors.js';

describe('ConfigLoader', () => {
  describe('load', () => {
    it('should use the default base URL when nothing is set', () => {
      expect(ConfigLoader.load({ env: {} })).toEqual({ baseUrl: DEFAULT_BASE_URL });
    });

    it('should read base URL and token from the environment', () => {
      const config = ConfigLoader.load({
        env: {
          CRUSTDATA_API_BASE_URL: 'https://proxy.example.test',
          CRUSTDATA_API_TOKEN: 'test-secret',
        },
      });

      expect(config).toEqual({ baseUrl: 'https://proxy.example.test', apiToken: 'test-secret' });
    });

    it('should prefer the CLI override over the environment', () => {
      const config = ConfigLoader.load({
        env: { CRUSTDATA_API_BASE_URL: 'https://env.example.test' },
        overrides: { baseUrl: 'https://cli.example.test' },
      });

      expect(config.baseUrl).toBe('https://cli.example.test');
    });

    it('should strip trailing slashes', () => {
      const config = ConfigLoader.load({ env: { CRUSTDATA_API_BASE_URL: 'https://proxy.example.test/v1//' } });

      expect(config.baseUrl).toBe('https://proxy.example.test/v1');
    });

    it('should treat empty values as unset', () => {
      const config = ConfigLoader.load({
        env: { CRUSTDATA_API_BASE_URL: '', CRUSTDATA_API_TOKEN: '' },
      });

      expect(config).toEqual({ baseUrl: DEFAULT_BASE_URL });
    });

    it('should throw CONFIG_ERROR for an invalid URL', () => {
      let caught: unknown;
      try {
        ConfigLoader.load({ env: { CRUSTDATA_API_BASE_URL: 'not a url' } });
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(CrustdataErrorImpl);
      if (caught instanceof CrustdataErrorImpl) {
        expect(caught.type).toBe(ErrorType.CONFIG_ERROR);
        expect(caught.code).toBe('CONFIG_INVALID');
        expect(caught.message).toBe('Invalid configuration: baseUrl: Invalid url');
        expect(caught.recoverable).toBe(false);
      }
    });
  });

  describe('validateAppConfig', () => {
    it('should reject an empty token', () => {
      const result = validateAppConfig({ apiToken: '' });

      expect(result.success).toBe(false);
      expect(result.error?.issues[0].path).toEqual(['apiToken']);
    });
  });
});
