/**
 * Dry-Run Handler Unit Tests
 *
 * Tests the shared validate -> build -> format handler using
 * dependency injection via Context objects.
 */

import { handleDryRunTool, renderDryRun } from '../../../src/tools/handlers.js';
import {
  enrichPersonTool,
  getSocialPostsTool,
  searchPeopleTool,
} from '../../../src/tools/shared/people-tools.js';
import { webFetchTool, webSearchTool } from '../../../src/tools/shared/web-tools.js';
import {
  AUTHENTICATED_TEST_CONFIG,
  createMockDryRunContext,
  TEST_CONFIG,
} from '../../helpers/index.js';

describe('Dry-Run Handlers', () => {
  describe('handleDryRunTool', () => {
    it('should return the rendered request as text', async () => {
      const ctx = createMockDryRunContext();

      const result = await handleDryRunTool(ctx, webSearchTool, {
        query: 'open source crm',
        fetch_content: true,
      });

      expect(result.isError).toBeUndefined();
      expect(result.content).toEqual([
        {
          type: 'text',
          text: [
            '[DRY RUN] Request not sent',
            'POST https://api.example.test/screener/web-search?fetch_content=true',
            'Headers:',
            '  Accept: application/json',
            '  Content-Type: application/json',
            'Body:',
            '{',
            '  "query": "open source crm"',
            '}',
          ].join('\n'),
        },
      ]);
      expect(ctx.getConfig).toHaveBeenCalledTimes(1);
    });

    it('should return the validation message verbatim as an error result', async () => {
      const ctx = createMockDryRunContext();

      const result = await handleDryRunTool(ctx, webFetchTool, {});

      expect(result).toEqual({
        content: [{ type: 'text', text: 'Invalid input for crustdata_web_fetch: urls: Required' }],
        isError: true,
      });
      expect(ctx.getConfig).not.toHaveBeenCalled();
    });

    it('should reject non-object input', async () => {
      const ctx = createMockDryRunContext();

      const result = await handleDryRunTool(ctx, enrichPersonTool, null);

      expect(result.isError).toBe(true);
      expect(result.content[0].text).toBe(
        'Invalid input for crustdata_enrich_person: (root): Expected object, received null'
      );
    });

    it('should apply the page default before building', async () => {
      const ctx = createMockDryRunContext();

      const result = await handleDryRunTool(ctx, getSocialPostsTool, {
        person_linkedin_url: 'https://www.linkedin.com/in/test-user/',
      });

      expect(result.content[0].text.split('\n')[1]).toBe(
        'GET https://api.example.test/screener/social_posts' +
          '?person_linkedin_url=https%3A%2F%2Fwww.linkedin.com%2Fin%2Ftest-user%2F&page=1'
      );
    });

    it('should give the same output for the same input', async () => {
      const ctx = createMockDryRunContext(AUTHENTICATED_TEST_CONFIG);
      const args = {
        filters: [
          { filter_type: 'CURRENT_COMPANY', type: 'in', value: ['Example Corp'] },
          { filter_type: 'SENIORITY_LEVEL', type: 'not in', value: ['Entry Level'] },
        ],
      };

      const [first, second] = await Promise.all([
        handleDryRunTool(ctx, searchPeopleTool, args),
        handleDryRunTool(ctx, searchPeopleTool, args),
      ]);

      expect(first).toEqual(second);
    });
  });

  describe('renderDryRun', () => {
    it('should render search filters in caller order', () => {
      const ctx = createMockDryRunContext(TEST_CONFIG);

      const output = renderDryRun(ctx, searchPeopleTool, {
        filters: [
          { filter_type: 'REGION', type: 'in', value: ['Europe'] },
          { filter_type: 'IN_THE_NEWS', type: 'in', value: null },
        ],
        page: 2,
      });

      const body = output.slice(output.indexOf('Body:\n') + 'Body:\n'.length);
      expect(JSON.parse(body)).toEqual({
        filters: [
          { filter_type: 'REGION', type: 'in', value: ['Europe'] },
          { filter_type: 'IN_THE_NEWS', type: 'in' },
        ],
        page: 2,
      });
    });

    it('should show the redacted token header when a token is configured', () => {
      const ctx = createMockDryRunContext(AUTHENTICATED_TEST_CONFIG);

      const output = renderDryRun(ctx, webFetchTool, { urls: ['https://example.com/'] });

      expect(output).toContain('\n  Authorization: Token [REDACTED]\n');
      expect(output).not.toContain('test-secret');
    });
  });
});
