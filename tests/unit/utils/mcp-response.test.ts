/**
 * MCP Response Utilities Tests
 */

import { createErrorResponse, createTextResponse } from '../../../src/utils/mcp-response.js';

describe('MCP Response Utilities', () => {
  describe('createTextResponse', () => {
    it('should wrap text in a single content item', () => {
      expect(createTextResponse('hello\nworld')).toEqual({
        content: [{ type: 'text', text: 'hello\nworld' }],
      });
    });

    it('should not set the error flag', () => {
      expect(createTextResponse('ok').isError).toBeUndefined();
    });
  });

  describe('createErrorResponse', () => {
    it('should flag the result as an error and keep the message', () => {
      expect(createErrorResponse('Invalid input for x: y: Required')).toEqual({
        content: [{ type: 'text', text: 'Invalid input for x: y: Required' }],
        isError: true,
      });
    });
  });
});
