/**
 * Error type definitions
 */

import type { ZodError } from 'zod';

export enum ErrorType {
  CONFIG_ERROR = 'CONFIG_ERROR',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  UNKNOWN_TOOL = 'UNKNOWN_TOOL',
}

export interface CrustdataError {
  type: ErrorType;
  code: string;
  message: string;
  details?: unknown;
  recoverable: boolean;
  suggestions?: string[];
}

export class CrustdataErrorImpl extends Error implements CrustdataError {
  type: ErrorType;
  code: string;
  recoverable: boolean;
  details?: unknown;
  suggestions?: string[];

  constructor(
    type: ErrorType,
    code: string,
    message: string,
    options?: {
      details?: unknown;
      recoverable?: boolean;
      suggestions?: string[];
    }
  ) {
    super(message);
    this.name = 'CrustdataError';
    this.type = type;
    this.code = code;
    this.recoverable = options?.recoverable ?? true;
    this.details = options?.details;
    this.suggestions = options?.suggestions;
  }

  toJSON(): CrustdataError {
    return {
      type: this.type,
      code: this.code,
      message: this.message,
      details: this.details,
      recoverable: this.recoverable,
      suggestions: this.suggestions,
    };
  }
}

/**
 * A single violated field constraint
 */
export interface ValidationIssue {
  /** Dotted field path, e.g. `filters.0.type`; empty for the root */
  path: string;
  code: string;
  message: string;
}

/**
 * Raised when tool input does not satisfy its schema.
 * Carries every violated constraint, never a partial result.
 */
export class ValidationError extends CrustdataErrorImpl {
  readonly toolName: string;
  readonly issues: ValidationIssue[];

  constructor(toolName: string, issues: ValidationIssue[]) {
    super(
      ErrorType.VALIDATION_ERROR,
      'INVALID_INPUT',
      `Invalid input for ${toolName}: ${issues.map(formatIssue).join('; ')}`,
      {
        details: issues,
        recoverable: true,
        suggestions: ['Fix the listed fields and call the tool again'],
      }
    );
    this.name = 'ValidationError';
    this.toolName = toolName;
    this.issues = issues;
  }

  static fromZodError(toolName: string, error: ZodError): ValidationError {
    return new ValidationError(
      toolName,
      error.issues.map((issue) => ({
        path: issue.path.join('.'),
        code: issue.code,
        message: issue.message,
      }))
    );
  }
}

function formatIssue(issue: ValidationIssue): string {
  return `${issue.path || '(root)'}: ${issue.message}`;
}

/**
 * Extracts error message from unknown error type
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  return 'Unknown error';
}
