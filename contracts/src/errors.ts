// errors.ts - Error Types

import type { ErrorCategory } from './types';

// =============================================================================
// BASE ERROR CLASS
// =============================================================================

/** Base error class for all amiwatch errors */
export class AmiwatchError extends Error {
  readonly code: string;
  readonly category: ErrorCategory;
  readonly details?: Record<string, unknown>;

  constructor(
    code: string,
    message: string,
    category: ErrorCategory,
    options?: {
      details?: Record<string, unknown>;
      cause?: unknown;
    },
  ) {
    super(message, { cause: options?.cause });
    this.name = 'AmiwatchError';
    this.code = code;
    this.category = category;
    this.details = options?.details;
  }
}

/** Validation error (bad input) */
export class ValidationError extends AmiwatchError {
  constructor(
    message: string,
    options?: {
      code?: string;
      details?: Record<string, unknown>;
      cause?: unknown;
    },
  ) {
    super(options?.code ?? 'INVALID_INPUT', message, 'validation', options);
    this.name = 'ValidationError';
  }
}

/** Format any thrown value for a one-line diagnostic */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
