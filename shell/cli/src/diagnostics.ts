// diagnostics.ts - Error reporting shared by the commands
//
// Diagnostics go to stderr in text mode; with --json they become the error
// envelope on stdout. Callers pick the exit code.

import { EXIT_CODES, ValidationError, type ExitCode } from '@amiwatch/contracts';
import type { ProviderOperationError } from '@amiwatch/inventory';
import { getOutputMode } from './config';
import { emitError } from './output/program';

export function reportProviderError(context: string, error: ProviderOperationError, data?: unknown): void {
  const message = `${context}: ${error.message}`;
  if (getOutputMode() === 'json') {
    emitError(message, { code: error.code, data });
  } else {
    console.error(message);
  }
}

/**
 * Report bad command-line input and return the usage exit code.
 * Anything other than a ValidationError is rethrown.
 */
export function reportUsageError(error: unknown, usage: string): ExitCode {
  if (!(error instanceof ValidationError)) throw error;
  if (getOutputMode() === 'json') {
    emitError(error.message, { code: error.code });
  } else {
    console.error(error.message);
    console.error(usage);
  }
  return EXIT_CODES.USAGE;
}
