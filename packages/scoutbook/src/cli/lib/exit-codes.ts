/**
 * CLI exit codes and the error -> exit code mapping
 */

import { isScoutbookError, UpstreamFetchError } from '../../core/errors.js';

export const EXIT_CODES = {
  SUCCESS: 0,
  UNEXPECTED: 1,
  ERRORS: 2,
  CONFIG_ERROR: 3,
  NETWORK_ERROR: 4,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export function exitCodeFor(error: unknown): ExitCode {
  if (error instanceof UpstreamFetchError) {
    return EXIT_CODES.NETWORK_ERROR;
  }
  if (isScoutbookError(error)) {
    return EXIT_CODES.ERRORS;
  }
  return EXIT_CODES.UNEXPECTED;
}

/**
 * One line for stderr
 */
export function describeError(error: unknown): string {
  if (isScoutbookError(error)) {
    return error.getSummary();
  }
  return error instanceof Error ? error.message : String(error);
}
