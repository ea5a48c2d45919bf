import { CatalogError } from '../core/errors.js';
import { HTTPError, HTTPNetworkError, HTTPTimeoutError } from '../core/http-client.js';

export const EXIT_CODES = {
  SUCCESS: 0,
  WARNINGS: 1,
  ERRORS: 2,
  CONFIG_ERROR: 3,
  NETWORK_ERROR: 4,
  DATA_INTEGRITY_ERROR: 5,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/**
 * Exit code for an error that aborted a command
 */
export function exitCodeFor(error: unknown): ExitCode {
  if (error instanceof CatalogError) {
    switch (error.kind) {
      case 'Config':
        return EXIT_CODES.CONFIG_ERROR;
      case 'SchemaMismatch':
      case 'DatetimeConflict':
        return EXIT_CODES.DATA_INTEGRITY_ERROR;
      default:
        return EXIT_CODES.ERRORS;
    }
  }
  if (
    error instanceof HTTPError ||
    error instanceof HTTPTimeoutError ||
    error instanceof HTTPNetworkError
  ) {
    return EXIT_CODES.NETWORK_ERROR;
  }
  return EXIT_CODES.ERRORS;
}
