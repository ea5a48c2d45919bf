import { describe, it, expect } from 'vitest';
import { EXIT_CODES, exitCodeFor } from './exit-codes.js';
import {
  ConfigError,
  ConversionError,
  DatetimeConflictError,
  InvalidInputError,
  SchemaMismatchError,
} from '../core/errors.js';
import { HTTPError, HTTPNetworkError, HTTPTimeoutError } from '../core/http-client.js';

describe('exitCodeFor', () => {
  it('maps configuration errors', () => {
    expect(exitCodeFor(new ConfigError('bad'))).toBe(EXIT_CODES.CONFIG_ERROR);
  });

  it('maps catalog integrity errors', () => {
    expect(exitCodeFor(new SchemaMismatchError('missing', ['links'], []))).toBe(EXIT_CODES.DATA_INTEGRITY_ERROR);
    expect(exitCodeFor(new DatetimeConflictError('x', ['a', 'b']))).toBe(EXIT_CODES.DATA_INTEGRITY_ERROR);
  });

  it('maps network errors', () => {
    const url = 'https://archive.test/';
    expect(exitCodeFor(new HTTPError('HTTP 500', 500, url))).toBe(EXIT_CODES.NETWORK_ERROR);
    expect(exitCodeFor(new HTTPTimeoutError(url, 10))).toBe(EXIT_CODES.NETWORK_ERROR);
    expect(exitCodeFor(new HTTPNetworkError(url, new Error('refused')))).toBe(EXIT_CODES.NETWORK_ERROR);
  });

  it('maps everything else to a general error', () => {
    expect(exitCodeFor(new InvalidInputError('empty'))).toBe(EXIT_CODES.ERRORS);
    expect(exitCodeFor(new ConversionError('broken', 'a.shp'))).toBe(EXIT_CODES.ERRORS);
    expect(exitCodeFor('string')).toBe(EXIT_CODES.ERRORS);
  });
});
