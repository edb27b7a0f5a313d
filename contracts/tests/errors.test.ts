// tests/errors.test.ts - Shared error types

import { describe, test, expect } from 'vitest';
import { AmiwatchError, ValidationError, describeError } from '../src/errors';

describe('ValidationError', () => {
  test('defaults to INVALID_INPUT in the validation category', () => {
    const error = new ValidationError('bad flag');
    expect(error).toBeInstanceOf(AmiwatchError);
    expect(error.name).toBe('ValidationError');
    expect(error.code).toBe('INVALID_INPUT');
    expect(error.category).toBe('validation');
    expect(error.details).toBeUndefined();
  });

  test('carries an explicit code, details and cause', () => {
    const cause = new Error('root');
    const error = new ValidationError('bad region', { code: 'INVALID_OPTION', details: { flag: '--region' }, cause });
    expect(error.code).toBe('INVALID_OPTION');
    expect(error.details).toEqual({ flag: '--region' });
    expect(error.cause).toBe(cause);
  });
});

describe('describeError', () => {
  test('uses the message of Error values and stringifies the rest', () => {
    expect(describeError(new Error('boom'))).toBe('boom');
    expect(describeError('plain')).toBe('plain');
    expect(describeError(42)).toBe('42');
  });
});
