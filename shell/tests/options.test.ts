// shell/tests/options.test.ts
//
// Flag parsing and schema validation for check/latest.

import { describe, test, expect } from 'vitest';
import { ValidationError } from '@amiwatch/contracts';
import { parseCheckOptions, parseFlags, parseLatestOptions } from '../cli/src/options';

function validationCode(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    if (err instanceof ValidationError) return err.code;
    throw err;
  }
  return undefined;
}

describe('parseFlags', () => {
  test('accepts --flag value and --flag=value', () => {
    const flags = parseFlags(['--region', 'us-east-1', '--owner=self', '--strict'], {
      values: ['--region', '--owner'],
      switches: ['--strict'],
    });
    expect(flags.values.get('--region')).toBe('us-east-1');
    expect(flags.values.get('--owner')).toBe('self');
    expect(flags.switches.has('--strict')).toBe(true);
  });

  test('keeps = inside a value', () => {
    const flags = parseFlags(['--name-pattern=a=b*'], { values: ['--name-pattern'] });
    expect(flags.values.get('--name-pattern')).toBe('a=b*');
  });

  test('rejects unknown flags, stray arguments and missing values', () => {
    const accepted = { values: ['--region'], switches: ['--strict'] };
    expect(validationCode(() => parseFlags(['--regoin', 'x'], accepted))).toBe('UNKNOWN_FLAG');
    expect(validationCode(() => parseFlags(['extra'], accepted))).toBe('UNEXPECTED_ARGUMENT');
    expect(validationCode(() => parseFlags(['--region'], accepted))).toBe('MISSING_VALUE');
    expect(validationCode(() => parseFlags(['--region', '--strict'], accepted))).toBe('MISSING_VALUE');
    expect(validationCode(() => parseFlags(['--strict=yes'], accepted))).toBe('UNEXPECTED_VALUE');
  });
});

describe('parseCheckOptions', () => {
  test('region plus defaults', () => {
    expect(parseCheckOptions(['--region', 'us-east-1'], {})).toEqual({
      region: 'us-east-1',
      rotationDays: 90,
      strict: false,
    });
  });

  test('rotation days come from env unless the flag is given', () => {
    const env = { AMIWATCH_ROTATION_DAYS: '30' };
    expect(parseCheckOptions(['--region=eu-west-2'], env).rotationDays).toBe(30);
    expect(parseCheckOptions(['--region=eu-west-2', '--rotation-days', '7', '--strict'], env)).toEqual({
      region: 'eu-west-2',
      rotationDays: 7,
      strict: true,
    });
  });

  test('region is required', () => {
    expect(() => parseCheckOptions([], {})).toThrow('--region is required');
  });

  test('region must look like an AWS region', () => {
    let caught: unknown;
    try {
      parseCheckOptions(['--region', 'nowhere'], {});
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ValidationError);
    if (!(caught instanceof ValidationError)) return;
    expect(caught.code).toBe('INVALID_OPTION');
    expect(caught.details).toEqual({ flag: '--region', value: 'nowhere' });
    expect(caught.message.startsWith('Invalid --region: ')).toBe(true);
  });

  test('rotation days must be a non-negative integer', () => {
    expect(validationCode(() => parseCheckOptions(['--region', 'us-east-1', '--rotation-days', '-5'], {})))
      .toBe('INVALID_ROTATION_DAYS');
  });

  test('accepts GovCloud regions', () => {
    expect(parseCheckOptions(['--region', 'us-gov-west-1'], {}).region).toBe('us-gov-west-1');
  });

  test('accepts region prefixes longer than two letters', () => {
    expect(parseCheckOptions(['--region', 'eusc-de-east-1'], {}).region).toBe('eusc-de-east-1');
    expect(parseLatestOptions(['--region', 'eusc-de-east-1'], {}).region).toBe('eusc-de-east-1');
  });
});

describe('parseLatestOptions', () => {
  test('defaults owner to self and the name pattern to the built-in glob', () => {
    expect(parseLatestOptions(['--region', 'us-east-1'], {})).toEqual({
      region: 'us-east-1',
      namePattern: '*company-abc*',
      owner: 'self',
      rotationDays: 90,
    });
  });

  test('AMIWATCH_NAME_PATTERN replaces the default pattern', () => {
    expect(parseLatestOptions(['--region', 'us-east-1'], { AMIWATCH_NAME_PATTERN: 'golden-*' }).namePattern)
      .toBe('golden-*');
  });

  test('owner accepts aliases and 12-digit account ids', () => {
    expect(parseLatestOptions(['--region', 'us-east-1', '--owner', 'amazon'], {}).owner).toBe('amazon');
    expect(parseLatestOptions(['--region', 'us-east-1', '--owner', '123456789012'], {}).owner).toBe('123456789012');
  });

  test('rejects any other owner', () => {
    let caught: unknown;
    try {
      parseLatestOptions(['--region', 'us-east-1', '--owner', 'someone'], {});
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ValidationError);
    if (!(caught instanceof ValidationError)) return;
    expect(caught.details?.flag).toBe('--owner');
  });

  test('rejects --strict', () => {
    expect(validationCode(() => parseLatestOptions(['--region', 'us-east-1', '--strict'], {}))).toBe('UNKNOWN_FLAG');
  });
});
