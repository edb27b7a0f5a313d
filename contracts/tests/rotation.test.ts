// contracts/tests/rotation.test.ts - Shared rotation policy and date helpers

import { describe, test, expect } from 'vitest';
import {
  ROTATION_POLICY,
  ValidationError,
  ageInDays,
  formatUtcSeconds,
  getDefaultNamePattern,
  getRotationDays,
  parseCreationDate,
  parseRotationDays,
} from '../src';

describe('getRotationDays', () => {
  test('defaults to 90', () => {
    expect(ROTATION_POLICY.DEFAULT_DAYS).toBe(90);
    expect(getRotationDays({})).toBe(90);
  });

  test('reads AMIWATCH_ROTATION_DAYS', () => {
    expect(getRotationDays({ AMIWATCH_ROTATION_DAYS: '30' })).toBe(30);
  });

  test('rejects a non-integer value', () => {
    expect(() => getRotationDays({ AMIWATCH_ROTATION_DAYS: 'ninety' })).toThrow(ValidationError);
  });
});

describe('parseRotationDays', () => {
  test('accepts zero', () => {
    expect(parseRotationDays('0')).toBe(0);
  });

  test('rejects negative and fractional values', () => {
    expect(() => parseRotationDays('-1')).toThrow('Invalid rotation days: "-1"');
    expect(() => parseRotationDays('1.5')).toThrow(ValidationError);
  });
});

describe('getDefaultNamePattern', () => {
  test('falls back to the built-in glob', () => {
    expect(getDefaultNamePattern({})).toBe('*company-abc*');
    expect(getDefaultNamePattern({ AMIWATCH_NAME_PATTERN: 'base-*' })).toBe('base-*');
  });
});

describe('date helpers', () => {
  test('parseCreationDate handles Z timestamps and bad input', () => {
    expect(parseCreationDate('2025-05-01T06:30:00.000Z')?.getTime()).toBe(Date.UTC(2025, 4, 1, 6, 30));
    expect(parseCreationDate('not-a-date')).toBeNull();
    expect(parseCreationDate(undefined)).toBeNull();
  });

  test('ageInDays floors and is stable for a fixed clock', () => {
    const created = new Date('2025-05-01T06:30:00.000Z');
    const now = new Date('2025-06-01T00:00:00.000Z');
    expect(ageInDays(created, now)).toBe(30);
    expect(ageInDays(created, now)).toBe(ageInDays(created, now));
    expect(ageInDays(new Date('2025-02-01T00:00:00.000Z'), now)).toBe(120);
  });

  test('formatUtcSeconds drops milliseconds and zone', () => {
    expect(formatUtcSeconds(new Date('2025-05-30T08:15:30.250Z'))).toBe('2025-05-30 08:15:30');
  });
});
