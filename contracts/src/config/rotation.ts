// config/rotation.ts - Rotation policy shared by the audit and the lookup

import { ValidationError } from '../errors';

export const ROTATION_POLICY = {
  DEFAULT_DAYS: 90,
  ENV_KEY: 'AMIWATCH_ROTATION_DAYS',
} as const;

export const DEFAULT_NAME_PATTERN = '*company-abc*';
export const NAME_PATTERN_ENV_KEY = 'AMIWATCH_NAME_PATTERN';

/** Parse a rotation threshold: a non-negative whole number of days. */
export function parseRotationDays(value: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new ValidationError(`Invalid rotation days: "${value}" (expected a non-negative integer)`, {
      code: 'INVALID_ROTATION_DAYS',
      details: { value },
    });
  }
  return parseInt(value, 10);
}

/**
 * Resolve the rotation threshold.
 *
 * Resolution order:
 * 1. AMIWATCH_ROTATION_DAYS (includes ~/.amiwatch/cli.env, loaded at startup)
 * 2. Default: 90
 *
 * Read lazily so env files loaded after import still apply.
 */
export function getRotationDays(env: Record<string, string | undefined> = process.env): number {
  const value = env[ROTATION_POLICY.ENV_KEY];
  return value ? parseRotationDays(value) : ROTATION_POLICY.DEFAULT_DAYS;
}

export function getDefaultNamePattern(env: Record<string, string | undefined> = process.env): string {
  return env[NAME_PATTERN_ENV_KEY] || DEFAULT_NAME_PATTERN;
}
