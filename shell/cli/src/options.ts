// options.ts - Flag parsing and TypeBox schemas for command options
//
// Flags are read by hand (`--flag value` or `--flag=value`), then the
// assembled options object is checked against a schema so every command sees
// validated, typed input.

import { Type, type Static, type TSchema } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import {
  ValidationError,
  getDefaultNamePattern,
  getRotationDays,
  parseRotationDays,
} from '@amiwatch/contracts';

// =============================================================================
// Schemas
// =============================================================================

const RegionSchema = Type.String({ pattern: '^[a-z]+(-[a-z]+)+-\\d+$' });
const RotationDaysSchema = Type.Integer({ minimum: 0 });

export const CheckOptionsSchema = Type.Object({
  region: RegionSchema,
  rotationDays: RotationDaysSchema,
  strict: Type.Boolean(),
});

export type CheckOptions = Static<typeof CheckOptionsSchema>;

export const LatestOptionsSchema = Type.Object({
  region: RegionSchema,
  namePattern: Type.String({ minLength: 1 }),
  owner: Type.Union([
    Type.Literal('self'),
    Type.Literal('amazon'),
    Type.Literal('aws-marketplace'),
    Type.String({ pattern: '^\\d{12}$' }),
  ]),
  rotationDays: RotationDaysSchema,
});

export type LatestOptions = Static<typeof LatestOptionsSchema>;

// Option property → flag name, for error messages
const FLAG_NAMES: Record<string, string> = {
  region: '--region',
  rotationDays: '--rotation-days',
  namePattern: '--name-pattern',
  owner: '--owner',
};

// =============================================================================
// Flag Parsing
// =============================================================================

export interface ParsedFlags {
  values: Map<string, string>;
  switches: Set<string>;
}

/**
 * Split argv into value flags and boolean switches.
 * Throws ValidationError on unknown flags, stray positionals and missing values.
 */
export function parseFlags(
  args: string[],
  accepted: { values: readonly string[]; switches?: readonly string[] },
): ParsedFlags {
  const values = new Map<string, string>();
  const switches = new Set<string>();

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? '';
    const eqIdx = arg.indexOf('=');
    const flag = arg.startsWith('--') && eqIdx !== -1 ? arg.slice(0, eqIdx) : arg;

    if (accepted.switches?.includes(flag)) {
      if (flag !== arg) {
        throw new ValidationError(`${flag} does not take a value`, { code: 'UNEXPECTED_VALUE', details: { flag } });
      }
      switches.add(flag);
      continue;
    }

    if (!accepted.values.includes(flag)) {
      if (!arg.startsWith('-')) {
        throw new ValidationError(`Unexpected argument: ${arg}`, { code: 'UNEXPECTED_ARGUMENT', details: { arg } });
      }
      throw new ValidationError(`Unknown flag: ${flag}`, { code: 'UNKNOWN_FLAG', details: { flag } });
    }

    let value: string | undefined;
    if (flag !== arg) {
      value = arg.slice(eqIdx + 1);
    } else {
      value = args[i + 1];
      i++;
    }
    if (value === undefined || value === '' || (flag === arg && value.startsWith('--'))) {
      throw new ValidationError(`${flag} requires a value`, { code: 'MISSING_VALUE', details: { flag } });
    }
    values.set(flag, value);
  }

  return { values, switches };
}

/**
 * Check a value against a schema, throwing a ValidationError that names the
 * offending flag.
 */
export function checkOptions<T extends TSchema>(schema: T, candidate: unknown): Static<T> {
  if (Value.Check(schema, candidate)) return candidate;
  const [first] = [...Value.Errors(schema, candidate)];
  const property = first?.path.replace(/^\//, '').split('/')[0] ?? '';
  const flag = FLAG_NAMES[property] ?? property;
  throw new ValidationError(`Invalid ${flag}: ${first?.message ?? 'unrecognised value'}`, {
    code: 'INVALID_OPTION',
    details: { flag, value: first?.value },
  });
}

function requireRegion(flags: ParsedFlags): string {
  const region = flags.values.get('--region');
  if (!region) {
    throw new ValidationError('--region is required', { code: 'MISSING_REGION' });
  }
  return region;
}

function resolveRotationDays(flags: ParsedFlags, env: Record<string, string | undefined>): number {
  const flagValue = flags.values.get('--rotation-days');
  return flagValue !== undefined ? parseRotationDays(flagValue) : getRotationDays(env);
}

// =============================================================================
// Command Options
// =============================================================================

export function parseCheckOptions(
  args: string[],
  env: Record<string, string | undefined> = process.env,
): CheckOptions {
  const flags = parseFlags(args, {
    values: ['--region', '--rotation-days'],
    switches: ['--strict'],
  });
  return checkOptions(CheckOptionsSchema, {
    region: requireRegion(flags),
    rotationDays: resolveRotationDays(flags, env),
    strict: flags.switches.has('--strict'),
  });
}

export function parseLatestOptions(
  args: string[],
  env: Record<string, string | undefined> = process.env,
): LatestOptions {
  const flags = parseFlags(args, {
    values: ['--region', '--name-pattern', '--owner', '--rotation-days'],
  });
  return checkOptions(LatestOptionsSchema, {
    region: requireRegion(flags),
    namePattern: flags.values.get('--name-pattern') ?? getDefaultNamePattern(env),
    owner: flags.values.get('--owner') ?? 'self',
    rotationDays: resolveRotationDays(flags, env),
  });
}
