// shell/tests/config.test.ts

import { describe, test, expect, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { formatRow, formatTable, loadEnvFile } from '../cli/src/config';

const dirs: string[] = [];

afterEach(() => {
  for (const dir of dirs.splice(0)) rmSync(dir, { recursive: true, force: true });
});

function writeEnvFile(content: string): string {
  const dir = mkdtempSync(join(tmpdir(), 'amiwatch-config-'));
  dirs.push(dir);
  const file = join(dir, 'cli.env');
  writeFileSync(file, content);
  return file;
}

describe('loadEnvFile', () => {
  test('reads KEY=VALUE lines, strips quotes, skips comments and junk', () => {
    const file = writeEnvFile('# rotation\n\nAMIWATCH_ROTATION_DAYS="45"\nAMIWATCH_NAME_PATTERN=\'base-*\'\nNOEQUALS\n');
    const env: Record<string, string | undefined> = {};
    loadEnvFile(file, env);
    expect(env).toEqual({ AMIWATCH_ROTATION_DAYS: '45', AMIWATCH_NAME_PATTERN: 'base-*' });
  });

  test('existing variables win', () => {
    const file = writeEnvFile('AWS_PROFILE=from-file\n');
    const env: Record<string, string | undefined> = { AWS_PROFILE: 'from-shell' };
    loadEnvFile(file, env);
    expect(env.AWS_PROFILE).toBe('from-shell');
  });

  test('a missing file is ignored', () => {
    const env: Record<string, string | undefined> = {};
    loadEnvFile(join(tmpdir(), 'amiwatch-does-not-exist', 'cli.env'), env);
    expect(env).toEqual({});
  });
});

describe('formatTable', () => {
  test('pads without truncating and frames the header with 80-dash rules', () => {
    const lines = formatTable(['ID', 'NAME'], [['a', 'a-very-long-name']], [4, 6]);
    expect(lines).toEqual([
      '-'.repeat(80),
      'ID   NAME  ',
      '-'.repeat(80),
      'a    a-very-long-name',
    ]);
  });

  test('formatRow separates columns with one space', () => {
    expect(formatRow(['x', 'y'], [3, 2])).toBe('x   y ');
  });
});
