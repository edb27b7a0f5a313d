import { readFileSync, existsSync } from 'fs';
import { homedir } from 'os';
import { join } from 'path';
import { formatProgramData } from './output/program';

// ─── Output Mode ─────────────────────────────────────────────────────────────

export type OutputMode = 'normal' | 'json';
let currentOutputMode: OutputMode = 'normal';

export function setOutputMode(mode: OutputMode): void {
  currentOutputMode = mode;
}

export function getOutputMode(): OutputMode {
  return currentOutputMode;
}

/**
 * Output data respecting the current output mode.
 *
 *   --json  → JSON envelope via formatProgramData
 *   default → call humanFormat()
 */
export function output(data: unknown, humanFormat: () => void): void {
  if (getOutputMode() === 'json') {
    formatProgramData(data);
  } else {
    humanFormat();
  }
}

// ─── Env Files ───────────────────────────────────────────────────────────────

/** Path to the ~/.amiwatch directory. */
export const AMIWATCH_DIR = join(homedir(), '.amiwatch');

/**
 * Load a KEY=VALUE env file into `env`; existing variables win.
 * Blank lines and lines starting with # are ignored. No shell expansion.
 */
export function loadEnvFile(
  filePath: string,
  env: Record<string, string | undefined> = process.env,
): void {
  if (!existsSync(filePath)) return;
  const content = readFileSync(filePath, 'utf-8');
  for (const line of content.split('\n')) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) continue;
    const eqIdx = trimmed.indexOf('=');
    if (eqIdx === -1) continue;
    const key = trimmed.slice(0, eqIdx).trim();
    let value = trimmed.slice(eqIdx + 1).trim();
    // Strip optional quotes
    if ((value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'"))) {
      value = value.slice(1, -1);
    }
    if (env[key] === undefined) {
      env[key] = value;
    }
  }
}

// ─── Text Layout ─────────────────────────────────────────────────────────────

export const TABLE_RULE_WIDTH = 80;

/** Left-align each cell to its column width (never truncates), single-space separated. */
export function formatRow(cells: string[], widths: number[]): string {
  return cells.map((v, i) => v.padEnd(widths[i] ?? 0)).join(' ');
}

/** Table lines: rule, header, rule, rows. */
export function formatTable(headers: string[], rows: string[][], widths: number[]): string[] {
  const rule = '-'.repeat(TABLE_RULE_WIDTH);
  return [rule, formatRow(headers, widths), rule, ...rows.map(row => formatRow(row, widths))];
}

export function printLines(lines: string[]): void {
  for (const line of lines) {
    console.log(line);
  }
}
