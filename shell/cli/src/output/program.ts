// cli/src/output/program.ts - JSON envelope formatter
//
// With --json, every command emits one JSON envelope on stdout instead of the
// text report. Exit codes are unchanged (see EXIT_CODES).

export interface ProgramEnvelope {
  status: 'ok' | 'error';
  data?: unknown;
  error?: string;
  code?: string;
}

/**
 * Emit a JSON envelope to stdout.
 * Dates serialize as ISO strings; unserializable values fall back to an error envelope.
 */
export function emitEnvelope(envelope: ProgramEnvelope): void {
  try {
    console.log(JSON.stringify(envelope, null, 2));
  } catch (err) {
    console.log(JSON.stringify({ status: 'error', error: `Failed to serialize response: ${err instanceof Error ? err.message : String(err)}` }));
  }
}

/**
 * Emit a success envelope with optional data.
 */
export function emitOk(data?: unknown): void {
  const envelope: ProgramEnvelope = { status: 'ok' };
  if (data !== undefined) envelope.data = data;
  emitEnvelope(envelope);
}

/**
 * Emit an error envelope. The caller decides the exit code.
 */
export function emitError(message: string, opts?: { code?: string; data?: unknown }): void {
  const envelope: ProgramEnvelope = { status: 'error', error: message };
  if (opts?.code) envelope.code = opts.code;
  if (opts?.data !== undefined) envelope.data = opts.data;
  emitEnvelope(envelope);
}

export function formatProgramData(data: unknown): void {
  emitOk(data);
}
