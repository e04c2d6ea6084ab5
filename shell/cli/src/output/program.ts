// cli/src/output/program.ts - JSON envelope for --json output
//
// Exit codes:
//   0: success
//   1: operation failed (precondition, provider error, failed checks)
//   2: CLI error (bad arguments)

import { errorMessage } from '@pagestack/contracts';

export interface ProgramEnvelope {
  status: 'ok' | 'error';
  data?: unknown;
  follow_up?: Array<{ action: string; command: string }>;
  error?: string;
  code?: string;
}

/**
 * Emit a JSON envelope to stdout. Written directly rather than through
 * console.log, which json mode points at stderr. Falls back to an error
 * envelope when the payload cannot be serialized.
 */
export function emitEnvelope(envelope: ProgramEnvelope): void {
  let text: string;
  try {
    text = JSON.stringify(envelope, null, 2);
  } catch (err) {
    text = JSON.stringify({ status: 'error', error: `Failed to serialize response: ${errorMessage(err)}` });
  }
  process.stdout.write(`${text}\n`);
}

export function emitOk(data?: unknown, opts?: { follow_up?: ProgramEnvelope['follow_up'] }): void {
  const envelope: ProgramEnvelope = { status: 'ok' };
  if (data !== undefined) envelope.data = data;
  if (opts?.follow_up) envelope.follow_up = opts.follow_up;
  emitEnvelope(envelope);
}

export function emitError(message: string, code?: string, hint?: string): void {
  emitEnvelope({
    status: 'error',
    error: message,
    ...(code ? { code } : {}),
    ...(hint ? { follow_up: [{ action: 'fix', command: hint }] } : {}),
  });
}
