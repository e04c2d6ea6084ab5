// cli/src/config.ts - Output mode, tables and failure reporting

import { PagestackError, errorMessage } from '@pagestack/contracts';
import { ProviderOperationError } from '@pagestack/lifecycle';
import { emitError, emitOk } from './output/program';

// ─── Output Mode ─────────────────────────────────────────────────────────────

export type OutputMode = 'normal' | 'json';
let currentOutputMode: OutputMode = 'normal';
let humanConsole: Pick<Console, 'log' | 'info'> | undefined;

/**
 * Switch output mode. Under --json stdout carries only the envelope, so
 * progress written with console.log/info goes to stderr until the mode is
 * switched back.
 */
export function setOutputMode(mode: OutputMode): void {
  currentOutputMode = mode;
  if (mode === 'json' && !humanConsole) {
    humanConsole = { log: console.log, info: console.info };
    console.log = (...args: unknown[]) => console.error(...args);
    console.info = (...args: unknown[]) => console.error(...args);
  } else if (mode === 'normal' && humanConsole) {
    console.log = humanConsole.log;
    console.info = humanConsole.info;
    humanConsole = undefined;
  }
}

export function getOutputMode(): OutputMode {
  return currentOutputMode;
}

/**
 * Output data respecting the current output mode: a JSON envelope under
 * --json, otherwise whatever humanFormat() prints.
 */
export function output(data: unknown, humanFormat?: () => void): void {
  if (getOutputMode() === 'json') {
    emitOk(data);
  } else if (humanFormat) {
    humanFormat();
  }
}

/** Print a table with padded columns. */
export function printTable(headers: string[], rows: string[][], widths: number[]): void {
  console.log(formatRow(headers, widths));
  console.log(widths.map(w => '-'.repeat(w)).join('  '));
  for (const row of rows) {
    console.log(formatRow(row, widths));
  }
}

export function formatRow(row: string[], widths: number[]): string {
  return row.map((v, i) => v.padEnd(widths[i] ?? v.length)).join('  ').trimEnd();
}

// ─── Failures ────────────────────────────────────────────────────────────────

export interface FailureReport {
  message: string;
  code?: string;
  hint?: string;
}

/** Flatten any thrown value into what the operator needs to see */
export function describeFailure(err: unknown): FailureReport {
  if (err instanceof PagestackError) {
    return { message: err.message, code: err.code, ...(err.hint ? { hint: err.hint } : {}) };
  }
  if (err instanceof ProviderOperationError) {
    return { message: `${err.provider}: ${err.message}`, code: err.code };
  }
  return { message: errorMessage(err) };
}

/** Print a labelled failure plus the corrective command, if any */
export function reportFailure(label: string, err: unknown): void {
  const failure = describeFailure(err);
  if (getOutputMode() === 'json') {
    emitError(failure.message, failure.code, failure.hint);
    return;
  }
  console.error(`[${label}] FAILED: ${failure.message}`);
  if (failure.hint) console.error(`  Run: ${failure.hint}`);
}

/** Exit code for a finished command: 1 when anything failed */
export function exitCodeFor(failed: number): number {
  return failed > 0 ? 1 : 0;
}
