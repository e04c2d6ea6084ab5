// cli/src/args.ts - Argument parsing

import type { CreateComputeRequest, TeardownTarget } from '@pagestack/lifecycle';
import { ALL_COMPUTES } from '@pagestack/lifecycle';

/** Bad invocation: printed with usage, exit code 2 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

/**
 * Extract --json from the raw argv array.
 * Returns the remaining args with the flag stripped.
 */
export function parseGlobalFlags(args: string[]): { json: boolean; remainingArgs: string[] } {
  let json = false;
  const remainingArgs: string[] = [];
  for (const arg of args) {
    if (arg === '--json') { json = true; }
    else { remainingArgs.push(arg); }
  }
  return { json, remainingArgs };
}

const CREATE_FLAGS = {
  '--tenant': 'tenantId',
  '--timeline': 'timelineId',
  '--branch-from': 'ancestorTimelineId',
  '--branch-lsn': 'ancestorStartLsn',
} as const;

function isCreateFlag(flag: string): flag is keyof typeof CREATE_FLAGS {
  return Object.prototype.hasOwnProperty.call(CREATE_FLAGS, flag);
}

/**
 * `compute create [--tenant <id>] [--timeline <id>] [--branch-from <id>]
 * [--branch-lsn <lsn>] [--pg-version <n>]`. Accepts `--flag=value` too.
 * Id format is checked by the lifecycle manager.
 */
export function parseComputeCreateArgs(args: string[]): CreateComputeRequest {
  const request: CreateComputeRequest = {};
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const eq = arg.indexOf('=');
    const flag = eq === -1 ? arg : arg.slice(0, eq);
    let value: string | undefined;
    if (eq !== -1) {
      value = arg.slice(eq + 1);
    } else {
      value = args[i + 1];
      i++;
    }
    if (value === undefined || value === '') {
      throw new UsageError(`${flag} requires a value`);
    }

    if (isCreateFlag(flag)) {
      request[CREATE_FLAGS[flag]] = value;
    } else if (flag === '--pg-version') {
      const version = Number(value);
      if (!Number.isInteger(version) || version <= 0) {
        throw new UsageError(`--pg-version must be a positive integer, got "${value}"`);
      }
      request.pgVersion = version;
    } else {
      throw new UsageError(`Unknown option for compute create: ${flag}`);
    }
  }
  if (request.ancestorStartLsn && !request.ancestorTimelineId) {
    throw new UsageError('--branch-lsn requires --branch-from');
  }
  return request;
}

/** `compute teardown <compute-id>` or `compute teardown --all` */
export function parseTeardownTarget(args: string[]): TeardownTarget {
  if (args.length !== 1) {
    throw new UsageError('compute teardown takes exactly one compute id, or --all');
  }
  const target = args[0];
  if (target === '--all') return ALL_COMPUTES;
  if (target.startsWith('-')) {
    throw new UsageError(`Unknown option for compute teardown: ${target}`);
  }
  return target;
}

/** Reject anything beyond the boolean flags a command accepts */
export function parseBooleanFlags<F extends string>(
  command: string,
  args: string[],
  allowed: readonly F[]
): Set<F> {
  const isAllowed = (arg: string): arg is F => allowed.some((flag) => flag === arg);
  const seen = new Set<F>();
  for (const arg of args) {
    if (!isAllowed(arg)) {
      throw new UsageError(`Unexpected argument for ${command}: ${arg}`);
    }
    seen.add(arg);
  }
  return seen;
}
