// errors.ts - Error Types

// =============================================================================
// BASE ERROR CLASS
// =============================================================================

export type ErrorCategory =
  | 'precondition'
  | 'validation'
  | 'not_found'
  | 'conflict'
  | 'timeout'
  | 'provider'
  | 'internal';

/** Base error class for all pagestack errors */
export class PagestackError extends Error {
  readonly code: string;
  readonly category: ErrorCategory;
  readonly details?: Record<string, unknown>;
  /** Command the operator can run to correct the failure */
  readonly hint?: string;

  constructor(
    code: string,
    message: string,
    category: ErrorCategory,
    options?: {
      details?: Record<string, unknown>;
      hint?: string;
      cause?: unknown;
    },
  ) {
    super(message, { cause: options?.cause });
    this.name = 'PagestackError';
    this.code = code;
    this.category = category;
    this.details = options?.details;
    this.hint = options?.hint;
  }
}

/**
 * A required input is absent (credential, state file, state key, healthy
 * prerequisite). Raised before any side effect of the failing step.
 */
export class PreconditionError extends PagestackError {
  constructor(
    message: string,
    options?: {
      code?: string;
      details?: Record<string, unknown>;
      hint?: string;
      cause?: unknown;
    },
  ) {
    super(options?.code ?? 'PRECONDITION_FAILED', message, 'precondition', options);
    this.name = 'PreconditionError';
  }
}

/** A deployment state key was required but never written */
export class MissingStateError extends PreconditionError {
  readonly key: string;

  constructor(key: string, options?: { hint?: string }) {
    super(`Deployment state is missing ${key}`, {
      code: 'STATE_KEY_MISSING',
      details: { key },
      hint: options?.hint ?? 'pagestack provision',
    });
    this.name = 'MissingStateError';
    this.key = key;
  }
}

/** Validation error (bad input) */
export class ValidationError extends PagestackError {
  constructor(
    message: string,
    options?: {
      code?: string;
      details?: Record<string, unknown>;
      cause?: unknown;
    },
  ) {
    super(options?.code ?? 'INVALID_INPUT', message, 'validation', options);
    this.name = 'ValidationError';
  }
}

/** A template still contains placeholder tokens after rendering */
export class UnresolvedPlaceholderError extends ValidationError {
  readonly tokens: string[];

  constructor(tokens: string[], source?: string) {
    super(
      `Unresolved placeholders${source ? ` in ${source}` : ''}: ${tokens.join(', ')}`,
      { code: 'UNRESOLVED_PLACEHOLDER', details: { tokens, source } },
    );
    this.name = 'UnresolvedPlaceholderError';
    this.tokens = tokens;
  }
}

/** Resource not found error */
export class NotFoundError extends PagestackError {
  constructor(
    resourceType: string,
    resourceId: string,
    options?: { hint?: string; cause?: unknown },
  ) {
    super(
      `${resourceType.toUpperCase().replace(/[^A-Z0-9]+/g, '_')}_NOT_FOUND`,
      `${resourceType} ${resourceId} not found`,
      'not_found',
      options,
    );
    this.name = 'NotFoundError';
  }
}

/** Ownership or identity conflict */
export class ConflictError extends PagestackError {
  constructor(
    message: string,
    options?: {
      code?: string;
      details?: Record<string, unknown>;
      cause?: unknown;
    },
  ) {
    super(options?.code ?? 'CONFLICT', message, 'conflict', options);
    this.name = 'ConflictError';
  }
}

/** A readiness wait ran out of time; carries the last observed probe value */
export class TimeoutError extends PagestackError {
  readonly lastObserved: unknown;
  readonly attempts: number;
  readonly elapsedMs: number;

  constructor(
    message: string,
    options: {
      lastObserved: unknown;
      attempts: number;
      elapsedMs: number;
      code?: string;
      cause?: unknown;
    },
  ) {
    super(options.code ?? 'OPERATION_TIMEOUT', message, 'timeout', {
      details: {
        lastObserved: options.lastObserved,
        attempts: options.attempts,
        elapsedMs: options.elapsedMs,
      },
      cause: options.cause,
    });
    this.name = 'TimeoutError';
    this.lastObserved = options.lastObserved;
    this.attempts = options.attempts;
    this.elapsedMs = options.elapsedMs;
  }
}

// =============================================================================
// HELPERS
// =============================================================================

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
