// workflow/retry.ts - Retry strategy for transient provider failures

import { TIMING } from "@pagestack/contracts";
import { ProviderOperationError, shouldRetry } from "../provider/errors";
import { systemClock, type Clock } from "./clock";

// =============================================================================
// Retry Strategy
// =============================================================================

export interface RetryDecision {
  shouldRetry: boolean;
  delayMs: number;
  maxAttempts: number;
}

export const ERROR_RETRY_MAPPING: Record<string, { retryable: boolean; maxRetries: number }> = {
  // Transient: the same request may succeed after waiting
  PROVIDER_INTERNAL: { retryable: true, maxRetries: 3 },
  NETWORK_ERROR: { retryable: true, maxRetries: 3 },
  RATE_LIMIT_ERROR: { retryable: true, maxRetries: 5 },
  TIMEOUT_ERROR: { retryable: true, maxRetries: 2 },

  // Deterministic: retry won't help
  AUTH_ERROR: { retryable: false, maxRetries: 0 },
  INVALID_SPEC: { retryable: false, maxRetries: 0 },
  INVALID_STATE: { retryable: false, maxRetries: 0 },
  QUOTA_EXCEEDED: { retryable: false, maxRetries: 0 },
  NOT_FOUND: { retryable: false, maxRetries: 0 },
  ALREADY_EXISTS: { retryable: false, maxRetries: 0 },
  COMMAND_FAILED: { retryable: false, maxRetries: 0 },
};

const NO_RETRY: RetryDecision = { shouldRetry: false, delayMs: 0, maxAttempts: 0 };

export function determineRetryStrategy(error: unknown, attempt: number): RetryDecision {
  if (!(error instanceof ProviderOperationError) || !shouldRetry(error)) return NO_RETRY;

  const mapping = ERROR_RETRY_MAPPING[error.code];
  if (!mapping || !mapping.retryable) return NO_RETRY;

  if (attempt >= mapping.maxRetries) {
    return { shouldRetry: false, delayMs: 0, maxAttempts: mapping.maxRetries };
  }

  // Exponential backoff: min(2^attempt * base, max)
  // Provider-supplied retry_after_ms takes precedence over computed backoff.
  const providerDelay = error.retry_after_ms ?? 0;
  const computedBackoff = Math.min(
    Math.pow(2, attempt) * TIMING.RETRY_BASE_DELAY_MS,
    TIMING.RETRY_MAX_DELAY_MS
  );

  return {
    shouldRetry: true,
    delayMs: providerDelay > 0 ? providerDelay : computedBackoff,
    maxAttempts: mapping.maxRetries,
  };
}

/**
 * Run an operation, retrying transient provider errors with backoff.
 * Non-retryable errors and exhausted retries propagate unchanged.
 */
export async function withRetry<T>(
  label: string,
  fn: () => Promise<T>,
  options?: { clock?: Clock }
): Promise<T> {
  const clock = options?.clock ?? systemClock;
  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (err) {
      const decision = determineRetryStrategy(err, attempt);
      if (!decision.shouldRetry) throw err;
      const code = err instanceof ProviderOperationError ? err.code : "UNKNOWN";
      console.warn(
        `[retry] ${label} failed (${code}), retrying in ${decision.delayMs}ms ` +
        `(attempt ${attempt + 1}/${decision.maxAttempts})`
      );
      await clock.sleep(decision.delayMs);
    }
  }
}
