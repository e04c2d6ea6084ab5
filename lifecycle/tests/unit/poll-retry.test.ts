// tests/unit/poll-retry.test.ts - Health Poller bounds and retry strategy

import { describe, test, expect } from "vitest";
import { TimeoutError } from "@pagestack/contracts";
import { waitUntilReady, type ProbeResult } from "../../control/src/workflow/poll";
import { determineRetryStrategy, withRetry } from "../../control/src/workflow/retry";
import { ConcreteProviderError } from "../../control/src/provider/errors";
import { ManualClock } from "../mock-providers";

// =============================================================================
// waitUntilReady
// =============================================================================

describe("waitUntilReady", () => {
  test("returns the observed value as soon as the probe is ready", async () => {
    const clock = new ManualClock();
    let calls = 0;
    const observed = await waitUntilReady(
      async (): Promise<ProbeResult<number>> => {
        calls++;
        return { ready: calls === 3, observed: calls };
      },
      { label: "thing", intervalMs: 2_000, timeoutMs: 10_000, clock }
    );
    expect(observed).toBe(3);
    expect(clock.sleeps).toEqual([2_000, 2_000]);
  });

  test("interval 2s, timeout 10s: fails at 10s after 6 attempts, carrying the last observation", async () => {
    const clock = new ManualClock();
    let calls = 0;
    const wait = waitUntilReady(
      async () => ({ ready: false, observed: { attempt: ++calls }, detail: `${calls}/3 ready` }),
      { label: "statefulset/pageserver", intervalMs: 2_000, timeoutMs: 10_000, clock }
    );

    await expect(wait).rejects.toBeInstanceOf(TimeoutError);
    const err = await wait.catch((e: unknown) => e);
    if (!(err instanceof TimeoutError)) throw new Error("expected TimeoutError");
    expect(err.message).toBe("statefulset/pageserver not ready after 10s (6/3 ready)");
    expect(err.attempts).toBe(6);
    expect(err.elapsedMs).toBe(10_000);
    expect(err.elapsedMs).toBeLessThanOrEqual(12_000);
    expect(err.lastObserved).toEqual({ attempt: 6 });
  });

  test("never sleeps past the deadline", async () => {
    const clock = new ManualClock();
    const wait = waitUntilReady(async () => ({ ready: false, observed: null }), {
      label: "x",
      intervalMs: 2_000,
      timeoutMs: 9_000,
      clock,
    });
    await expect(wait).rejects.toBeInstanceOf(TimeoutError);
    expect(clock.sleeps).toEqual([2_000, 2_000, 2_000, 2_000, 1_000]);
    expect(clock.now()).toBe(9_000);
  });

  test("reports progress between attempts", async () => {
    const clock = new ManualClock();
    const progress: number[] = [];
    let calls = 0;
    await waitUntilReady(async () => ({ ready: ++calls === 2, observed: calls }), {
      label: "x",
      intervalMs: 500,
      timeoutMs: 5_000,
      clock,
      onProgress: (_result, elapsed) => progress.push(elapsed),
    });
    expect(progress).toEqual([0]);
  });
});

// =============================================================================
// Retry
// =============================================================================

describe("determineRetryStrategy", () => {
  const throttled = new ConcreteProviderError("aws", "RATE_LIMIT_ERROR", "slow down", { retryable: true });

  test("exponential backoff for transient errors", () => {
    expect(determineRetryStrategy(throttled, 0)).toEqual({ shouldRetry: true, delayMs: 1_000, maxAttempts: 5 });
    expect(determineRetryStrategy(throttled, 3)).toEqual({ shouldRetry: true, delayMs: 8_000, maxAttempts: 5 });
    expect(determineRetryStrategy(throttled, 5).shouldRetry).toBe(false);
  });

  test("provider-supplied delay wins over computed backoff", () => {
    const err = new ConcreteProviderError("aws", "RATE_LIMIT_ERROR", "slow down", {
      retryable: true,
      retry_after_ms: 5_000,
    });
    expect(determineRetryStrategy(err, 0).delayMs).toBe(5_000);
  });

  test("deterministic and foreign errors are not retried", () => {
    expect(determineRetryStrategy(new ConcreteProviderError("aws", "AUTH_ERROR", "denied"), 0).shouldRetry).toBe(false);
    expect(determineRetryStrategy(new ConcreteProviderError("aws", "NETWORK_ERROR", "x"), 0).shouldRetry).toBe(false);
    expect(determineRetryStrategy(new Error("boom"), 0).shouldRetry).toBe(false);
  });
});

describe("withRetry", () => {
  test("retries transient failures, then returns", async () => {
    const clock = new ManualClock();
    let calls = 0;
    const result = await withRetry("op", async () => {
      if (++calls < 3) throw new ConcreteProviderError("storage-api", "NETWORK_ERROR", "reset", { retryable: true });
      return "ok";
    }, { clock });
    expect(result).toBe("ok");
    expect(calls).toBe(3);
    expect(clock.sleeps).toEqual([1_000, 2_000]);
  });

  test("gives up after the mapping's retry budget", async () => {
    const clock = new ManualClock();
    let calls = 0;
    const failing = withRetry("op", async () => {
      calls++;
      throw new ConcreteProviderError("aws", "TIMEOUT_ERROR", "slow", { retryable: true });
    }, { clock });
    await expect(failing).rejects.toThrow("slow");
    expect(calls).toBe(3);
  });

  test("non-retryable errors propagate immediately", async () => {
    let calls = 0;
    const failing = withRetry("op", async () => {
      calls++;
      throw new ConcreteProviderError("aws", "INVALID_SPEC", "bad");
    }, { clock: new ManualClock() });
    await expect(failing).rejects.toThrow("bad");
    expect(calls).toBe(1);
  });
});
