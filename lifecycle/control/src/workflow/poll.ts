// workflow/poll.ts - Health Poller: bounded readiness waits

import { TimeoutError, formatDuration } from "@pagestack/contracts";
import { systemClock, type Clock } from "./clock";

export interface ProbeResult<T> {
  ready: boolean;
  /** What the probe saw; reported on timeout */
  observed: T;
  /** Short human-readable progress, e.g. "1/3 ready" */
  detail?: string;
}

export type Probe<T> = () => Promise<ProbeResult<T>>;

export interface PollOptions<T> {
  label: string;
  intervalMs: number;
  timeoutMs: number;
  clock?: Clock;
  onProgress?: (result: ProbeResult<T>, elapsedMs: number) => void;
}

/**
 * Evaluate `probe` until it reports ready. Sleeps min(interval, remaining)
 * between attempts and throws TimeoutError with the last observation once
 * the elapsed time reaches the timeout, so no wait overshoots it by more
 * than one interval.
 */
export async function waitUntilReady<T>(probe: Probe<T>, options: PollOptions<T>): Promise<T> {
  const clock = options.clock ?? systemClock;
  const start = clock.now();
  let attempts = 0;

  for (;;) {
    attempts++;
    const result = await probe();
    if (result.ready) return result.observed;

    const elapsed = clock.now() - start;
    if (elapsed >= options.timeoutMs) {
      throw new TimeoutError(
        `${options.label} not ready after ${formatDuration(elapsed)}` +
        (result.detail ? ` (${result.detail})` : ""),
        { lastObserved: result.observed, attempts, elapsedMs: elapsed }
      );
    }

    options.onProgress?.(result, elapsed);
    await clock.sleep(Math.min(options.intervalMs, options.timeoutMs - elapsed));
  }
}
