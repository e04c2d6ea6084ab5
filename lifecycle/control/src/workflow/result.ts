// workflow/result.ts - Classified step results and run tallies
//
// Steps that may legitimately find their work already done (or their target
// already gone) report that as a status instead of hiding the error.

import { errorMessage } from "@pagestack/contracts";
import { isAlreadyExists, isNotFound } from "../provider/errors";

// =============================================================================
// Step Outcomes
// =============================================================================

export type StepStatus = "done" | "already_satisfied" | "absent" | "skipped" | "failed";

export interface StepOutcome {
  step: string;
  status: StepStatus;
  detail?: string;
  error?: Error;
}

/**
 * Run one step and classify its result. ALREADY_EXISTS becomes
 * "already_satisfied", NOT_FOUND becomes "absent"; any other error is
 * captured as "failed" for the caller to count. Nothing is rethrown.
 */
export async function runStep(
  step: string,
  fn: () => Promise<StepStatus | void>
): Promise<StepOutcome> {
  try {
    const status = await fn();
    return { step, status: status ?? "done" };
  } catch (err) {
    if (isAlreadyExists(err)) return { step, status: "already_satisfied", detail: errorMessage(err) };
    if (isNotFound(err)) return { step, status: "absent", detail: errorMessage(err) };
    return {
      step,
      status: "failed",
      detail: errorMessage(err),
      error: err instanceof Error ? err : new Error(String(err)),
    };
  }
}

// =============================================================================
// Tally
// =============================================================================

export interface TallyCounts {
  passed: number;
  failed: number;
  warnings: number;
}

export function formatTally({ passed, failed, warnings }: TallyCounts): string {
  return `${passed} passed, ${failed} failed, ${warnings} warnings`;
}

/** Pass/fail/warning counter that logs each entry under a subsystem tag */
export class RunTally {
  private counts: TallyCounts = { passed: 0, failed: 0, warnings: 0 };
  readonly failures: string[] = [];

  constructor(private readonly tag: string) {}

  pass(message: string): void {
    this.counts.passed++;
    console.log(`[${this.tag}] ${message}`);
  }

  fail(message: string): void {
    this.counts.failed++;
    this.failures.push(message);
    console.error(`[${this.tag}] FAILED: ${message}`);
  }

  warn(message: string): void {
    this.counts.warnings++;
    console.warn(`[${this.tag}] WARNING: ${message}`);
  }

  /** Count a classified step: failures fail, everything else passes */
  record(outcome: StepOutcome): void {
    switch (outcome.status) {
      case "failed":
        this.fail(`${outcome.step}: ${outcome.detail ?? "unknown error"}`);
        break;
      case "absent":
        this.pass(`${outcome.step}: not found, nothing to do`);
        break;
      case "already_satisfied":
        this.pass(`${outcome.step}: already satisfied`);
        break;
      case "skipped":
        this.pass(`${outcome.step}: skipped${outcome.detail ? ` (${outcome.detail})` : ""}`);
        break;
      case "done":
        this.pass(`${outcome.step}: done`);
        break;
    }
  }

  get totals(): TallyCounts {
    return { ...this.counts };
  }

  get ok(): boolean {
    return this.counts.failed === 0;
  }

  summary(): string {
    return formatTally(this.counts);
  }
}
