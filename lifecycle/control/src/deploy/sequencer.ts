// deploy/sequencer.ts - Deployment Sequencer
//
// Runs an explicit, ordered stage list. Each stage names the stages it
// depends on; a stage is submitted only when all of them are Ready (or
// Skipped because they do not apply to this backend).
//
// Per-stage state machine:
//   pending -> submitted -> ready
//   pending -> submitted -> failed   (terminal; aborts the run)
//   pending -> skipped

import { ValidationError, PreconditionError, errorMessage, formatDuration } from "@pagestack/contracts";
import type { StorageBackend } from "@pagestack/contracts";
import type { SchedulerClient, StorageApiClient } from "../provider/types";
import type { StateStore } from "../material/state-store";
import type { Clock } from "../workflow/clock";
import { systemClock } from "../workflow/clock";

// =============================================================================
// Types
// =============================================================================

export type StageStatus = "pending" | "submitted" | "ready" | "failed" | "skipped";

export interface StageContext {
  scheduler: SchedulerClient;
  storage: StorageApiClient;
  state: StateStore;
  namespace: string;
  backend: StorageBackend;
  clock: Clock;
  manifestDir?: string;
}

export interface Stage {
  name: string;
  description: string;
  dependsOn: string[];
  /** Stages disabled for the current context are skipped, and count as satisfied */
  enabled?(ctx: StageContext): boolean;
  /** Idempotent submission of the stage's objects */
  submit(ctx: StageContext): Promise<void>;
  /** Block until the submitted objects are healthy (Health Poller) */
  waitReady?(ctx: StageContext): Promise<void>;
}

export interface StageTransition {
  stage: string;
  from: StageStatus;
  to: StageStatus;
  detail?: string;
}

export interface DeploymentReport {
  statuses: Record<string, StageStatus>;
  transitions: StageTransition[];
  elapsedMs: number;
}

const SATISFIED: readonly StageStatus[] = ["ready", "skipped"];

// =============================================================================
// Graph Validation
// =============================================================================

/**
 * Every prerequisite must name an earlier stage. Catches typos and
 * forward references before anything is submitted.
 */
export function validateStages(stages: Stage[]): void {
  const seen = new Set<string>();
  for (const stage of stages) {
    if (seen.has(stage.name)) {
      throw new ValidationError(`Duplicate stage ${stage.name}`, { code: "INVALID_STAGE_GRAPH" });
    }
    for (const dep of stage.dependsOn) {
      if (!seen.has(dep)) {
        throw new ValidationError(
          `Stage ${stage.name} depends on ${dep}, which is not an earlier stage`,
          { code: "INVALID_STAGE_GRAPH", details: { stage: stage.name, dependency: dep } }
        );
      }
    }
    seen.add(stage.name);
  }
}

// =============================================================================
// Sequencer
// =============================================================================

export class DeploymentSequencer {
  private readonly statuses = new Map<string, StageStatus>();
  private readonly transitions: StageTransition[] = [];

  constructor(
    private readonly stages: Stage[],
    private readonly onTransition?: (transition: StageTransition) => void
  ) {
    validateStages(stages);
    for (const stage of stages) this.statuses.set(stage.name, "pending");
  }

  status(name: string): StageStatus | undefined {
    return this.statuses.get(name);
  }

  private transition(stage: string, to: StageStatus, detail?: string): void {
    const from = this.statuses.get(stage) ?? "pending";
    this.statuses.set(stage, to);
    const entry: StageTransition = { stage, from, to, ...(detail ? { detail } : {}) };
    this.transitions.push(entry);
    this.onTransition?.(entry);
  }

  private assertPrerequisites(stage: Stage): void {
    for (const dep of stage.dependsOn) {
      const status = this.statuses.get(dep);
      if (!status || !SATISFIED.includes(status)) {
        throw new PreconditionError(
          `Stage ${stage.name} cannot start: prerequisite ${dep} is ${status ?? "unknown"}`,
          { code: "STAGE_PREREQUISITE_NOT_READY", details: { stage: stage.name, dependency: dep } }
        );
      }
    }
  }

  /**
   * Run every stage in order. The first failure marks its stage failed and
   * is rethrown; later stages stay pending.
   */
  async apply(ctx: StageContext): Promise<DeploymentReport> {
    const clock = ctx.clock ?? systemClock;
    const start = clock.now();

    for (const stage of this.stages) {
      if (stage.enabled && !stage.enabled(ctx)) {
        this.transition(stage.name, "skipped", `not used with ${ctx.backend}`);
        continue;
      }

      this.assertPrerequisites(stage);
      const stageStart = clock.now();
      try {
        await stage.submit(ctx);
        this.transition(stage.name, "submitted");
        if (stage.waitReady) await stage.waitReady(ctx);
        this.transition(stage.name, "ready", formatDuration(clock.now() - stageStart));
      } catch (err) {
        this.transition(stage.name, "failed", errorMessage(err));
        throw err;
      }
    }

    return {
      statuses: Object.fromEntries(this.statuses),
      transitions: [...this.transitions],
      elapsedMs: clock.now() - start,
    };
  }
}
