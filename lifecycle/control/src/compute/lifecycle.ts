// compute/lifecycle.ts - Compute Lifecycle Manager
//
// A compute is the triple tenant -> timeline -> pod. Creation walks it in
// that order across the storage API and the scheduler; teardown removes only
// the scheduler objects, so tenant and timeline data survive.

import {
  NotFoundError,
  PreconditionError,
  TIMING,
  TimeoutError,
  ValidationError,
  errorMessage,
  generateHexId,
  isHexId,
  type ComputeId,
  type TenantId,
  type TimelineId,
} from "@pagestack/contracts";
import type { StateStore } from "../material/state-store";
import { isPodReady, isWorkloadReady, podPhase, workloadStatus, type KubeObject } from "../provider/kube/objects";
import type { CreateOutcome, SchedulerClient, StorageApiClient } from "../provider/types";
import { podReadyProbe } from "../deploy/probes";
import { systemClock, type Clock } from "../workflow/clock";
import { waitUntilReady } from "../workflow/poll";
import { TENANT_LABEL, TIMELINE_LABEL, deriveComputeId } from "./ids";
import { buildComputeSpec } from "./spec";
import {
  COMPUTE_APP_LABEL,
  COMPUTE_PG_PORT,
  computeObjects,
  specConfigMapName,
} from "./resources";

// =============================================================================
// Types
// =============================================================================

/** Teardown target meaning every compute in the namespace */
export const ALL_COMPUTES: unique symbol = Symbol("all-computes");
export type TeardownTarget = ComputeId | typeof ALL_COMPUTES;

export interface CreateComputeRequest {
  tenantId?: TenantId;
  timelineId?: TimelineId;
  /** Branch the new timeline from this one */
  ancestorTimelineId?: TimelineId;
  ancestorStartLsn?: string;
  pgVersion?: number;
}

export interface ComputeHandle {
  computeId: ComputeId;
  tenantId: TenantId;
  timelineId: TimelineId;
  namespace: string;
  /** In-cluster connection address */
  endpoint: string;
  tenant: CreateOutcome;
  timeline: CreateOutcome;
  ready: boolean;
}

export interface ComputeSummary {
  computeId: ComputeId;
  tenantId?: TenantId;
  timelineId?: TimelineId;
  phase: string;
  ready: boolean;
  createdAt?: string;
}

export interface ComputeTeardownReport {
  requested: ComputeId[];
  deleted: ComputeId[];
  failed: Array<{ computeId: ComputeId; error: string }>;
  /** Operator declined the confirmation; nothing was deleted */
  declined: boolean;
}

export interface TeardownComputeOptions {
  /** Asked once before tearing down more than one compute */
  confirm?: (computeIds: ComputeId[]) => Promise<boolean>;
}

export interface ComputeManagerConfig {
  scheduler: SchedulerClient;
  storage: StorageApiClient;
  state: StateStore;
  namespace: string;
  pgVersion: number;
  clock?: Clock;
  readyTimeoutMs?: number;
}

const PREREQUISITES = [
  { kind: "statefulset", name: "pageserver" },
  { kind: "statefulset", name: "safekeeper" },
  { kind: "deployment", name: "storage-controller" },
] as const;

function requireHexId(label: string, value: string): string {
  if (!isHexId(value)) {
    throw new ValidationError(`${label} must be 32 lowercase hex characters, got "${value}"`, {
      code: "INVALID_ID",
      details: { [label]: value },
    });
  }
  return value;
}

export function summarizeCompute(pod: KubeObject): ComputeSummary {
  const labels = pod.metadata.labels ?? {};
  return {
    computeId: pod.metadata.name,
    tenantId: labels[TENANT_LABEL],
    timelineId: labels[TIMELINE_LABEL],
    phase: podPhase(pod),
    ready: isPodReady(pod),
    createdAt: pod.metadata.creationTimestamp,
  };
}

// =============================================================================
// Manager
// =============================================================================

export class ComputeLifecycleManager {
  private readonly clock: Clock;

  constructor(private readonly config: ComputeManagerConfig) {
    this.clock = config.clock ?? systemClock;
  }

  private get namespace(): string {
    return this.config.namespace;
  }

  async assertPrerequisites(): Promise<void> {
    for (const { kind, name } of PREREQUISITES) {
      const obj = await this.config.scheduler.get(kind, name, this.namespace);
      if (!obj || !isWorkloadReady(workloadStatus(obj))) {
        throw new PreconditionError(`${kind}/${name} is not ready in ${this.namespace}`, {
          code: "PREREQUISITE_NOT_READY",
          details: { kind, name, namespace: this.namespace },
          hint: "pagestack deploy",
        });
      }
    }
  }

  async createCompute(request: CreateComputeRequest = {}): Promise<ComputeHandle> {
    const { scheduler, storage } = this.config;

    // Validate everything before the first side effect
    const tenantId = request.tenantId ? requireHexId("tenantId", request.tenantId) : generateHexId();
    const timelineId = request.timelineId ? requireHexId("timelineId", request.timelineId) : generateHexId();
    if (request.ancestorTimelineId) requireHexId("ancestorTimelineId", request.ancestorTimelineId);
    const registry = this.config.state.require("ECR_REGISTRY");
    await this.assertPrerequisites();

    const tenant = await storage.createTenant(tenantId);
    console.log(`[compute] Tenant ${tenantId}: ${tenant === "created" ? "created" : "already exists"}`);

    let timeline: CreateOutcome;
    const timelines = await storage.listTimelines(tenantId);
    if (timelines.some((t) => t.timeline_id === timelineId)) {
      timeline = "exists";
      console.log(`[compute] Timeline ${timelineId}: already exists`);
    } else {
      timeline = await storage.createTimeline(tenantId, timelineId, {
        pgVersion: request.pgVersion ?? this.config.pgVersion,
        ancestorTimelineId: request.ancestorTimelineId,
        ancestorStartLsn: request.ancestorStartLsn,
      });
      const branch = request.ancestorTimelineId ? ` (branch of ${request.ancestorTimelineId})` : "";
      console.log(`[compute] Timeline ${timelineId}: ${timeline === "created" ? "created" : "already exists"}${branch}`);
    }

    const computeId = await deriveComputeId(tenantId, timelineId, scheduler, this.namespace);
    const spec = buildComputeSpec({
      computeId,
      tenantId,
      timelineId,
      namespace: this.namespace,
      now: new Date(this.clock.now()),
    });

    await scheduler.apply({
      type: "objects",
      objects: computeObjects({ computeId, tenantId, timelineId, namespace: this.namespace, registry, spec }),
    });
    console.log(`[compute] Applied ${specConfigMapName(computeId)}, pod/${computeId} and service/${computeId}`);

    const ready = await this.waitForPod(computeId);
    return {
      computeId,
      tenantId,
      timelineId,
      namespace: this.namespace,
      endpoint: `${computeId}.${this.namespace}.svc.cluster.local:${COMPUTE_PG_PORT}`,
      tenant,
      timeline,
      ready,
    };
  }

  private async waitForPod(computeId: ComputeId): Promise<boolean> {
    try {
      await waitUntilReady(podReadyProbe(this.config.scheduler, computeId, this.namespace), {
        label: `pod/${computeId}`,
        intervalMs: TIMING.COMPUTE_POLL_INTERVAL_MS,
        timeoutMs: this.config.readyTimeoutMs ?? TIMING.COMPUTE_READY_TIMEOUT_MS,
        clock: this.clock,
      });
      console.log(`[compute] pod/${computeId} is Ready`);
      return true;
    } catch (err) {
      if (!(err instanceof TimeoutError)) throw err;
      console.warn(
        `[compute] WARNING: ${err.message}; ` +
        `check with: kubectl describe pod ${computeId} -n ${this.namespace}`
      );
      return false;
    }
  }

  async listComputes(): Promise<ComputeSummary[]> {
    const pods = await this.config.scheduler.list("pod", {
      namespace: this.namespace,
      labels: { app: COMPUTE_APP_LABEL },
    });
    return pods.map(summarizeCompute);
  }

  private async deleteCompute(computeId: ComputeId): Promise<void> {
    const { scheduler } = this.config;
    const options = { namespace: this.namespace };
    await scheduler.delete("pod", computeId, options);
    await scheduler.delete("service", computeId, options);
    await scheduler.delete("configmap", specConfigMapName(computeId), options);
    console.log(`[compute] Deleted ${computeId}; tenant and timeline data are kept`);
  }

  async teardownCompute(target: TeardownTarget, options: TeardownComputeOptions = {}): Promise<ComputeTeardownReport> {
    if (target !== ALL_COMPUTES) {
      const pod = await this.config.scheduler.get("pod", target, this.namespace);
      if (!pod) {
        throw new NotFoundError("compute", target, { hint: "pagestack compute list" });
      }
      await this.deleteCompute(target);
      return { requested: [target], deleted: [target], failed: [], declined: false };
    }

    const computeIds = (await this.listComputes()).map((c) => c.computeId);
    const report: ComputeTeardownReport = { requested: computeIds, deleted: [], failed: [], declined: false };
    if (computeIds.length === 0) {
      console.log("[compute] No computes found");
      return report;
    }

    const confirmed = options.confirm ? await options.confirm(computeIds) : false;
    if (!confirmed) {
      console.log("[compute] Teardown declined, nothing deleted");
      return { ...report, declined: true };
    }

    for (const computeId of computeIds) {
      try {
        await this.deleteCompute(computeId);
        report.deleted.push(computeId);
      } catch (err) {
        console.warn(`[compute] WARNING: failed to delete ${computeId}: ${errorMessage(err)}`);
        report.failed.push({ computeId, error: errorMessage(err) });
      }
    }
    console.log(`[compute] Deleted ${report.deleted.length}/${computeIds.length} computes`);
    return report;
  }
}
