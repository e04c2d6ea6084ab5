// deploy/probes.ts - Readiness probes over scheduler object status

import type { SchedulerClient } from "../provider/types";
import {
  databaseClusterStatus,
  isPodReady,
  isWorkloadReady,
  podPhase,
  workloadStatus,
  type DatabaseClusterStatus,
  type WorkloadStatus,
} from "../provider/kube/objects";
import type { Probe } from "../workflow/poll";

export type WorkloadKind = "deployment" | "statefulset";

/** Ready once every desired replica is updated and ready */
export function workloadProbe(
  scheduler: SchedulerClient,
  kind: WorkloadKind,
  name: string,
  namespace: string
): Probe<WorkloadStatus | null> {
  return async () => {
    const obj = await scheduler.get(kind, name, namespace);
    if (!obj) return { ready: false, observed: null, detail: `${kind} ${name} not found` };
    const status = workloadStatus(obj);
    return {
      ready: isWorkloadReady(status),
      observed: status,
      detail: `${status.ready}/${status.desired} ready`,
    };
  };
}

/** Ready once readyInstances reaches the declared instance count */
export function databaseClusterProbe(
  scheduler: SchedulerClient,
  name: string,
  namespace: string
): Probe<DatabaseClusterStatus | null> {
  return async () => {
    const obj = await scheduler.get("clusters.postgresql.cnpg.io", name, namespace);
    if (!obj) return { ready: false, observed: null, detail: `cluster ${name} not found` };
    const status = databaseClusterStatus(obj);
    return {
      ready: status.readyInstances >= status.instances,
      observed: status,
      detail: `${status.readyInstances}/${status.instances} instances ready`,
    };
  };
}

export interface PodReadiness {
  phase: string;
  ready: boolean;
}

export function podReadyProbe(
  scheduler: SchedulerClient,
  name: string,
  namespace: string
): Probe<PodReadiness | null> {
  return async () => {
    const obj = await scheduler.get("pod", name, namespace);
    if (!obj) return { ready: false, observed: null, detail: `pod ${name} not found` };
    const observed = { phase: podPhase(obj), ready: isPodReady(obj) };
    return { ready: observed.ready, observed, detail: `phase ${observed.phase}` };
  };
}
