// provider/kube/objects.ts - Scheduler object shapes and status readers

import { Type, type Static } from "@sinclair/typebox";

// =============================================================================
// Schemas
// =============================================================================

const StringMap = Type.Record(Type.String(), Type.String());

export const KubeMetadataSchema = Type.Object({
  name: Type.String(),
  namespace: Type.Optional(Type.String()),
  labels: Type.Optional(StringMap),
  annotations: Type.Optional(StringMap),
  creationTimestamp: Type.Optional(Type.String()),
  generation: Type.Optional(Type.Integer()),
});

export const KubeObjectSchema = Type.Object({
  apiVersion: Type.String(),
  kind: Type.String(),
  metadata: KubeMetadataSchema,
  spec: Type.Optional(Type.Record(Type.String(), Type.Unknown())),
  status: Type.Optional(Type.Record(Type.String(), Type.Unknown())),
  data: Type.Optional(StringMap),
});
export type KubeObject = Static<typeof KubeObjectSchema>;

export const KubeListSchema = Type.Object({
  items: Type.Array(KubeObjectSchema),
});

// =============================================================================
// Field Access
// =============================================================================

export function asRecord(value: unknown): Record<string, unknown> | undefined {
  if (!value || typeof value !== "object" || Array.isArray(value)) return undefined;
  const record: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) record[key] = entry;
  return record;
}

function numberField(source: Record<string, unknown> | undefined, key: string): number | undefined {
  const value = source?.[key];
  return typeof value === "number" ? value : undefined;
}

function stringField(source: Record<string, unknown> | undefined, key: string): string | undefined {
  const value = source?.[key];
  return typeof value === "string" ? value : undefined;
}

// =============================================================================
// Readiness
// =============================================================================

export interface WorkloadStatus {
  desired: number;
  ready: number;
  updated: number;
  /** The controller has seen the latest spec */
  observed: boolean;
}

/** Replica counts of a Deployment or StatefulSet */
export function workloadStatus(obj: KubeObject): WorkloadStatus {
  const desired = numberField(obj.spec, "replicas") ?? 1;
  const observedGeneration = numberField(obj.status, "observedGeneration") ?? 0;
  return {
    desired,
    ready: numberField(obj.status, "readyReplicas") ?? 0,
    updated: numberField(obj.status, "updatedReplicas") ?? 0,
    observed: observedGeneration >= (obj.metadata.generation ?? 0),
  };
}

export function isWorkloadReady(status: WorkloadStatus): boolean {
  return status.observed && status.ready >= status.desired && status.updated >= status.desired;
}

/** Declared replica count of a Deployment or StatefulSet */
export function desiredReplicas(obj: KubeObject): number {
  return numberField(obj.spec, "replicas") ?? 1;
}

export function podPhase(obj: KubeObject): string {
  return stringField(obj.status, "phase") ?? "Unknown";
}

export function isPodReady(obj: KubeObject): boolean {
  const conditions = obj.status?.["conditions"];
  if (!Array.isArray(conditions)) return false;
  return conditions.some((entry: unknown) => {
    const condition = asRecord(entry);
    return stringField(condition, "type") === "Ready" && stringField(condition, "status") === "True";
  });
}

export interface DatabaseClusterStatus {
  instances: number;
  readyInstances: number;
}

/** Instance counts of a CloudNativePG Cluster */
export function databaseClusterStatus(obj: KubeObject): DatabaseClusterStatus {
  return {
    instances: numberField(obj.spec, "instances") ?? 1,
    readyInstances: numberField(obj.status, "readyInstances") ?? 0,
  };
}

export function pvcPhase(obj: KubeObject): string {
  return stringField(obj.status, "phase") ?? "Unknown";
}

/** External hostname of a LoadBalancer Service, once assigned */
export function loadBalancerHostname(obj: KubeObject): string | undefined {
  const loadBalancer = asRecord(obj.status?.["loadBalancer"]);
  const ingress = loadBalancer?.["ingress"];
  if (!Array.isArray(ingress)) return undefined;
  for (const entry of ingress) {
    const record = asRecord(entry);
    const host = stringField(record, "hostname") ?? stringField(record, "ip");
    if (host) return host;
  }
  return undefined;
}
