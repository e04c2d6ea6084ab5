// compute/resources.ts - Scheduler objects for one compute instance

import type { ComputeSpec } from "@pagestack/contracts";
import type { KubeObject } from "../provider/kube/objects";
import { TENANT_LABEL, TIMELINE_LABEL } from "./ids";

export const COMPUTE_APP_LABEL = "compute";
export const COMPUTE_ID_LABEL = "compute-id";
export const COMPUTE_PG_PORT = 5432;
export const COMPUTE_HTTP_PORT = 3080;
export const SPEC_FILE = "spec.json";

export interface ComputeObjectsInput {
  computeId: string;
  tenantId: string;
  timelineId: string;
  namespace: string;
  registry: string;
  spec: ComputeSpec;
}

export function specConfigMapName(computeId: string): string {
  return `${computeId}-spec`;
}

export function computeLabels(input: Pick<ComputeObjectsInput, "computeId" | "tenantId" | "timelineId">): Record<string, string> {
  return {
    app: COMPUTE_APP_LABEL,
    [COMPUTE_ID_LABEL]: input.computeId,
    [TENANT_LABEL]: input.tenantId,
    [TIMELINE_LABEL]: input.timelineId,
  };
}

function statusProbe(initialDelaySeconds: number, periodSeconds: number) {
  return {
    httpGet: { path: "/status", port: COMPUTE_HTTP_PORT },
    initialDelaySeconds,
    periodSeconds,
  };
}

export function specConfigMap(input: ComputeObjectsInput): KubeObject {
  return {
    apiVersion: "v1",
    kind: "ConfigMap",
    metadata: {
      name: specConfigMapName(input.computeId),
      namespace: input.namespace,
      labels: computeLabels(input),
    },
    data: { [SPEC_FILE]: JSON.stringify(input.spec, null, 2) },
  };
}

export function computePod(input: ComputeObjectsInput): KubeObject {
  return {
    apiVersion: "v1",
    kind: "Pod",
    metadata: {
      name: input.computeId,
      namespace: input.namespace,
      labels: computeLabels(input),
    },
    spec: {
      containers: [
        {
          name: "postgres",
          image: `${input.registry}/neon/compute:latest`,
          args: [
            "--pgdata", "/data/pgdata",
            "--connstr", `postgresql://postgres@localhost:${COMPUTE_PG_PORT}/postgres`,
            "--pgbin", "/usr/local/pgsql/bin/postgres",
            "--compute-id", input.computeId,
            "--config", `/config/${SPEC_FILE}`,
            "--dev",
          ],
          ports: [
            { containerPort: COMPUTE_PG_PORT, name: "postgres" },
            { containerPort: COMPUTE_HTTP_PORT, name: "http" },
          ],
          volumeMounts: [
            { name: "compute-spec", mountPath: "/config", readOnly: true },
            { name: "pgdata", mountPath: "/data" },
          ],
          resources: {
            requests: { cpu: "250m", memory: "512Mi" },
            limits: { cpu: "1", memory: "1Gi" },
          },
          readinessProbe: statusProbe(5, 10),
          livenessProbe: statusProbe(15, 20),
        },
      ],
      volumes: [
        { name: "compute-spec", configMap: { name: specConfigMapName(input.computeId) } },
        { name: "pgdata", emptyDir: {} },
      ],
    },
  };
}

export function computeService(input: ComputeObjectsInput): KubeObject {
  return {
    apiVersion: "v1",
    kind: "Service",
    metadata: {
      name: input.computeId,
      namespace: input.namespace,
      labels: computeLabels(input),
    },
    spec: {
      type: "ClusterIP",
      selector: { app: COMPUTE_APP_LABEL, [COMPUTE_ID_LABEL]: input.computeId },
      ports: [
        { name: "postgres", port: COMPUTE_PG_PORT, targetPort: COMPUTE_PG_PORT },
        { name: "http", port: COMPUTE_HTTP_PORT, targetPort: COMPUTE_HTTP_PORT },
      ],
    },
  };
}

/** ConfigMap first: the pod mounts it */
export function computeObjects(input: ComputeObjectsInput): KubeObject[] {
  return [specConfigMap(input), computePod(input), computeService(input)];
}
