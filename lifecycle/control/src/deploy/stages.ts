// deploy/stages.ts - The fixed topology as an ordered stage list

import { TIMING, errorMessage } from "@pagestack/contracts";
import { MINIO_BUCKET } from "../config";
import { registerPageservers } from "../registrar/registrar";
import { waitUntilReady } from "../workflow/poll";
import { databaseClusterProbe, workloadProbe, type WorkloadKind } from "./probes";
import {
  CNPG_MANIFEST_URL,
  CNPG_NAMESPACE,
  CNPG_OPERATOR_DEPLOYMENT,
  METADATA_DB_CLUSTER,
  TEMPLATES,
  renderNamespaced,
  renderWorkload,
} from "./manifests";
import type { Stage, StageContext } from "./sequencer";

function applyTemplate(ctx: StageContext, label: string, content: string): Promise<void> {
  return ctx.scheduler.apply({ type: "manifest", label, content });
}

async function waitForWorkload(
  ctx: StageContext,
  kind: WorkloadKind,
  name: string,
  timeoutMs: number,
  namespace: string = ctx.namespace
): Promise<void> {
  await waitUntilReady(workloadProbe(ctx.scheduler, kind, name, namespace), {
    label: `${kind}/${name}`,
    intervalMs: TIMING.ROLLOUT_POLL_INTERVAL_MS,
    timeoutMs,
    clock: ctx.clock,
    onProgress: (result) => console.log(`[deploy] Waiting for ${kind}/${name}: ${result.detail ?? "not ready"}`),
  });
}

async function createMinioBucket(ctx: StageContext): Promise<void> {
  const script =
    'mc alias set local http://localhost:9000 "$MINIO_ROOT_USER" "$MINIO_ROOT_PASSWORD" >/dev/null' +
    ` && mc mb --ignore-existing local/${MINIO_BUCKET}`;
  try {
    const result = await ctx.scheduler.exec("minio-0", ctx.namespace, ["sh", "-c", script]);
    if (result.exitCode === 0) {
      console.log(`[deploy] MinIO bucket ${MINIO_BUCKET} ready`);
    } else {
      console.warn(`[deploy] WARNING: MinIO bucket init exited ${result.exitCode}: ${result.stderr.trim()}`);
    }
  } catch (err) {
    console.warn(`[deploy] WARNING: MinIO bucket init failed: ${errorMessage(err)}`);
  }
}

export const DEPLOYMENT_STAGES: Stage[] = [
  {
    name: "namespace",
    description: "Namespace for all workloads",
    dependsOn: [],
    submit: (ctx) => applyTemplate(ctx, "namespace", renderNamespaced(ctx.namespace, TEMPLATES.namespace, ctx.manifestDir)),
  },
  {
    name: "storage-classes",
    description: "gp3 storage classes",
    dependsOn: [],
    submit: (ctx) => applyTemplate(ctx, "storage-classes", renderNamespaced(ctx.namespace, TEMPLATES.storageClasses, ctx.manifestDir)),
  },
  {
    name: "object-store",
    description: "In-cluster MinIO object store",
    dependsOn: ["namespace", "storage-classes"],
    enabled: (ctx) => ctx.backend === "minio",
    submit: (ctx) => applyTemplate(ctx, "minio", renderNamespaced(ctx.namespace, TEMPLATES.minio, ctx.manifestDir)),
    waitReady: async (ctx) => {
      await waitForWorkload(ctx, "statefulset", "minio", TIMING.OBJECT_STORE_ROLLOUT_TIMEOUT_MS);
      await createMinioBucket(ctx);
    },
  },
  {
    name: "metadata-db-operator",
    description: "CloudNativePG operator",
    dependsOn: [],
    submit: (ctx) => ctx.scheduler.apply({ type: "url", url: CNPG_MANIFEST_URL, serverSide: true }),
    waitReady: (ctx) =>
      waitForWorkload(ctx, "deployment", CNPG_OPERATOR_DEPLOYMENT, TIMING.OPERATOR_ROLLOUT_TIMEOUT_MS, CNPG_NAMESPACE),
  },
  {
    name: "metadata-db",
    description: "PostgreSQL cluster backing the storage controller",
    dependsOn: ["namespace", "storage-classes", "metadata-db-operator"],
    submit: (ctx) => applyTemplate(ctx, "metadata-db", renderNamespaced(ctx.namespace, TEMPLATES.metadataDb, ctx.manifestDir)),
    waitReady: async (ctx) => {
      await waitUntilReady(databaseClusterProbe(ctx.scheduler, METADATA_DB_CLUSTER, ctx.namespace), {
        label: `cluster/${METADATA_DB_CLUSTER}`,
        intervalMs: TIMING.METADATA_DB_POLL_INTERVAL_MS,
        timeoutMs: TIMING.METADATA_DB_READY_TIMEOUT_MS,
        clock: ctx.clock,
        onProgress: (result) => console.log(`[deploy] Waiting for ${METADATA_DB_CLUSTER}: ${result.detail ?? "not ready"}`),
      });
    },
  },
  {
    name: "storage-controller",
    description: "Storage controller (tenant placement, node registry)",
    dependsOn: ["metadata-db"],
    submit: (ctx) => applyTemplate(ctx, "storage-controller", renderWorkload(ctx, TEMPLATES.storageController)),
    waitReady: (ctx) => waitForWorkload(ctx, "deployment", "storage-controller", TIMING.DEPLOYMENT_ROLLOUT_TIMEOUT_MS),
  },
  {
    name: "storage-broker",
    description: "Storage broker",
    dependsOn: ["namespace"],
    submit: (ctx) => applyTemplate(ctx, "storage-broker", renderWorkload(ctx, TEMPLATES.storageBroker)),
    waitReady: (ctx) => waitForWorkload(ctx, "deployment", "storage-broker", TIMING.DEPLOYMENT_ROLLOUT_TIMEOUT_MS),
  },
  {
    name: "safekeepers",
    description: "Safekeeper quorum (3 replicas)",
    dependsOn: ["storage-broker"],
    submit: (ctx) => applyTemplate(ctx, "safekeepers", renderWorkload(ctx, TEMPLATES.safekeeper)),
    waitReady: (ctx) => waitForWorkload(ctx, "statefulset", "safekeeper", TIMING.STATEFULSET_ROLLOUT_TIMEOUT_MS),
  },
  {
    name: "pageservers",
    description: "Pageservers (2 replicas)",
    dependsOn: ["storage-controller", "safekeepers", "object-store"],
    submit: (ctx) => applyTemplate(ctx, "pageservers", renderWorkload(ctx, TEMPLATES.pageserver)),
    waitReady: (ctx) => waitForWorkload(ctx, "statefulset", "pageserver", TIMING.STATEFULSET_ROLLOUT_TIMEOUT_MS),
  },
  {
    name: "node-registration",
    description: "Register pageservers with the storage controller",
    dependsOn: ["pageservers", "storage-controller"],
    submit: async (ctx) => {
      const report = await registerPageservers(ctx);
      if (report.failed.length > 0) {
        console.warn(
          `[deploy] WARNING: ${report.failed.length} pageserver registration(s) failed; ` +
          "re-run `pagestack register` once the storage controller is reachable"
        );
      }
    },
  },
  {
    name: "proxy",
    description: "Connection proxy behind a load balancer",
    dependsOn: ["node-registration"],
    submit: (ctx) => applyTemplate(ctx, "proxy", renderWorkload(ctx, TEMPLATES.proxy)),
    waitReady: (ctx) => waitForWorkload(ctx, "deployment", "proxy", TIMING.DEPLOYMENT_ROLLOUT_TIMEOUT_MS),
  },
];
