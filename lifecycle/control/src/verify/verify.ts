// verify/verify.ts - Post-deploy health check of the data plane

import { errorMessage } from "@pagestack/contracts";
import type { StateStore } from "../material/state-store";
import { desiredReplicas, loadBalancerHostname, podPhase, pvcPhase } from "../provider/kube/objects";
import type { SchedulerClient } from "../provider/types";
import { PAGESERVER_HTTP_PORT, PAGESERVER_STATEFULSET } from "../registrar/registrar";
import { RunTally, type TallyCounts } from "../workflow/result";

export const VERIFIED_COMPONENTS = ["storage-broker", "safekeeper", "pageserver", "proxy"] as const;

const SAFEKEEPER_STATEFULSET = "safekeeper";
const SAFEKEEPER_HTTP_PORT = 7676;
const BROKER_GRPC_PORT = 50051;

export interface VerifyContext {
  scheduler: SchedulerClient;
  namespace: string;
  state: StateStore;
}

export interface VerifyReport extends TallyCounts {
  ok: boolean;
  failures: string[];
}

async function checkPods(ctx: VerifyContext, tally: RunTally): Promise<void> {
  for (const app of VERIFIED_COMPONENTS) {
    const pods = await ctx.scheduler.list("pod", { namespace: ctx.namespace, labels: { app } });
    if (pods.length === 0) {
      tally.fail(`${app}: no pods found`);
      continue;
    }
    for (const pod of pods) {
      const phase = podPhase(pod);
      if (phase === "Running") tally.pass(`${pod.metadata.name} Running`);
      else tally.fail(`${pod.metadata.name} ${phase}`);
    }
  }

  const computes = await ctx.scheduler.list("pod", { namespace: ctx.namespace, labels: { app: "compute" } });
  if (computes.length === 0) {
    tally.warn("No compute pods (create one with `pagestack compute create`)");
  }
  for (const pod of computes) {
    const phase = podPhase(pod);
    if (phase === "Running") tally.pass(`${pod.metadata.name} Running`);
    else tally.fail(`${pod.metadata.name} ${phase}`);
  }
}

async function checkVolumes(ctx: VerifyContext, tally: RunTally): Promise<void> {
  const claims = await ctx.scheduler.list("pvc", { namespace: ctx.namespace });
  if (claims.length === 0) {
    tally.fail("No PVCs found");
    return;
  }
  for (const claim of claims) {
    const phase = pvcPhase(claim);
    if (phase === "Bound") tally.pass(`${claim.metadata.name} Bound`);
    else tally.fail(`${claim.metadata.name} ${phase}`);
  }
}

async function checkServices(ctx: VerifyContext, tally: RunTally): Promise<void> {
  for (const name of VERIFIED_COMPONENTS) {
    const service = await ctx.scheduler.get("service", name, ctx.namespace);
    if (!service) {
      tally.fail(`${name} service not found`);
      continue;
    }
    tally.pass(`${name} service exists`);
    if (name === "proxy") {
      const hostname = loadBalancerHostname(service);
      if (hostname) tally.pass(`Proxy load balancer: ${hostname}`);
      else tally.warn("Proxy load balancer not yet provisioned");
    }
  }
}

async function execSucceeds(ctx: VerifyContext, pod: string, command: string[]): Promise<boolean> {
  try {
    const result = await ctx.scheduler.exec(pod, ctx.namespace, command);
    return result.exitCode === 0;
  } catch (err) {
    console.warn(`[verify] exec in ${pod} failed: ${errorMessage(err)}`);
    return false;
  }
}

async function checkStatusApi(ctx: VerifyContext, tally: RunTally, pod: string, port: number): Promise<boolean> {
  const up = await execSucceeds(ctx, pod, ["curl", "-sf", `http://localhost:${port}/v1/status`]);
  if (up) tally.pass(`${pod} API responding`);
  else tally.fail(`${pod} API not responding`);
  return up;
}

/** Check the status API of every replica the StatefulSet declares; true if any answered */
async function checkReplicaApis(ctx: VerifyContext, tally: RunTally, statefulSetName: string, port: number): Promise<boolean> {
  const statefulSet = await ctx.scheduler.get("statefulset", statefulSetName, ctx.namespace);
  if (!statefulSet) {
    tally.fail(`${statefulSetName} StatefulSet not found`);
    return false;
  }
  let anyUp = false;
  for (let i = 0; i < desiredReplicas(statefulSet); i++) {
    if (await checkStatusApi(ctx, tally, `${statefulSetName}-${i}`, port)) anyUp = true;
  }
  return anyUp;
}

async function checkEndpoints(ctx: VerifyContext, tally: RunTally): Promise<void> {
  const pageserverUp = await checkReplicaApis(ctx, tally, PAGESERVER_STATEFULSET, PAGESERVER_HTTP_PORT);
  await checkReplicaApis(ctx, tally, SAFEKEEPER_STATEFULSET, SAFEKEEPER_HTTP_PORT);

  const brokers = await ctx.scheduler.list("pod", { namespace: ctx.namespace, labels: { app: "storage-broker" } });
  const broker = brokers[0];
  if (!broker) {
    tally.fail("storage-broker pod not found");
  } else {
    const open = await execSucceeds(ctx, broker.metadata.name, [
      "bash", "-c", `echo > /dev/tcp/localhost/${BROKER_GRPC_PORT}`,
    ]);
    if (open) tally.pass("storage-broker gRPC port open");
    else tally.fail("storage-broker gRPC port not responding");
  }

  const bucket = ctx.state.get("S3_BUCKET");
  if (!bucket) {
    tally.warn("S3_BUCKET not recorded, skipping object storage check");
  } else if (pageserverUp) {
    tally.pass(`Pageserver running against bucket ${bucket}`);
  } else {
    tally.warn(`Could not confirm access to bucket ${bucket}`);
  }
}

export async function verifyDeployment(ctx: VerifyContext): Promise<VerifyReport> {
  const tally = new RunTally("verify");

  console.log("[verify] Pods");
  await checkPods(ctx, tally);
  console.log("[verify] Persistent volume claims");
  await checkVolumes(ctx, tally);
  console.log("[verify] Services");
  await checkServices(ctx, tally);
  console.log("[verify] Health endpoints");
  await checkEndpoints(ctx, tally);

  console.log(`[verify] Results: ${tally.summary()}`);
  if (!tally.ok) {
    console.log(`[verify] Troubleshooting: kubectl describe pods -n ${ctx.namespace}`);
  }
  return { ...tally.totals, ok: tally.ok, failures: [...tally.failures] };
}
