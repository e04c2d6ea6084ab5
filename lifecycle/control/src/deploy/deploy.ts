// deploy/deploy.ts - Bring up the fixed topology and report the proxy endpoint

import { formatDuration } from "@pagestack/contracts";
import { loadBalancerHostname } from "../provider/kube/objects";
import { DeploymentSequencer, type DeploymentReport, type Stage, type StageContext, type StageTransition } from "./sequencer";
import { DEPLOYMENT_STAGES } from "./stages";

export interface DeployResult extends DeploymentReport {
  /** Load balancer hostname of the proxy, once AWS has assigned one */
  proxyHostname?: string;
}

function logTransition(t: StageTransition): void {
  const detail = t.detail ? ` (${t.detail})` : "";
  if (t.to === "failed") console.error(`[deploy] ${t.stage}: FAILED${detail}`);
  else console.log(`[deploy] ${t.stage}: ${t.to}${detail}`);
}

export async function deployDataPlane(
  ctx: StageContext,
  stages: Stage[] = DEPLOYMENT_STAGES
): Promise<DeployResult> {
  // Every workload template needs these; fail before the first apply
  ctx.state.require("ECR_REGISTRY");
  ctx.state.require("REGION");
  if (ctx.backend === "aws-s3") ctx.state.require("S3_BUCKET");

  const sequencer = new DeploymentSequencer(stages, logTransition);
  const report = await sequencer.apply(ctx);
  console.log(`[deploy] All stages complete in ${formatDuration(report.elapsedMs)}`);

  const proxy = await ctx.scheduler.get("service", "proxy", ctx.namespace);
  const proxyHostname = proxy ? loadBalancerHostname(proxy) : undefined;
  if (proxyHostname) {
    console.log(`[deploy] Proxy endpoint: ${proxyHostname}:5432`);
  } else {
    console.log(`[deploy] Proxy load balancer still provisioning; check: kubectl get svc proxy -n ${ctx.namespace}`);
  }
  return { ...report, ...(proxyHostname ? { proxyHostname } : {}) };
}
