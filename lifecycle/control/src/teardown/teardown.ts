// teardown/teardown.ts - Teardown Orchestrator
//
// Reverses provisioning in dependency order. Every step checks existence
// first, treats "not found" as success, and failures are counted rather than
// aborting, so one run removes as much as it can. The state file is removed
// only when every step succeeded; otherwise a re-run picks up the rest.

import { TIMING, errorMessage, isStorageBackend, type StorageBackend } from "@pagestack/contracts";
import { resourceNames, type DeployConfig } from "../config";
import { CNPG_MANIFEST_URL, CNPG_NAMESPACE, IMAGE_REPOSITORIES, PAGESERVER_SERVICE_ACCOUNT } from "../deploy/manifests";
import type { StateStore } from "../material/state-store";
import type { AwsProviders } from "../provider/aws";
import { ProviderOperationError } from "../provider/errors";
import type { SchedulerClient } from "../provider/types";
import { RunTally, runStep, type StepOutcome } from "../workflow/result";

export interface TeardownContext {
  config: DeployConfig;
  aws: AwsProviders;
  scheduler: SchedulerClient;
  state: StateStore;
}

export interface TeardownOptions {
  /** Must resolve true (the operator typed "yes") for anything to happen */
  confirm: () => Promise<boolean>;
}

export interface TeardownReport {
  declined: boolean;
  steps: StepOutcome[];
  passed: number;
  failed: number;
  warnings: number;
  stateCleared: boolean;
}

function backendOf(ctx: TeardownContext): StorageBackend {
  const recorded = ctx.state.get("STORAGE_BACKEND");
  return recorded && isStorageBackend(recorded) ? recorded : ctx.config.storageBackend;
}

export async function teardownAll(ctx: TeardownContext, options: TeardownOptions): Promise<TeardownReport> {
  if (!(await options.confirm())) {
    console.log("[teardown] Aborted, nothing deleted");
    return { declined: true, steps: [], passed: 0, failed: 0, warnings: 0, stateCleared: false };
  }

  const { aws, scheduler, state, config } = ctx;
  const backend = backendOf(ctx);
  const names = resourceNames({ prefix: state.get("PREFIX") ?? config.prefix, storageBackend: backend });
  const s3Backed = backend === "aws-s3";
  const clusterName = state.get("CLUSTER_NAME") ?? names.clusterName;
  const tally = new RunTally("teardown");
  const steps: StepOutcome[] = [];

  const step = async (name: string, fn: () => Promise<"done" | "absent" | "skipped" | void>): Promise<void> => {
    const outcome = await runStep(name, fn);
    steps.push(outcome);
    tally.record(outcome);
  };

  await step(`namespace ${config.namespace}`, async () => {
    const namespace = await scheduler.get("namespace", config.namespace);
    if (!namespace) return "absent";
    try {
      await scheduler.delete("namespace", config.namespace, { timeoutMs: TIMING.NAMESPACE_DELETE_TIMEOUT_MS });
    } catch (err) {
      // Only the wait expired: deletion was requested and finalizers may keep it terminating
      if (!(err instanceof ProviderOperationError) || err.code !== "TIMEOUT_ERROR") throw err;
      tally.warn(`namespace ${config.namespace} may still be terminating: ${errorMessage(err)}`);
    }
  });

  await step("metadata database operator", async () => {
    if (!(await scheduler.get("namespace", CNPG_NAMESPACE))) return "absent";
    await scheduler.deleteUrl(CNPG_MANIFEST_URL);
  });

  if (s3Backed) {
    await step(`IRSA service account ${PAGESERVER_SERVICE_ACCOUNT}`, async () => {
      const binding = { clusterName, namespace: config.namespace, name: PAGESERVER_SERVICE_ACCOUNT };
      if (!(await aws.identity.bindingExists(binding))) return "absent";
      await aws.identity.deleteBinding(binding);
    });

    await step("VPC endpoint", async () => {
      const endpointId = state.get("VPC_ENDPOINT_ID");
      if (!endpointId || !(await aws.network.endpointExists(endpointId))) return "absent";
      await aws.network.deleteEndpoint(endpointId);
    });
  }

  await step(`EKS cluster ${clusterName}`, async () => {
    if (!(await aws.cluster.describeCluster(clusterName))) return "absent";
    console.log("[teardown] Deleting the cluster takes 10-15 minutes");
    await aws.cluster.deleteCluster(clusterName);
  });

  for (const repo of IMAGE_REPOSITORIES) {
    await step(`ECR repository ${repo}`, async () => {
      if (!(await aws.registry.repositoryExists(repo))) return "absent";
      await aws.registry.deleteRepository(repo);
    });
  }

  if (s3Backed) {
    const bucket = state.get("S3_BUCKET") ?? names.bucketName;
    await step(`S3 bucket ${bucket}`, async () => {
      if (!(await aws.objectStore.bucketExists(bucket))) return "absent";
      const removed = await aws.objectStore.emptyBucket(bucket);
      console.log(`[teardown] Removed ${removed} object versions from ${bucket}`);
      await aws.objectStore.deleteBucket(bucket);
    });

    await step("IAM policy", async () => {
      const accountId = state.get("ACCOUNT_ID");
      const arn = state.get("IAM_POLICY_ARN") ?? (accountId ? aws.policy.policyArn(accountId, names.policyName) : undefined);
      if (!arn || !(await aws.policy.policyExists(arn))) return "absent";
      await aws.policy.deletePolicy(arn);
    });
  } else {
    console.log("[teardown] MinIO backend: bucket, endpoint, policy and IRSA were never provisioned");
  }

  const totals = tally.totals;
  let stateCleared = false;
  if (tally.ok) {
    state.clear();
    stateCleared = true;
    console.log("[teardown] Complete, state removed");
  } else {
    console.error(`[teardown] ${totals.failed} step(s) failed; state kept so a re-run can finish`);
  }
  console.log(`[teardown] ${tally.summary()}`);

  return { declined: false, steps, ...totals, stateCleared };
}
