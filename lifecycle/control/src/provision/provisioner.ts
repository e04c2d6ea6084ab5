// provision/provisioner.ts - Resource Provisioner
//
// Check-then-create for every cloud resource, recording each identifier in
// the state store as soon as it is known. Fail-fast: any error that is not
// "already exists" aborts the run, and re-running resumes from state.

import { PreconditionError, formatDuration } from "@pagestack/contracts";
import { resourceNames, type DeployConfig } from "../config";
import { IMAGE_REPOSITORIES, PAGESERVER_SERVICE_ACCOUNT, TEMPLATES, renderNamespaced } from "../deploy/manifests";
import { renderFile } from "../deploy/templater";
import type { StateStore } from "../material/state-store";
import { bucketAccessPolicy, s3ServiceName, type AwsProviders } from "../provider/aws";
import { isAlreadyExists } from "../provider/errors";
import type { ClusterInfo, SchedulerClient } from "../provider/types";
import { systemClock, type Clock } from "../workflow/clock";
import { withRetry } from "../workflow/retry";
import {
  bucketDescriptor,
  clusterDescriptor,
  endpointDescriptor,
  identityDescriptor,
  policyDescriptor,
  registryDescriptor,
  type ResourceDescriptor,
} from "./descriptors";

// =============================================================================
// ensure()
// =============================================================================

export type EnsureOutcome = "existing" | "created";

export interface EnsureResult {
  resource: string;
  identifier: string;
  outcome: EnsureOutcome;
}

/**
 * Make a resource exist and record its identifier. An existing resource is
 * re-recorded (the state file may have been lost) and left untouched apart
 * from the descriptor's configure step, which runs on every ensure so a
 * creation interrupted before its settings were applied is completed later.
 */
export async function ensure(
  descriptor: ResourceDescriptor,
  state: StateStore,
  options?: { clock?: Clock }
): Promise<EnsureResult> {
  const check = () => withRetry(`check ${descriptor.name}`, () => descriptor.check(), options);

  const record = async (identifier: string, outcome: EnsureOutcome): Promise<EnsureResult> => {
    state.set(descriptor.stateKey, identifier);
    if (descriptor.configure) {
      await withRetry(`configure ${descriptor.name}`, async () => {
        await descriptor.configure?.(identifier);
      }, options);
    }
    return { resource: descriptor.name, identifier, outcome };
  };

  const existing = await check();
  if (existing) {
    console.log(`[provision] ${descriptor.name} already exists (${existing}), skipping`);
    return record(existing, "existing");
  }

  console.log(`[provision] Creating ${descriptor.name}...`);
  let identifier: string;
  try {
    identifier = await withRetry(`create ${descriptor.name}`, () => descriptor.create(), options);
  } catch (err) {
    // Lost a race with another creator, or a previous run got further than state shows
    if (!isAlreadyExists(err)) throw err;
    const found = await check();
    if (!found) throw err;
    console.log(`[provision] ${descriptor.name} already exists (${found})`);
    return record(found, "existing");
  }

  console.log(`[provision] Created ${descriptor.name} (${identifier})`);
  return record(identifier, "created");
}

// =============================================================================
// Full Provisioning Run
// =============================================================================

export interface ProvisionContext {
  config: DeployConfig;
  aws: AwsProviders;
  scheduler: SchedulerClient;
  state: StateStore;
  env?: NodeJS.ProcessEnv;
  clock?: Clock;
  manifestDir?: string;
}

export interface ProvisionReport {
  results: EnsureResult[];
  elapsedMs: number;
}

export function assertAwsCredentials(env: NodeJS.ProcessEnv): void {
  const missing = ["AWS_ACCESS_KEY_ID", "AWS_SECRET_ACCESS_KEY"].filter((name) => !env[name]);
  if (missing.length > 0) {
    throw new PreconditionError(`AWS credentials not set: ${missing.join(", ")}`, {
      code: "CREDENTIALS_MISSING",
      details: { missing },
      hint: "export AWS_ACCESS_KEY_ID=... AWS_SECRET_ACCESS_KEY=...",
    });
  }
}

async function describeProvisionedCluster(ctx: ProvisionContext, clusterName: string): Promise<ClusterInfo> {
  const info = await withRetry(`describe ${clusterName}`, () => ctx.aws.cluster.describeCluster(clusterName), ctx);
  if (!info) {
    throw new PreconditionError(`EKS cluster ${clusterName} disappeared after provisioning`, {
      code: "CLUSTER_MISSING",
      hint: "pagestack provision",
    });
  }
  return info;
}

export async function provisionInfrastructure(ctx: ProvisionContext): Promise<ProvisionReport> {
  const { config, aws, state } = ctx;
  const clock = ctx.clock ?? systemClock;
  const start = clock.now();
  const names = resourceNames(config);
  const s3Backed = config.storageBackend === "aws-s3";
  const results: EnsureResult[] = [];

  assertAwsCredentials(ctx.env ?? process.env);
  const accountId = await withRetry("get caller identity", () => aws.account.getAccountId(), ctx);
  console.log(`[provision] Account ${accountId}, region ${config.region}, backend ${config.storageBackend}`);
  state.set("ACCOUNT_ID", accountId);
  state.set("PREFIX", config.prefix);
  state.set("REGION", config.region);
  state.set("STORAGE_BACKEND", config.storageBackend);

  // Cluster first: the endpoint, identity binding and namespace all hang off it
  results.push(await ensure(
    clusterDescriptor(aws.cluster, names.clusterName, () =>
      renderFile(TEMPLATES.clusterConfig, { CLUSTER_NAME: names.clusterName, REGION: config.region }, {}, ctx.manifestDir)
    ),
    state,
    ctx
  ));
  await aws.cluster.updateKubeconfig(names.clusterName);

  if (s3Backed) {
    results.push(await ensure(bucketDescriptor(aws.objectStore, names.bucketName), state, ctx));
  }

  const cluster = await describeProvisionedCluster(ctx, names.clusterName);
  if (!cluster.vpcId) {
    throw new PreconditionError(`EKS cluster ${names.clusterName} reports no VPC`, { code: "CLUSTER_VPC_MISSING" });
  }
  state.set("VPC_ID", cluster.vpcId);

  if (s3Backed) {
    results.push(await ensure(endpointDescriptor(aws.network, cluster.vpcId, s3ServiceName(config.region)), state, ctx));
    results.push(await ensure(
      policyDescriptor(aws.policy, accountId, names.policyName, bucketAccessPolicy(names.bucketName)),
      state,
      ctx
    ));
  }

  if (cluster.oidcIssuer) {
    state.set("OIDC_PROVIDER", cluster.oidcIssuer.replace(/^https:\/\//, ""));
  }

  await ctx.scheduler.apply({
    type: "manifest",
    label: "namespace",
    content: renderNamespaced(config.namespace, TEMPLATES.namespace, ctx.manifestDir),
  });

  if (s3Backed) {
    results.push(await ensure(
      identityDescriptor(aws.identity, {
        clusterName: names.clusterName,
        namespace: config.namespace,
        name: PAGESERVER_SERVICE_ACCOUNT,
        policyArn: state.require("IAM_POLICY_ARN"),
      }),
      state,
      ctx
    ));
  }

  results.push(await ensure(
    registryDescriptor(aws.registry, accountId, config.region, IMAGE_REPOSITORIES),
    state,
    ctx
  ));

  await ctx.scheduler.apply({
    type: "manifest",
    label: "storage-classes",
    content: renderNamespaced(config.namespace, TEMPLATES.storageClasses, ctx.manifestDir),
  });

  const elapsedMs = clock.now() - start;
  const created = results.filter((r) => r.outcome === "created").length;
  console.log(
    `[provision] Complete in ${formatDuration(elapsedMs)}: ` +
    `${created} created, ${results.length - created} already present`
  );
  return { results, elapsedMs };
}
