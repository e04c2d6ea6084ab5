// provider/types.ts - Provider Interface & Type Definitions
//
// Narrow interfaces over each external control plane. The provisioner,
// sequencer, compute manager and teardown depend only on these; the AWS,
// kubectl and storage API adapters implement them, and tests substitute
// in-memory fakes.

import type {
  NodeRegistrationRequest,
  RegistrationOutcome,
  TenantInfo,
  TimelineInfo,
} from "@pagestack/contracts";
import type { KubeObject } from "./kube/objects";
import type { ExecResult } from "./exec";

export type ProviderName = "aws" | "kubernetes" | "eksctl" | "storage-api";

// =============================================================================
// AWS-side Resources
// =============================================================================

export interface AccountProvider {
  /** Verify credentials and return the caller's account id */
  getAccountId(): Promise<string>;
}

export interface ClusterInfo {
  name: string;
  status: string;
  vpcId?: string;
  /** OIDC issuer URL as reported, including https:// */
  oidcIssuer?: string;
  endpoint?: string;
}

export interface ClusterProvider {
  describeCluster(name: string): Promise<ClusterInfo | null>;
  /** Create from a rendered cluster configuration document; blocks until usable */
  createCluster(name: string, configDocument: string): Promise<void>;
  deleteCluster(name: string): Promise<void>;
  /** Point the local scheduler client at the cluster */
  updateKubeconfig(name: string): Promise<void>;
}

export interface ObjectStoreProvider {
  bucketExists(bucket: string): Promise<boolean>;
  createBucket(bucket: string): Promise<void>;
  /** Enable versioning and the storage lifecycle rule; safe to repeat */
  configureBucket(bucket: string): Promise<void>;
  /** Delete every object version and delete marker; returns how many were removed */
  emptyBucket(bucket: string): Promise<number>;
  deleteBucket(bucket: string): Promise<void>;
}

export interface NetworkProvider {
  findGatewayEndpoint(vpcId: string, serviceName: string): Promise<string | null>;
  /** Create a gateway endpoint attached to all route tables of the VPC */
  createGatewayEndpoint(vpcId: string, serviceName: string): Promise<string>;
  endpointExists(endpointId: string): Promise<boolean>;
  deleteEndpoint(endpointId: string): Promise<void>;
}

export interface PolicyStatement {
  Effect: "Allow" | "Deny";
  Action: string[];
  Resource: string[];
}

export interface PolicyDocument {
  Version: "2012-10-17";
  Statement: PolicyStatement[];
}

export interface PolicyProvider {
  policyArn(accountId: string, name: string): string;
  policyExists(arn: string): Promise<boolean>;
  /** Returns the new policy's ARN */
  createPolicy(name: string, document: PolicyDocument): Promise<string>;
  /** Detach from every principal, drop non-default versions, then delete */
  deletePolicy(arn: string): Promise<void>;
}

export interface ServiceAccountBinding {
  clusterName: string;
  namespace: string;
  name: string;
  policyArn: string;
}

export interface IdentityBindingProvider {
  bindingExists(binding: Omit<ServiceAccountBinding, "policyArn">): Promise<boolean>;
  createBinding(binding: ServiceAccountBinding): Promise<void>;
  deleteBinding(binding: Omit<ServiceAccountBinding, "policyArn">): Promise<void>;
}

export interface RegistryProvider {
  registryUrl(accountId: string, region: string): string;
  repositoryExists(name: string): Promise<boolean>;
  createRepository(name: string): Promise<void>;
  /** Deletes the repository and every image in it */
  deleteRepository(name: string): Promise<void>;
}

// =============================================================================
// Scheduler (Kubernetes)
// =============================================================================

export type ApplySource =
  | { type: "manifest"; content: string; label: string }
  | { type: "objects"; objects: KubeObject[] }
  | { type: "url"; url: string; serverSide?: boolean };

export interface ListOptions {
  namespace?: string;
  labels?: Record<string, string>;
}

export interface DeleteOptions {
  namespace?: string;
  timeoutMs?: number;
}

export interface SchedulerClient {
  /** Idempotent apply */
  apply(source: ApplySource): Promise<void>;
  /** Delete everything a URL manifest created; absent objects are ignored */
  deleteUrl(url: string): Promise<void>;
  get(kind: string, name: string, namespace?: string): Promise<KubeObject | null>;
  list(kind: string, options?: ListOptions): Promise<KubeObject[]>;
  /** Returns false when the object did not exist */
  delete(kind: string, name: string, options?: DeleteOptions): Promise<boolean>;
  exec(pod: string, namespace: string, command: string[], options?: { input?: string }): Promise<ExecResult>;
}

// =============================================================================
// Storage HTTP API (pageserver + storage controller)
// =============================================================================

export type CreateOutcome = "created" | "exists";

export interface StorageApiClient {
  createTenant(tenantId: string): Promise<CreateOutcome>;
  createTimeline(
    tenantId: string,
    timelineId: string,
    options: { pgVersion: number; ancestorTimelineId?: string; ancestorStartLsn?: string }
  ): Promise<CreateOutcome>;
  listTimelines(tenantId: string): Promise<TimelineInfo[]>;
  listTenants(): Promise<TenantInfo[]>;
  deleteTenant(tenantId: string): Promise<void>;
  registerNode(request: NodeRegistrationRequest): Promise<RegistrationOutcome>;
}
