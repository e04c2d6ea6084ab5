// tests/unit/aws-providers.test.ts - AWS adapters against mocked SDK clients
//
// aws-sdk-client-mock replaces send() on every instance of a client class, so
// the providers construct their clients as usual.

import { describe, test, expect, beforeEach } from "vitest";
import { mockClient } from "aws-sdk-client-mock";
import {
  S3Client,
  HeadBucketCommand,
  CreateBucketCommand,
  PutBucketVersioningCommand,
  PutBucketLifecycleConfigurationCommand,
  ListObjectVersionsCommand,
  DeleteObjectsCommand,
} from "@aws-sdk/client-s3";
import { ECRClient, DescribeRepositoriesCommand } from "@aws-sdk/client-ecr";
import {
  EC2Client,
  DescribeRouteTablesCommand,
  CreateVpcEndpointCommand,
  DescribeVpcEndpointsCommand,
} from "@aws-sdk/client-ec2";
import {
  IAMClient,
  ListEntitiesForPolicyCommand,
  DetachRolePolicyCommand,
  ListPolicyVersionsCommand,
  DeletePolicyVersionCommand,
  DeletePolicyCommand,
} from "@aws-sdk/client-iam";
import { EKSClient, DescribeClusterCommand } from "@aws-sdk/client-eks";
import { STSClient, GetCallerIdentityCommand } from "@aws-sdk/client-sts";
import {
  EcrRegistryProvider,
  Ec2NetworkProvider,
  EksClusterProvider,
  EksctlIdentityProvider,
  IamPolicyProvider,
  S3ObjectStoreProvider,
  StsAccountProvider,
  bucketAccessPolicy,
} from "../../control/src/provider/aws";
import { mapAwsError } from "../../control/src/provider/errors";
import type { ExecOptions, ExecResult } from "../../control/src/provider/exec";
import { MemoryStateStore } from "../../control/src/material/state-store";
import { bucketDescriptor } from "../../control/src/provision/descriptors";
import { ensure } from "../../control/src/provision/provisioner";
import { ManualClock } from "../mock-providers";

function awsError(name: string, message = name): Error {
  const err = new Error(message);
  err.name = name;
  return err;
}

// =============================================================================
// Error mapping
// =============================================================================

describe("mapAwsError", () => {
  test("classifies by error name", () => {
    expect(mapAwsError(awsError("NoSuchBucket"))).toMatchObject({ code: "NOT_FOUND", retryable: false });
    expect(mapAwsError(awsError("BucketAlreadyOwnedByYou"))).toMatchObject({ code: "ALREADY_EXISTS" });
    expect(mapAwsError(awsError("BucketAlreadyExists"))).toMatchObject({ code: "INVALID_STATE" });
    expect(mapAwsError(awsError("ThrottlingException"))).toMatchObject({
      code: "RATE_LIMIT_ERROR",
      retryable: true,
      retry_after_ms: 5000,
    });
    expect(mapAwsError(awsError("ExpiredToken"))).toMatchObject({ code: "AUTH_ERROR" });
  });

  test("falls back to the HTTP status", () => {
    const err = Object.assign(awsError("Unknown"), { $metadata: { httpStatusCode: 503 } });
    expect(mapAwsError(err)).toMatchObject({ code: "PROVIDER_INTERNAL", retryable: true });
  });
});

// =============================================================================
// S3
// =============================================================================

describe("S3ObjectStoreProvider", () => {
  const s3 = mockClient(S3Client);
  beforeEach(() => s3.reset());

  test("bucketExists maps a 404 to false", async () => {
    s3.on(HeadBucketCommand).rejects(Object.assign(awsError("NotFound"), { $metadata: { httpStatusCode: 404 } }));
    expect(await new S3ObjectStoreProvider("us-west-2").bucketExists("demo")).toBe(false);

    s3.on(HeadBucketCommand).resolves({});
    expect(await new S3ObjectStoreProvider("us-west-2").bucketExists("demo")).toBe(true);
  });

  test("createBucket only creates, in the configured location", async () => {
    s3.on(CreateBucketCommand).resolves({});
    await new S3ObjectStoreProvider("us-west-2").createBucket("demo");

    expect(s3.commandCalls(CreateBucketCommand)[0]?.args[0].input).toEqual({
      Bucket: "demo",
      CreateBucketConfiguration: { LocationConstraint: "us-west-2" },
    });
    expect(s3.commandCalls(PutBucketVersioningCommand)).toHaveLength(0);
    expect(s3.commandCalls(PutBucketLifecycleConfigurationCommand)).toHaveLength(0);
  });

  test("configureBucket enables versioning and the lifecycle rule", async () => {
    await new S3ObjectStoreProvider("us-west-2").configureBucket("demo");

    expect(s3.commandCalls(PutBucketVersioningCommand)[0]?.args[0].input.VersioningConfiguration).toEqual({
      Status: "Enabled",
    });
    const rules = s3.commandCalls(PutBucketLifecycleConfigurationCommand)[0]?.args[0].input.LifecycleConfiguration?.Rules;
    expect(rules?.[0]?.Transitions).toEqual([{ Days: 30, StorageClass: "INTELLIGENT_TIERING" }]);
    expect(rules?.[0]?.NoncurrentVersionExpiration).toEqual({ NoncurrentDays: 7 });
  });

  test("a throttled versioning call after creation still ends configured", async () => {
    s3.on(HeadBucketCommand).rejects(Object.assign(awsError("NotFound"), { $metadata: { httpStatusCode: 404 } }));
    s3.on(CreateBucketCommand).resolves({});
    s3.on(PutBucketVersioningCommand).rejectsOnce(awsError("SlowDown")).resolves({});
    s3.on(PutBucketLifecycleConfigurationCommand).resolves({});
    const clock = new ManualClock();

    const result = await ensure(
      bucketDescriptor(new S3ObjectStoreProvider("us-west-2"), "demo"),
      new MemoryStateStore(),
      { clock }
    );

    expect(result.outcome).toBe("created");
    expect(s3.commandCalls(CreateBucketCommand)).toHaveLength(1);
    expect(s3.commandCalls(PutBucketVersioningCommand)).toHaveLength(2);
    expect(s3.commandCalls(PutBucketLifecycleConfigurationCommand)).toHaveLength(1);
    expect(clock.sleeps).toEqual([5000]);
  });

  test("us-east-1 buckets carry no location constraint", async () => {
    await new S3ObjectStoreProvider("us-east-1").createBucket("demo");
    expect(s3.commandCalls(CreateBucketCommand)[0]?.args[0].input).toEqual({ Bucket: "demo" });
  });

  test("emptyBucket deletes every version and delete marker across pages", async () => {
    s3.on(ListObjectVersionsCommand)
      .resolvesOnce({
        Versions: [{ Key: "a", VersionId: "1" }, { Key: "a", VersionId: "2" }],
        IsTruncated: true,
        NextKeyMarker: "a",
        NextVersionIdMarker: "2",
      })
      .resolvesOnce({ DeleteMarkers: [{ Key: "b", VersionId: "3" }], IsTruncated: false });
    s3.on(DeleteObjectsCommand).resolves({});

    expect(await new S3ObjectStoreProvider("us-west-2").emptyBucket("demo")).toBe(3);
    expect(s3.commandCalls(ListObjectVersionsCommand)[1]?.args[0].input).toMatchObject({
      KeyMarker: "a",
      VersionIdMarker: "2",
    });
    expect(s3.commandCalls(DeleteObjectsCommand)[1]?.args[0].input.Delete?.Objects).toEqual([
      { Key: "b", VersionId: "3" },
    ]);
  });

  test("partial delete failures are reported", async () => {
    s3.on(ListObjectVersionsCommand).resolves({ Versions: [{ Key: "a", VersionId: "1" }] });
    s3.on(DeleteObjectsCommand).resolves({ Errors: [{ Key: "a", Code: "AccessDenied" }] });
    await expect(new S3ObjectStoreProvider("us-west-2").emptyBucket("demo")).rejects.toThrow(
      "Failed to delete 1 object versions from demo: a AccessDenied"
    );
  });
});

// =============================================================================
// ECR, EC2, IAM, EKS, STS
// =============================================================================

describe("EcrRegistryProvider", () => {
  const ecr = mockClient(ECRClient);
  beforeEach(() => ecr.reset());

  test("a missing repository is not an error", async () => {
    ecr.on(DescribeRepositoriesCommand).rejects(awsError("RepositoryNotFoundException"));
    const registry = new EcrRegistryProvider("us-west-2");
    expect(await registry.repositoryExists("neon/proxy")).toBe(false);
    expect(registry.registryUrl("123456789012", "us-west-2")).toBe("123456789012.dkr.ecr.us-west-2.amazonaws.com");
  });
});

describe("Ec2NetworkProvider", () => {
  const ec2 = mockClient(EC2Client);
  beforeEach(() => ec2.reset());

  test("a gateway endpoint is attached to every route table of the VPC", async () => {
    ec2.on(DescribeRouteTablesCommand).resolves({ RouteTables: [{ RouteTableId: "rtb-1" }, { RouteTableId: "rtb-2" }] });
    ec2.on(CreateVpcEndpointCommand).resolves({ VpcEndpoint: { VpcEndpointId: "vpce-123" } });

    const id = await new Ec2NetworkProvider("us-west-2").createGatewayEndpoint("vpc-1", "com.amazonaws.us-west-2.s3");
    expect(id).toBe("vpce-123");
    expect(ec2.commandCalls(CreateVpcEndpointCommand)[0]?.args[0].input).toEqual({
      VpcId: "vpc-1",
      ServiceName: "com.amazonaws.us-west-2.s3",
      VpcEndpointType: "Gateway",
      RouteTableIds: ["rtb-1", "rtb-2"],
    });
  });

  test("a VPC without route tables cannot get an endpoint", async () => {
    ec2.on(DescribeRouteTablesCommand).resolves({ RouteTables: [] });
    await expect(
      new Ec2NetworkProvider("us-west-2").createGatewayEndpoint("vpc-1", "com.amazonaws.us-west-2.s3")
    ).rejects.toMatchObject({ code: "INVALID_STATE" });
  });

  test("deleted endpoints do not count as existing", async () => {
    ec2.on(DescribeVpcEndpointsCommand).resolves({ VpcEndpoints: [{ VpcEndpointId: "vpce-1", State: "Deleted" }] });
    expect(await new Ec2NetworkProvider("us-west-2").endpointExists("vpce-1")).toBe(false);
  });
});

describe("IamPolicyProvider", () => {
  const iam = mockClient(IAMClient);
  beforeEach(() => iam.reset());

  test("bucketAccessPolicy covers the bucket and its objects", () => {
    expect(bucketAccessPolicy("demo").Statement[0]?.Resource).toEqual(["arn:aws:s3:::demo", "arn:aws:s3:::demo/*"]);
  });

  test("deletePolicy detaches roles and removes old versions first", async () => {
    const arn = "arn:aws:iam::123456789012:policy/demo";
    iam.on(ListEntitiesForPolicyCommand).resolves({ PolicyRoles: [{ RoleName: "pageserver-role" }] });
    iam.on(ListPolicyVersionsCommand).resolves({
      Versions: [
        { VersionId: "v1", IsDefaultVersion: false },
        { VersionId: "v2", IsDefaultVersion: true },
      ],
    });

    await new IamPolicyProvider("us-west-2").deletePolicy(arn);
    expect(iam.commandCalls(DetachRolePolicyCommand)[0]?.args[0].input).toEqual({
      RoleName: "pageserver-role",
      PolicyArn: arn,
    });
    expect(iam.commandCalls(DeletePolicyVersionCommand).map((c) => c.args[0].input.VersionId)).toEqual(["v1"]);
    expect(iam.commandCalls(DeletePolicyCommand)).toHaveLength(1);
  });
});

describe("EksClusterProvider", () => {
  const eks = mockClient(EKSClient);
  beforeEach(() => eks.reset());

  test("describeCluster extracts the VPC and OIDC issuer", async () => {
    eks.on(DescribeClusterCommand).resolves({
      cluster: {
        name: "demo-cluster",
        status: "ACTIVE",
        resourcesVpcConfig: { vpcId: "vpc-1" },
        identity: { oidc: { issuer: "https://oidc.example.com/id/ABC" } },
      },
    });
    const info = await new EksClusterProvider({ region: "us-west-2" }).describeCluster("demo-cluster");
    expect(info).toMatchObject({ name: "demo-cluster", vpcId: "vpc-1", oidcIssuer: "https://oidc.example.com/id/ABC" });
  });

  test("a missing cluster is null", async () => {
    eks.on(DescribeClusterCommand).rejects(awsError("ResourceNotFoundException"));
    expect(await new EksClusterProvider({ region: "us-west-2" }).describeCluster("gone")).toBeNull();
  });

  test("creation pipes the cluster config to eksctl", async () => {
    const calls: Array<{ command: string[]; options?: ExecOptions }> = [];
    const exec = async (command: string[], options?: ExecOptions): Promise<ExecResult> => {
      calls.push({ command, options });
      return { exitCode: 0, stdout: "", stderr: "" };
    };
    await new EksClusterProvider({ region: "us-west-2", _execFactory: exec }).createCluster("demo", "kind: ClusterConfig");

    expect(calls[0]?.command).toEqual(["eksctl", "create", "cluster", "-f", "-"]);
    expect(calls[0]?.options?.input).toBe("kind: ClusterConfig");
  });
});

describe("EksctlIdentityProvider", () => {
  const binding = { clusterName: "demo-cluster", namespace: "neon", name: "pageserver-sa" };

  test("bindingExists reads eksctl's JSON listing", async () => {
    let stdout = "[]";
    const exec = async (): Promise<ExecResult> => ({ exitCode: 0, stdout, stderr: "" });
    const identity = new EksctlIdentityProvider({ region: "us-west-2", _execFactory: exec });

    expect(await identity.bindingExists(binding)).toBe(false);
    stdout = JSON.stringify([{ metadata: { name: "pageserver-sa" } }]);
    expect(await identity.bindingExists(binding)).toBe(true);
  });

  test("a not-found error from eksctl means no binding", async () => {
    const exec = async (): Promise<ExecResult> => ({
      exitCode: 1,
      stdout: "",
      stderr: "Error: no iamserviceaccounts found: not found",
    });
    const identity = new EksctlIdentityProvider({ region: "us-west-2", _execFactory: exec });
    expect(await identity.bindingExists(binding)).toBe(false);
  });
});

describe("StsAccountProvider", () => {
  const sts = mockClient(STSClient);
  beforeEach(() => sts.reset());

  test("returns the caller's account", async () => {
    sts.on(GetCallerIdentityCommand).resolves({ Account: "123456789012" });
    expect(await new StsAccountProvider("us-west-2").getAccountId()).toBe("123456789012");
  });

  test("invalid credentials are an auth error", async () => {
    sts.on(GetCallerIdentityCommand).rejects(awsError("InvalidClientTokenId"));
    await expect(new StsAccountProvider("us-west-2").getAccountId()).rejects.toMatchObject({ code: "AUTH_ERROR" });
  });
});
