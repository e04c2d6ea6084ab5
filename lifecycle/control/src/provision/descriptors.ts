// provision/descriptors.ts - Resource descriptors for each provisioned class
//
// A descriptor pairs a side-effect-free check with a create. The check
// returns the identifier recorded under the descriptor's state key, or null
// when the resource does not exist yet.

import type { StateKey } from "@pagestack/contracts";
import { isAlreadyExists } from "../provider/errors";
import type {
  ClusterProvider,
  IdentityBindingProvider,
  NetworkProvider,
  ObjectStoreProvider,
  PolicyDocument,
  PolicyProvider,
  RegistryProvider,
  ServiceAccountBinding,
} from "../provider/types";

export interface ResourceDescriptor {
  /** Human-readable resource label for logs */
  name: string;
  stateKey: StateKey;
  check(): Promise<string | null>;
  /** Returns the identifier of the created resource */
  create(): Promise<string>;
  /** Idempotent settings, applied after every ensure whether found or created */
  configure?(identifier: string): Promise<void>;
}

export function clusterDescriptor(
  cluster: ClusterProvider,
  clusterName: string,
  renderConfig: () => string
): ResourceDescriptor {
  return {
    name: `EKS cluster ${clusterName}`,
    stateKey: "CLUSTER_NAME",
    check: async () => ((await cluster.describeCluster(clusterName)) ? clusterName : null),
    create: async () => {
      await cluster.createCluster(clusterName, renderConfig());
      return clusterName;
    },
  };
}

export function bucketDescriptor(objectStore: ObjectStoreProvider, bucket: string): ResourceDescriptor {
  return {
    name: `S3 bucket ${bucket}`,
    stateKey: "S3_BUCKET",
    check: async () => ((await objectStore.bucketExists(bucket)) ? bucket : null),
    create: async () => {
      await objectStore.createBucket(bucket);
      return bucket;
    },
    configure: (name) => objectStore.configureBucket(name),
  };
}

export function endpointDescriptor(
  network: NetworkProvider,
  vpcId: string,
  serviceName: string
): ResourceDescriptor {
  return {
    name: `VPC endpoint ${serviceName}`,
    stateKey: "VPC_ENDPOINT_ID",
    check: () => network.findGatewayEndpoint(vpcId, serviceName),
    create: () => network.createGatewayEndpoint(vpcId, serviceName),
  };
}

export function policyDescriptor(
  policy: PolicyProvider,
  accountId: string,
  policyName: string,
  document: PolicyDocument
): ResourceDescriptor {
  const arn = policy.policyArn(accountId, policyName);
  return {
    name: `IAM policy ${policyName}`,
    stateKey: "IAM_POLICY_ARN",
    check: async () => ((await policy.policyExists(arn)) ? arn : null),
    create: () => policy.createPolicy(policyName, document),
  };
}

export function identityDescriptor(
  identity: IdentityBindingProvider,
  binding: ServiceAccountBinding
): ResourceDescriptor {
  const id = `${binding.namespace}/${binding.name}`;
  return {
    name: `IRSA service account ${id}`,
    stateKey: "IRSA_SERVICE_ACCOUNT",
    check: async () => ((await identity.bindingExists(binding)) ? id : null),
    create: async () => {
      await identity.createBinding(binding);
      return id;
    },
  };
}

/**
 * One descriptor for the whole repository set: it exists only when every
 * repository does, and create fills in the missing ones.
 */
export function registryDescriptor(
  registry: RegistryProvider,
  accountId: string,
  region: string,
  repositories: readonly string[]
): ResourceDescriptor {
  const url = registry.registryUrl(accountId, region);

  const missing = async (): Promise<string[]> => {
    const absent: string[] = [];
    for (const repo of repositories) {
      if (!(await registry.repositoryExists(repo))) absent.push(repo);
    }
    return absent;
  };

  return {
    name: `ECR repositories (${repositories.length})`,
    stateKey: "ECR_REGISTRY",
    check: async () => ((await missing()).length === 0 ? url : null),
    create: async () => {
      for (const repo of await missing()) {
        try {
          await registry.createRepository(repo);
          console.log(`[provision] Created repository ${repo}`);
        } catch (err) {
          if (!isAlreadyExists(err)) throw err;
        }
      }
      return url;
    },
  };
}
