// provider/aws/index.ts - AWS provider bundle

import { StsAccountProvider } from "./account";
import { EksClusterProvider } from "./cluster";
import { S3ObjectStoreProvider } from "./object-store";
import { Ec2NetworkProvider } from "./network";
import { IamPolicyProvider } from "./iam";
import { EksctlIdentityProvider } from "./identity";
import { EcrRegistryProvider } from "./registry";
import type { ExecFunction } from "../exec";
import type {
  AccountProvider,
  ClusterProvider,
  IdentityBindingProvider,
  NetworkProvider,
  ObjectStoreProvider,
  PolicyProvider,
  RegistryProvider,
} from "../types";

export interface AwsProviders {
  account: AccountProvider;
  cluster: ClusterProvider;
  objectStore: ObjectStoreProvider;
  network: NetworkProvider;
  policy: PolicyProvider;
  identity: IdentityBindingProvider;
  registry: RegistryProvider;
}

export function createAwsProviders(region: string, options?: { _execFactory?: ExecFunction }): AwsProviders {
  return {
    account: new StsAccountProvider(region),
    cluster: new EksClusterProvider({ region, _execFactory: options?._execFactory }),
    objectStore: new S3ObjectStoreProvider(region),
    network: new Ec2NetworkProvider(region),
    policy: new IamPolicyProvider(region),
    identity: new EksctlIdentityProvider({ region, _execFactory: options?._execFactory }),
    registry: new EcrRegistryProvider(region),
  };
}

export { StsAccountProvider } from "./account";
export { EksClusterProvider } from "./cluster";
export { S3ObjectStoreProvider, DELETE_BATCH_SIZE } from "./object-store";
export { Ec2NetworkProvider, s3ServiceName } from "./network";
export { IamPolicyProvider, bucketAccessPolicy } from "./iam";
export { EksctlIdentityProvider } from "./identity";
export { EcrRegistryProvider } from "./registry";
