// provider/aws/cluster.ts - EKS cluster: describe via the SDK, create/delete via eksctl

import { EKSClient, DescribeClusterCommand } from "@aws-sdk/client-eks";
import { TIMING } from "@pagestack/contracts";
import { isNotFound, mapAwsError, withProviderErrorMapping } from "../errors";
import { execChecked, realExec, type ExecFunction } from "../exec";
import type { ClusterInfo, ClusterProvider } from "../types";

export interface EksClusterProviderConfig {
  region: string;
  /** For tests only: inject a custom exec function. */
  _execFactory?: ExecFunction;
}

export class EksClusterProvider implements ClusterProvider {
  private readonly client: EKSClient;
  private readonly region: string;
  private readonly execFn: ExecFunction;

  constructor(config: EksClusterProviderConfig) {
    this.region = config.region;
    this.client = new EKSClient({ region: config.region });
    this.execFn = config._execFactory ?? realExec;
  }

  async describeCluster(name: string): Promise<ClusterInfo | null> {
    try {
      const { cluster } = await withProviderErrorMapping("aws",
        () => this.client.send(new DescribeClusterCommand({ name })),
        mapAwsError
      );
      if (!cluster) return null;
      return {
        name: cluster.name ?? name,
        status: cluster.status ?? "UNKNOWN",
        vpcId: cluster.resourcesVpcConfig?.vpcId,
        oidcIssuer: cluster.identity?.oidc?.issuer,
        endpoint: cluster.endpoint,
      };
    } catch (err) {
      if (isNotFound(err)) return null;
      throw err;
    }
  }

  async createCluster(name: string, configDocument: string): Promise<void> {
    console.log(`[cluster] Creating EKS cluster ${name} (this takes 15-20 minutes)`);
    await execChecked(this.execFn, "eksctl", ["eksctl", "create", "cluster", "-f", "-"], {
      input: configDocument,
      timeout: TIMING.EKSCTL_TIMEOUT_MS,
    });
  }

  async deleteCluster(name: string): Promise<void> {
    console.log(`[cluster] Deleting EKS cluster ${name} (this takes 10-15 minutes)`);
    await execChecked(this.execFn, "eksctl",
      ["eksctl", "delete", "cluster", "--name", name, "--region", this.region, "--wait"],
      { timeout: TIMING.EKSCTL_TIMEOUT_MS }
    );
  }

  async updateKubeconfig(name: string): Promise<void> {
    await execChecked(this.execFn, "aws",
      ["aws", "eks", "update-kubeconfig", "--name", name, "--region", this.region],
      { timeout: TIMING.KUBECTL_TIMEOUT_MS }
    );
  }
}
