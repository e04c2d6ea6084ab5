// provider/aws/registry.ts - ECR repositories for component images

import {
  ECRClient,
  DescribeRepositoriesCommand,
  CreateRepositoryCommand,
  DeleteRepositoryCommand,
} from "@aws-sdk/client-ecr";
import { isNotFound, mapAwsError, withProviderErrorMapping } from "../errors";
import type { RegistryProvider } from "../types";

export class EcrRegistryProvider implements RegistryProvider {
  private readonly client: ECRClient;

  constructor(region: string) {
    this.client = new ECRClient({ region });
  }

  registryUrl(accountId: string, region: string): string {
    return `${accountId}.dkr.ecr.${region}.amazonaws.com`;
  }

  async repositoryExists(name: string): Promise<boolean> {
    try {
      const result = await withProviderErrorMapping("aws",
        () => this.client.send(new DescribeRepositoriesCommand({ repositoryNames: [name] })),
        mapAwsError
      );
      return (result.repositories ?? []).length > 0;
    } catch (err) {
      if (isNotFound(err)) return false;
      throw err;
    }
  }

  async createRepository(name: string): Promise<void> {
    await withProviderErrorMapping("aws",
      () => this.client.send(new CreateRepositoryCommand({
        repositoryName: name,
        imageScanningConfiguration: { scanOnPush: true },
      })),
      mapAwsError
    );
  }

  async deleteRepository(name: string): Promise<void> {
    await withProviderErrorMapping("aws",
      () => this.client.send(new DeleteRepositoryCommand({ repositoryName: name, force: true })),
      mapAwsError
    );
  }
}
