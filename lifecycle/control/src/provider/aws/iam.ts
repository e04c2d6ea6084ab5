// provider/aws/iam.ts - IAM policy granting pageservers access to the bucket

import {
  IAMClient,
  GetPolicyCommand,
  CreatePolicyCommand,
  ListEntitiesForPolicyCommand,
  DetachRolePolicyCommand,
  DetachUserPolicyCommand,
  DetachGroupPolicyCommand,
  ListPolicyVersionsCommand,
  DeletePolicyVersionCommand,
  DeletePolicyCommand,
} from "@aws-sdk/client-iam";
import { ConcreteProviderError, isNotFound, mapAwsError, withProviderErrorMapping } from "../errors";
import type { PolicyDocument, PolicyProvider } from "../types";

/** Object-level access to one bucket, as needed by pageserver remote storage */
export function bucketAccessPolicy(bucket: string): PolicyDocument {
  return {
    Version: "2012-10-17",
    Statement: [
      {
        Effect: "Allow",
        Action: [
          "s3:GetObject",
          "s3:PutObject",
          "s3:DeleteObject",
          "s3:ListBucket",
          "s3:GetBucketLocation",
        ],
        Resource: [`arn:aws:s3:::${bucket}`, `arn:aws:s3:::${bucket}/*`],
      },
    ],
  };
}

export class IamPolicyProvider implements PolicyProvider {
  private readonly client: IAMClient;

  constructor(region: string) {
    this.client = new IAMClient({ region });
  }

  policyArn(accountId: string, name: string): string {
    return `arn:aws:iam::${accountId}:policy/${name}`;
  }

  async policyExists(arn: string): Promise<boolean> {
    try {
      await withProviderErrorMapping("aws",
        () => this.client.send(new GetPolicyCommand({ PolicyArn: arn })),
        mapAwsError
      );
      return true;
    } catch (err) {
      if (isNotFound(err)) return false;
      throw err;
    }
  }

  async createPolicy(name: string, document: PolicyDocument): Promise<string> {
    const result = await withProviderErrorMapping("aws",
      () => this.client.send(new CreatePolicyCommand({
        PolicyName: name,
        PolicyDocument: JSON.stringify(document),
        Description: "Pageserver access to its remote storage bucket",
      })),
      mapAwsError
    );
    const arn = result.Policy?.Arn;
    if (!arn) {
      throw new ConcreteProviderError("aws", "PROVIDER_INTERNAL", `CreatePolicy ${name} returned no ARN`);
    }
    return arn;
  }

  async deletePolicy(arn: string): Promise<void> {
    await withProviderErrorMapping("aws", async () => {
      let marker: string | undefined;
      do {
        const entities = await this.client.send(new ListEntitiesForPolicyCommand({ PolicyArn: arn, Marker: marker }));
        for (const role of entities.PolicyRoles ?? []) {
          if (role.RoleName) await this.client.send(new DetachRolePolicyCommand({ RoleName: role.RoleName, PolicyArn: arn }));
        }
        for (const user of entities.PolicyUsers ?? []) {
          if (user.UserName) await this.client.send(new DetachUserPolicyCommand({ UserName: user.UserName, PolicyArn: arn }));
        }
        for (const group of entities.PolicyGroups ?? []) {
          if (group.GroupName) await this.client.send(new DetachGroupPolicyCommand({ GroupName: group.GroupName, PolicyArn: arn }));
        }
        marker = entities.IsTruncated ? entities.Marker : undefined;
      } while (marker);

      const versions = await this.client.send(new ListPolicyVersionsCommand({ PolicyArn: arn }));
      for (const version of versions.Versions ?? []) {
        if (version.IsDefaultVersion || !version.VersionId) continue;
        await this.client.send(new DeletePolicyVersionCommand({ PolicyArn: arn, VersionId: version.VersionId }));
      }

      await this.client.send(new DeletePolicyCommand({ PolicyArn: arn }));
    }, mapAwsError);
  }
}
