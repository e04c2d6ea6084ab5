// provider/aws/account.ts - Credential check via STS

import { STSClient, GetCallerIdentityCommand } from "@aws-sdk/client-sts";
import { ConcreteProviderError, mapAwsError, withProviderErrorMapping } from "../errors";
import type { AccountProvider } from "../types";

export class StsAccountProvider implements AccountProvider {
  private readonly client: STSClient;

  constructor(region: string) {
    this.client = new STSClient({ region });
  }

  async getAccountId(): Promise<string> {
    const identity = await withProviderErrorMapping("aws",
      () => this.client.send(new GetCallerIdentityCommand({})),
      mapAwsError
    );
    if (!identity.Account) {
      throw new ConcreteProviderError("aws", "AUTH_ERROR", "GetCallerIdentity returned no account id");
    }
    return identity.Account;
  }
}
