// provider/aws/identity.ts - IRSA service account binding via eksctl

import { TIMING } from "@pagestack/contracts";
import { execChecked, parseJsonOutput, realExec, type ExecFunction } from "../exec";
import { isNotFound } from "../errors";
import type { IdentityBindingProvider, ServiceAccountBinding } from "../types";

export interface EksctlIdentityProviderConfig {
  region: string;
  /** For tests only: inject a custom exec function. */
  _execFactory?: ExecFunction;
}

type BindingRef = Omit<ServiceAccountBinding, "policyArn">;

export class EksctlIdentityProvider implements IdentityBindingProvider {
  private readonly execFn: ExecFunction;
  private readonly region: string;

  constructor(config: EksctlIdentityProviderConfig) {
    this.region = config.region;
    this.execFn = config._execFactory ?? realExec;
  }

  private target(binding: BindingRef): string[] {
    return [
      "--cluster", binding.clusterName,
      "--region", this.region,
      "--namespace", binding.namespace,
      "--name", binding.name,
    ];
  }

  async bindingExists(binding: BindingRef): Promise<boolean> {
    const command = ["eksctl", "get", "iamserviceaccount", ...this.target(binding), "-o", "json"];
    try {
      const { stdout } = await execChecked(this.execFn, "eksctl", command, { timeout: TIMING.KUBECTL_TIMEOUT_MS });
      if (!stdout.trim()) return false;
      const parsed = parseJsonOutput("eksctl", stdout, command);
      return Array.isArray(parsed) && parsed.length > 0;
    } catch (err) {
      if (isNotFound(err)) return false;
      throw err;
    }
  }

  async createBinding(binding: ServiceAccountBinding): Promise<void> {
    await execChecked(this.execFn, "eksctl", [
      "eksctl", "create", "iamserviceaccount",
      ...this.target(binding),
      "--attach-policy-arn", binding.policyArn,
      "--approve",
      "--override-existing-serviceaccounts",
    ], { timeout: TIMING.EKSCTL_TIMEOUT_MS });
  }

  async deleteBinding(binding: BindingRef): Promise<void> {
    await execChecked(this.execFn, "eksctl", [
      "eksctl", "delete", "iamserviceaccount", ...this.target(binding), "--wait",
    ], { timeout: TIMING.EKSCTL_TIMEOUT_MS });
  }
}
