// provider/kube/scheduler.ts - SchedulerClient backed by kubectl

import { Value } from "@sinclair/typebox/value";
import { TIMING } from "@pagestack/contracts";
import { ConcreteProviderError } from "../errors";
import { execChecked, parseJsonOutput, realExec, type ExecFunction, type ExecResult } from "../exec";
import type { ApplySource, DeleteOptions, ListOptions, SchedulerClient } from "../types";
import { KubeListSchema, KubeObjectSchema, type KubeObject } from "./objects";

export interface KubectlSchedulerConfig {
  /** kubectl binary (default: "kubectl" on PATH) */
  kubectlPath?: string;
  /** kubeconfig context; the current context when unset */
  context?: string;
  /** For tests only: inject a custom exec function. */
  _execFactory?: ExecFunction;
}

export function labelSelector(labels: Record<string, string>): string {
  return Object.entries(labels).map(([key, value]) => `${key}=${value}`).join(",");
}

export class KubectlScheduler implements SchedulerClient {
  private readonly execFn: ExecFunction;
  private readonly bin: string;
  private readonly contextArgs: string[];

  constructor(config?: KubectlSchedulerConfig) {
    this.execFn = config?._execFactory ?? realExec;
    this.bin = config?.kubectlPath ?? "kubectl";
    this.contextArgs = config?.context ? ["--context", config.context] : [];
  }

  private command(args: string[]): string[] {
    return [this.bin, ...this.contextArgs, ...args];
  }

  private run(args: string[], options?: { timeout?: number; input?: string }): Promise<ExecResult> {
    return execChecked(this.execFn, "kubernetes", this.command(args), {
      timeout: options?.timeout ?? TIMING.KUBECTL_TIMEOUT_MS,
      input: options?.input,
    });
  }

  async apply(source: ApplySource): Promise<void> {
    switch (source.type) {
      case "manifest":
        await this.run(["apply", "-f", "-"], {
          input: source.content,
          timeout: TIMING.KUBECTL_APPLY_TIMEOUT_MS,
        });
        return;
      case "objects":
        await this.run(["apply", "-f", "-"], {
          input: JSON.stringify({ apiVersion: "v1", kind: "List", items: source.objects }),
          timeout: TIMING.KUBECTL_APPLY_TIMEOUT_MS,
        });
        return;
      case "url":
        await this.run(
          ["apply", ...(source.serverSide ? ["--server-side"] : []), "-f", source.url],
          { timeout: TIMING.KUBECTL_APPLY_TIMEOUT_MS }
        );
        return;
    }
  }

  async deleteUrl(url: string): Promise<void> {
    await this.run(["delete", "-f", url, "--ignore-not-found"], {
      timeout: TIMING.KUBECTL_APPLY_TIMEOUT_MS,
    });
  }

  async get(kind: string, name: string, namespace?: string): Promise<KubeObject | null> {
    const args = ["get", kind, name, ...namespaceArgs(namespace), "-o", "json", "--ignore-not-found"];
    const { stdout } = await this.run(args);
    if (!stdout.trim()) return null;

    const parsed = parseJsonOutput("kubernetes", stdout, this.command(args));
    if (!Value.Check(KubeObjectSchema, parsed)) {
      throw unexpectedShape(kind, name);
    }
    return parsed;
  }

  async list(kind: string, options?: ListOptions): Promise<KubeObject[]> {
    const selector = options?.labels ? ["-l", labelSelector(options.labels)] : [];
    const args = ["get", kind, ...namespaceArgs(options?.namespace), ...selector, "-o", "json"];
    const { stdout } = await this.run(args);

    const parsed = parseJsonOutput("kubernetes", stdout, this.command(args));
    if (!Value.Check(KubeListSchema, parsed)) {
      throw unexpectedShape(kind, "list");
    }
    return parsed.items;
  }

  async delete(kind: string, name: string, options?: DeleteOptions): Promise<boolean> {
    const timeoutMs = options?.timeoutMs ?? TIMING.KUBECTL_TIMEOUT_MS;
    const args = [
      "delete", kind, name,
      ...namespaceArgs(options?.namespace),
      "--ignore-not-found",
      `--timeout=${Math.ceil(timeoutMs / 1000)}s`,
    ];
    // Give kubectl's own timeout room to report before the process is killed
    const { stdout } = await this.run(args, { timeout: timeoutMs + 15_000 });
    return stdout.includes("deleted");
  }

  exec(pod: string, namespace: string, command: string[], options?: { input?: string }): Promise<ExecResult> {
    const interactive = options?.input !== undefined ? ["-i"] : [];
    return this.execFn(
      this.command(["exec", ...interactive, "-n", namespace, pod, "--", ...command]),
      { timeout: TIMING.KUBECTL_TIMEOUT_MS, input: options?.input }
    );
  }
}

function namespaceArgs(namespace?: string): string[] {
  return namespace ? ["-n", namespace] : [];
}

function unexpectedShape(kind: string, name: string): ConcreteProviderError {
  return new ConcreteProviderError("kubernetes", "PROVIDER_INTERNAL",
    `kubectl returned an unexpected ${kind} document for ${name}`,
    { details: { kind, name } }
  );
}
