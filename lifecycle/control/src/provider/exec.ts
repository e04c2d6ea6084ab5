// provider/exec.ts - Subprocess execution for CLI-driven providers (kubectl, eksctl, aws)

import { spawn } from "child_process";
import { errorMessage } from "@pagestack/contracts";
import { ConcreteProviderError } from "./errors";
import type { ProviderName } from "./types";

// =============================================================================
// Exec Injection Types
// =============================================================================

export interface ExecResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export interface ExecOptions {
  timeout?: number;
  /** Written to the child's stdin, which is then closed */
  input?: string;
}

/**
 * Signature for the low-level command executor. Overridden in tests to avoid
 * spawning real processes.
 */
export type ExecFunction = (command: string[], options?: ExecOptions) => Promise<ExecResult>;

// =============================================================================
// Real Implementation
// =============================================================================

/**
 * Execute a command with optional stdin and timeout.
 * This is the real implementation used when no _execFactory is injected.
 */
export function realExec(command: string[], options?: ExecOptions): Promise<ExecResult> {
  const timeout = options?.timeout ?? 30_000;
  const [file, ...args] = command;
  if (!file) return Promise.reject(new Error("realExec: empty command"));

  return new Promise((resolve, reject) => {
    const proc = spawn(file, args, { stdio: ["pipe", "pipe", "pipe"] });
    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    let timedOut = false;

    const timer = setTimeout(() => {
      timedOut = true;
      proc.kill("SIGTERM");
    }, timeout);

    proc.stdout.on("data", (chunk: Buffer) => stdout.push(chunk));
    proc.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));

    proc.on("error", (err) => {
      clearTimeout(timer);
      reject(new ConcreteProviderError(providerFor(file), "COMMAND_FAILED",
        `Failed to start ${file}: ${err.message}`,
        { details: { command } }
      ));
    });

    proc.on("close", (code) => {
      clearTimeout(timer);
      if (timedOut) {
        reject(new ConcreteProviderError(providerFor(file), "TIMEOUT_ERROR",
          `Command timed out after ${timeout}ms: ${command.join(" ")}`,
          { retryable: true, details: { command, timeout } }
        ));
        return;
      }
      resolve({
        stdout: Buffer.concat(stdout).toString("utf-8"),
        stderr: Buffer.concat(stderr).toString("utf-8"),
        exitCode: code ?? 1,
      });
    });

    if (options?.input !== undefined) {
      proc.stdin.end(options.input);
    } else {
      proc.stdin.end();
    }
  });
}

function providerFor(binary: string): ProviderName {
  if (binary === "kubectl") return "kubernetes";
  if (binary === "eksctl") return "eksctl";
  return "aws";
}

// =============================================================================
// Helpers
// =============================================================================

const NOT_FOUND_PATTERN = /\(NotFound\)|not found|does not exist|No such/i;
const ALREADY_EXISTS_PATTERN = /\(AlreadyExists\)|already exists/i;
// kubectl's --timeout / --wait expiry
const WAIT_TIMEOUT_PATTERN = /timed out waiting for the condition/i;
const TRANSIENT_PATTERN = /connection refused|i\/o timeout|TLS handshake timeout|Unable to connect to the server|ServiceUnavailable|too many requests/i;

/**
 * Run a command and throw a classified ConcreteProviderError on non-zero
 * exit. stderr text decides between NOT_FOUND, ALREADY_EXISTS, a wait
 * TIMEOUT_ERROR, transient NETWORK_ERROR and COMMAND_FAILED.
 */
export async function execChecked(
  execFn: ExecFunction,
  provider: ProviderName,
  command: string[],
  options?: ExecOptions
): Promise<ExecResult> {
  const result = await execFn(command, options);
  if (result.exitCode === 0) return result;

  const stderr = result.stderr.trim();
  const message = `${command.slice(0, 3).join(" ")} exited ${result.exitCode}: ${stderr || result.stdout.trim()}`;
  const details = { command, exitCode: result.exitCode, stderr };

  if (ALREADY_EXISTS_PATTERN.test(stderr)) {
    throw new ConcreteProviderError(provider, "ALREADY_EXISTS", message, { details });
  }
  if (NOT_FOUND_PATTERN.test(stderr)) {
    throw new ConcreteProviderError(provider, "NOT_FOUND", message, { details });
  }
  if (WAIT_TIMEOUT_PATTERN.test(stderr)) {
    throw new ConcreteProviderError(provider, "TIMEOUT_ERROR", message, { details });
  }
  if (TRANSIENT_PATTERN.test(stderr)) {
    throw new ConcreteProviderError(provider, "NETWORK_ERROR", message, { retryable: true, details });
  }
  throw new ConcreteProviderError(provider, "COMMAND_FAILED", message, { details });
}

/** Parse JSON printed by a CLI, naming the command on failure */
export function parseJsonOutput(provider: ProviderName, stdout: string, command: string[]): unknown {
  try {
    return JSON.parse(stdout);
  } catch (err) {
    throw new ConcreteProviderError(provider, "PROVIDER_INTERNAL",
      `Invalid JSON from ${command.slice(0, 3).join(" ")}: ${errorMessage(err)}`,
      { details: { command } }
    );
  }
}
