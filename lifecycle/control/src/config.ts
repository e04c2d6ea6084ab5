// config.ts - Deployment configuration (~/.pagestack/config.toml + environment)

import { existsSync, readFileSync } from "fs";
import { homedir } from "os";
import { join } from "path";
import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { ValidationError, errorMessage } from "@pagestack/contracts";

export const PAGESTACK_DIR = join(homedir(), ".pagestack");

// =============================================================================
// Schema
// =============================================================================

export const DeployConfigSchema = Type.Object({
  prefix: Type.String({ pattern: "^[a-z][a-z0-9-]{1,30}$" }),
  region: Type.String({ pattern: "^[a-z]{2}(-[a-z]+)+-\\d$" }),
  namespace: Type.String({ pattern: "^[a-z0-9]([-a-z0-9]*[a-z0-9])?$" }),
  storageBackend: Type.Union([Type.Literal("aws-s3"), Type.Literal("minio")]),
  stateFile: Type.String({ minLength: 1 }),
  pgVersion: Type.Integer({ minimum: 14, maximum: 17 }),
  storageApi: Type.Union([Type.Literal("exec"), Type.Literal("http")]),
  pageserverUrl: Type.Optional(Type.String({ minLength: 1 })),
  storageControllerUrl: Type.Optional(Type.String({ minLength: 1 })),
  kubeContext: Type.Optional(Type.String({ minLength: 1 })),
});
export type DeployConfig = Static<typeof DeployConfigSchema>;

export const DEFAULT_DEPLOY_CONFIG: DeployConfig = {
  prefix: "pagestack",
  region: "us-west-2",
  namespace: "neon",
  storageBackend: "aws-s3",
  stateFile: join(PAGESTACK_DIR, "state.env"),
  pgVersion: 17,
  storageApi: "exec",
};

/** Bucket name pageservers use when MinIO provides object storage */
export const MINIO_BUCKET = "minio-s3-neon-pageserver";

// =============================================================================
// Derived Names
// =============================================================================

export interface ResourceNames {
  clusterName: string;
  bucketName: string;
  policyName: string;
}

export function resourceNames(config: Pick<DeployConfig, "prefix" | "storageBackend">): ResourceNames {
  return {
    clusterName: `${config.prefix}-cluster`,
    bucketName: config.storageBackend === "minio" ? MINIO_BUCKET : `${config.prefix}-pageserver-data`,
    policyName: `${config.prefix}-pageserver-s3`,
  };
}

// =============================================================================
// Simple TOML Parser (subset: sections + key=value pairs)
// =============================================================================

/**
 * Parse a minimal TOML-like config. Supports:
 * - [section] headers
 * - key = value (strings, numbers, booleans)
 * - key = "quoted string"
 * - # comments
 */
export function parseSimpleToml(content: string): Record<string, Record<string, unknown>> {
  const result: Record<string, Record<string, unknown>> = {};
  let section: Record<string, unknown> = {};
  result["__global__"] = section;

  for (const rawLine of content.split("\n")) {
    const line = rawLine.trim();
    if (!line || line.startsWith("#")) continue;

    const sectionMatch = line.match(/^\[([a-zA-Z0-9_.-]+)\]$/);
    if (sectionMatch) {
      const name = sectionMatch[1] ?? "__global__";
      section = result[name] ?? {};
      result[name] = section;
      continue;
    }

    const eqIdx = line.indexOf("=");
    if (eqIdx === -1) continue;
    section[line.slice(0, eqIdx).trim()] = parseTomlValue(line.slice(eqIdx + 1));
  }

  return result;
}

/**
 * Strip an inline comment (text after an unquoted `#`) from a raw TOML value.
 * A `#` inside a double-quoted string is not a comment delimiter.
 */
function stripInlineComment(value: string): string {
  let inQuote = false;
  for (let i = 0; i < value.length; i++) {
    if (value[i] === '"' && (i === 0 || value[i - 1] !== "\\")) inQuote = !inQuote;
    if (value[i] === "#" && !inQuote) return value.slice(0, i).trim();
  }
  return value.trim();
}

function parseTomlValue(raw: string): unknown {
  const value = stripInlineComment(raw);

  if ((value.startsWith('"') && value.endsWith('"')) ||
      (value.startsWith("'") && value.endsWith("'"))) {
    return value.slice(1, -1);
  }
  if (value === "true") return true;
  if (value === "false") return false;

  const num = Number(value);
  if (!isNaN(num) && value !== "") return num;

  return value;
}

// =============================================================================
// Load Config
// =============================================================================

function getConfigPath(env: NodeJS.ProcessEnv): string {
  return env.PAGESTACK_CONFIG ?? join(PAGESTACK_DIR, "config.toml");
}

function readDeploySection(path: string): Record<string, unknown> {
  if (!existsSync(path)) return {};
  try {
    return parseSimpleToml(readFileSync(path, "utf-8"))["deploy"] ?? {};
  } catch (err) {
    console.warn(`[config] Failed to parse ${path}: ${errorMessage(err)}`);
    return {};
  }
}

const TOML_KEYS: Record<string, keyof DeployConfig> = {
  prefix: "prefix",
  region: "region",
  namespace: "namespace",
  storage_backend: "storageBackend",
  state_file: "stateFile",
  pg_version: "pgVersion",
  storage_api: "storageApi",
  pageserver_url: "pageserverUrl",
  storage_controller_url: "storageControllerUrl",
  kube_context: "kubeContext",
};

const ENV_KEYS: Array<[string, keyof DeployConfig]> = [
  ["PAGESTACK_PREFIX", "prefix"],
  ["AWS_REGION", "region"],
  ["AWS_DEFAULT_REGION", "region"],
  ["PAGESTACK_NAMESPACE", "namespace"],
  ["STORAGE_BACKEND", "storageBackend"],
  ["PAGESTACK_STATE_FILE", "stateFile"],
  ["PAGESTACK_PG_VERSION", "pgVersion"],
  ["PAGESTACK_STORAGE_API", "storageApi"],
  ["PAGESTACK_PAGESERVER_URL", "pageserverUrl"],
  ["PAGESTACK_STORAGE_CONTROLLER_URL", "storageControllerUrl"],
  ["PAGESTACK_KUBE_CONTEXT", "kubeContext"],
];

/**
 * Effective deployment config: environment > config.toml [deploy] > defaults.
 * Throws ValidationError naming every invalid field.
 */
export function loadDeployConfig(env: NodeJS.ProcessEnv = process.env): DeployConfig {
  const merged: Record<string, unknown> = { ...DEFAULT_DEPLOY_CONFIG };

  const file = readDeploySection(getConfigPath(env));
  for (const [tomlKey, value] of Object.entries(file)) {
    const field = TOML_KEYS[tomlKey];
    if (field) merged[field] = value;
    else console.warn(`[config] Ignoring unknown [deploy] key ${tomlKey}`);
  }

  for (const [envKey, field] of ENV_KEYS) {
    const value = env[envKey];
    if (value === undefined || value === "") continue;
    merged[field] = field === "pgVersion" ? Number(value) : value;
  }

  if (!Value.Check(DeployConfigSchema, merged)) {
    const problems = [...Value.Errors(DeployConfigSchema, merged)].map((e) => `${e.path} ${e.message}`);
    throw new ValidationError(`Invalid deployment config: ${problems.join("; ")}`, {
      code: "INVALID_CONFIG",
      details: { problems },
    });
  }
  return merged;
}
