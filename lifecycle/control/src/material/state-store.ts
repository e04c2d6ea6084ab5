// material/state-store.ts - Persistent deployment state (KEY=value file)
//
// Every provisioning step records the identifier it created or found. The
// file is rewritten after each set() so that an interrupted run resumes from
// the last completed step.

import { existsSync, mkdirSync, readFileSync, renameSync, rmSync, writeFileSync } from "fs";
import { dirname } from "path";
import { MissingStateError, PreconditionError, ValidationError, isStateKey, type StateKey } from "@pagestack/contracts";

// =============================================================================
// Interface
// =============================================================================

export interface StateStore {
  get(key: StateKey): string | undefined;
  /** Idempotent overwrite; durable before returning */
  set(key: StateKey, value: string): void;
  /** Throws MissingStateError when the key was never written */
  require(key: StateKey): string;
  delete(key: StateKey): void;
  entries(): Array<[StateKey, string]>;
  /** Whether any state has been persisted */
  exists(): boolean;
  /** Remove all state, including the backing file */
  clear(): void;
}

// =============================================================================
// Parsing
// =============================================================================

/**
 * Parse KEY=VALUE lines. Blank lines and lines starting with # are ignored,
 * optional surrounding quotes are stripped, unknown keys are dropped with a
 * warning.
 */
export function parseStateFile(content: string, source = "state file"): Map<StateKey, string> {
  const values = new Map<StateKey, string>();
  for (const line of content.split("\n")) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;
    const eqIdx = trimmed.indexOf("=");
    if (eqIdx === -1) continue;
    const key = trimmed.slice(0, eqIdx).trim();
    let value = trimmed.slice(eqIdx + 1).trim();
    if ((value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'"))) {
      value = value.slice(1, -1);
    }
    if (!isStateKey(key)) {
      console.warn(`[state] Ignoring unknown key ${key} in ${source}`);
      continue;
    }
    values.set(key, value);
  }
  return values;
}

export function formatStateFile(values: Map<StateKey, string>): string {
  const lines = ["# pagestack deployment state. Managed by pagestack; edit with care."];
  for (const [key, value] of values) {
    lines.push(`${key}=${value}`);
  }
  return lines.join("\n") + "\n";
}

// =============================================================================
// Implementations
// =============================================================================

abstract class BaseStateStore implements StateStore {
  protected readonly values: Map<StateKey, string>;

  protected constructor(initial: Map<StateKey, string>) {
    this.values = initial;
  }

  protected abstract persist(): void;
  abstract exists(): boolean;
  abstract clear(): void;

  get(key: StateKey): string | undefined {
    return this.values.get(key);
  }

  set(key: StateKey, value: string): void {
    if (value.includes("\n")) {
      throw new ValidationError(`State value for ${key} must be a single line`, {
        code: "INVALID_STATE_VALUE",
        details: { key },
      });
    }
    this.values.set(key, value);
    this.persist();
  }

  require(key: StateKey): string {
    const value = this.values.get(key);
    if (value === undefined || value === "") throw new MissingStateError(key);
    return value;
  }

  delete(key: StateKey): void {
    if (this.values.delete(key)) this.persist();
  }

  entries(): Array<[StateKey, string]> {
    return [...this.values.entries()];
  }
}

/** State kept in a KEY=value file, written through a temp file + rename */
export class FileStateStore extends BaseStateStore {
  readonly path: string;

  constructor(path: string) {
    super(existsSync(path) ? parseStateFile(readFileSync(path, "utf-8"), path) : new Map());
    this.path = path;
  }

  /**
   * Open the state file of an existing deployment. Fails before any side
   * effect when provisioning never ran.
   */
  static openExisting(path: string): FileStateStore {
    if (!existsSync(path)) {
      throw new PreconditionError(`State file not found at ${path}`, {
        code: "STATE_FILE_MISSING",
        details: { path },
        hint: "pagestack provision",
      });
    }
    return new FileStateStore(path);
  }

  protected persist(): void {
    mkdirSync(dirname(this.path), { recursive: true });
    const tmpPath = `${this.path}.tmp`;
    writeFileSync(tmpPath, formatStateFile(this.values), { encoding: "utf-8", mode: 0o600 });
    renameSync(tmpPath, this.path);
  }

  exists(): boolean {
    return existsSync(this.path);
  }

  clear(): void {
    this.values.clear();
    rmSync(this.path, { force: true });
  }
}

/** In-process state for tests and dry runs */
export class MemoryStateStore extends BaseStateStore {
  /** Number of persist() calls, i.e. durable writes */
  writes = 0;

  constructor(initial?: Partial<Record<StateKey, string>>) {
    const values = new Map<StateKey, string>();
    for (const [key, value] of Object.entries(initial ?? {})) {
      if (isStateKey(key) && value !== undefined) values.set(key, value);
    }
    super(values);
  }

  protected persist(): void {
    this.writes++;
  }

  exists(): boolean {
    return this.values.size > 0;
  }

  clear(): void {
    this.values.clear();
  }
}
