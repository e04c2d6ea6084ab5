// tests/unit/state-store.test.ts - Deployment state persistence

import { describe, test, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, readFileSync, rmSync, statSync, writeFileSync, existsSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { MissingStateError, PreconditionError, ValidationError, type StateKey } from "@pagestack/contracts";
import {
  FileStateStore,
  MemoryStateStore,
  formatStateFile,
  parseStateFile,
} from "../../control/src/material/state-store";

describe("parseStateFile", () => {
  test("reads KEY=value lines, skipping comments, blanks and unknown keys", () => {
    const values = parseStateFile([
      "# comment",
      "",
      "PREFIX=demo",
      'REGION="us-east-1"',
      "CLUSTER_NAME='demo-cluster'",
      "NOT_A_KEY=1",
      "garbage line",
    ].join("\n"));

    expect([...values.entries()]).toEqual([
      ["PREFIX", "demo"],
      ["REGION", "us-east-1"],
      ["CLUSTER_NAME", "demo-cluster"],
    ]);
  });

  test("keeps '=' inside values", () => {
    const values = parseStateFile("OIDC_PROVIDER=oidc.example/id/a=b\n");
    expect(values.get("OIDC_PROVIDER")).toBe("oidc.example/id/a=b");
  });

  test("formatStateFile output parses back to the same values", () => {
    const original = new Map<StateKey, string>([["PREFIX", "demo"], ["S3_BUCKET", "demo-pageserver-data"]]);
    const text = formatStateFile(original);
    expect(text.startsWith("# ")).toBe(true);
    expect(text.endsWith("S3_BUCKET=demo-pageserver-data\n")).toBe(true);
    expect([...parseStateFile(text).entries()]).toEqual([...original.entries()]);
  });
});

describe("MemoryStateStore", () => {
  test("require throws MissingStateError naming the key", () => {
    const state = new MemoryStateStore({ PREFIX: "demo" });
    expect(state.require("PREFIX")).toBe("demo");
    expect(() => state.require("ECR_REGISTRY")).toThrow(MissingStateError);
    try {
      state.require("ECR_REGISTRY");
    } catch (err) {
      expect(err).toBeInstanceOf(PreconditionError);
      if (err instanceof MissingStateError) {
        expect(err.key).toBe("ECR_REGISTRY");
        expect(err.hint).toBe("pagestack provision");
      }
    }
  });

  test("every set is a durable write; overwrite is idempotent", () => {
    const state = new MemoryStateStore();
    state.set("VPC_ID", "vpc-1");
    state.set("VPC_ID", "vpc-1");
    expect(state.writes).toBe(2);
    expect(state.entries()).toEqual([["VPC_ID", "vpc-1"]]);
  });

  test("rejects multi-line values", () => {
    const state = new MemoryStateStore();
    expect(() => state.set("PREFIX", "a\nb")).toThrow(ValidationError);
    expect(state.get("PREFIX")).toBeUndefined();
  });
});

describe("FileStateStore", () => {
  let dir: string;
  let path: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "pagestack-state-"));
    path = join(dir, "nested", "state.env");
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  test("values survive a reload", () => {
    const first = new FileStateStore(path);
    expect(first.exists()).toBe(false);
    first.set("PREFIX", "demo");
    first.set("CLUSTER_NAME", "demo-cluster");

    const second = new FileStateStore(path);
    expect(second.exists()).toBe(true);
    expect(second.get("PREFIX")).toBe("demo");
    expect(second.get("CLUSTER_NAME")).toBe("demo-cluster");
  });

  test("file is owner-only and leaves no temp file behind", () => {
    const state = new FileStateStore(path);
    state.set("REGION", "us-west-2");
    expect(statSync(path).mode & 0o777).toBe(0o600);
    expect(existsSync(`${path}.tmp`)).toBe(false);
    expect(readFileSync(path, "utf-8")).toContain("\nREGION=us-west-2\n");
  });

  test("delete removes a single key durably", () => {
    const state = new FileStateStore(path);
    state.set("PREFIX", "demo");
    state.set("VPC_ID", "vpc-1");
    state.delete("VPC_ID");
    expect(new FileStateStore(path).entries()).toEqual([["PREFIX", "demo"]]);
  });

  test("clear removes the file", () => {
    const state = new FileStateStore(path);
    state.set("PREFIX", "demo");
    state.clear();
    expect(existsSync(path)).toBe(false);
    expect(state.get("PREFIX")).toBeUndefined();
  });

  test("openExisting fails with a provisioning hint when there is no state", () => {
    expect(() => FileStateStore.openExisting(path)).toThrow(PreconditionError);
    writeFileSync(join(dir, "state.env"), "PREFIX=demo\n");
    expect(FileStateStore.openExisting(join(dir, "state.env")).get("PREFIX")).toBe("demo");
  });
});
