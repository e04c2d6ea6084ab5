// tests/unit/sequencer.test.ts - Deployment Sequencer and the stage graph

import { describe, test, expect, beforeEach } from "vitest";
import { MissingStateError, TimeoutError, ValidationError } from "@pagestack/contracts";
import {
  DeploymentSequencer,
  validateStages,
  type Stage,
  type StageContext,
  type StageTransition,
} from "../../control/src/deploy/sequencer";
import { DEPLOYMENT_STAGES } from "../../control/src/deploy/stages";
import { deployDataPlane } from "../../control/src/deploy/deploy";
import { CNPG_MANIFEST_URL } from "../../control/src/deploy/manifests";
import { MemoryStateStore } from "../../control/src/material/state-store";
import type { ApplySource } from "../../control/src/provider/types";
import { FakeScheduler, FakeStorageApi, ManualClock, workloadObject } from "../mock-providers";

function stage(name: string, dependsOn: string[], log: string[], extra?: Partial<Stage>): Stage {
  return {
    name,
    description: name,
    dependsOn,
    submit: async () => {
      log.push(`submit ${name}`);
    },
    waitReady: async () => {
      log.push(`ready ${name}`);
    },
    ...extra,
  };
}

function makeContext(overrides?: Partial<StageContext>): StageContext {
  return {
    scheduler: new FakeScheduler(),
    storage: new FakeStorageApi(),
    state: new MemoryStateStore({
      ECR_REGISTRY: "123456789012.dkr.ecr.us-west-2.amazonaws.com",
      REGION: "us-west-2",
      S3_BUCKET: "demo-pageserver-data",
    }),
    namespace: "neon",
    backend: "aws-s3",
    clock: new ManualClock(),
    ...overrides,
  };
}

// =============================================================================
// Graph validation & state machine
// =============================================================================

describe("validateStages", () => {
  test("rejects forward references and unknown prerequisites", () => {
    const log: string[] = [];
    expect(() => validateStages([stage("a", ["b"], log), stage("b", [], log)])).toThrow(ValidationError);
    expect(() => validateStages([stage("a", ["typo"], log)])).toThrow(
      "Stage a depends on typo, which is not an earlier stage"
    );
  });

  test("rejects duplicate names", () => {
    const log: string[] = [];
    expect(() => validateStages([stage("a", [], log), stage("a", [], log)])).toThrow("Duplicate stage a");
  });

  test("the built-in stage list is a valid graph", () => {
    expect(() => validateStages(DEPLOYMENT_STAGES)).not.toThrow();
  });
});

describe("DeploymentSequencer", () => {
  test("each stage is submitted only after its prerequisites are ready", async () => {
    const log: string[] = [];
    const sequencer = new DeploymentSequencer([
      stage("a", [], log),
      stage("b", ["a"], log),
      stage("c", ["a", "b"], log),
    ]);
    const report = await sequencer.apply(makeContext());

    expect(log).toEqual(["submit a", "ready a", "submit b", "ready b", "submit c", "ready c"]);
    expect(report.statuses).toEqual({ a: "ready", b: "ready", c: "ready" });
  });

  test("disabled stages are skipped and satisfy their dependents", async () => {
    const log: string[] = [];
    const transitions: StageTransition[] = [];
    const sequencer = new DeploymentSequencer(
      [stage("store", [], log, { enabled: (ctx) => ctx.backend === "minio" }), stage("user", ["store"], log)],
      (t) => transitions.push(t)
    );
    const report = await sequencer.apply(makeContext());

    expect(log).toEqual(["submit user", "ready user"]);
    expect(report.statuses).toEqual({ store: "skipped", user: "ready" });
    expect(transitions[0]).toEqual({ stage: "store", from: "pending", to: "skipped", detail: "not used with aws-s3" });
  });

  test("a failure is terminal: the stage is failed, later stages stay pending", async () => {
    const log: string[] = [];
    const sequencer = new DeploymentSequencer([
      stage("a", [], log),
      stage("b", ["a"], log, {
        waitReady: async () => {
          throw new Error("never healthy");
        },
      }),
      stage("c", ["b"], log),
    ]);

    await expect(sequencer.apply(makeContext())).rejects.toThrow("never healthy");
    expect(sequencer.status("a")).toBe("ready");
    expect(sequencer.status("b")).toBe("failed");
    expect(sequencer.status("c")).toBe("pending");
    expect(log).toEqual(["submit a", "ready a"]);
  });

  test("re-applying after a fix runs every stage again and completes", async () => {
    const log: string[] = [];
    let fail = true;
    const sequencer = new DeploymentSequencer([
      stage("a", [], log, {
        submit: async () => {
          if (fail) throw new Error("apply rejected");
        },
      }),
      stage("b", ["a"], log),
    ]);
    await expect(sequencer.apply(makeContext())).rejects.toThrow("apply rejected");
    expect(sequencer.status("b")).toBe("pending");

    fail = false;
    const report = await sequencer.apply(makeContext());
    expect(report.statuses).toEqual({ a: "ready", b: "ready" });
    expect(report.transitions.map((t) => `${t.stage}:${t.from}->${t.to}`)).toEqual([
      "a:pending->failed",
      "a:failed->submitted",
      "a:submitted->ready",
      "b:pending->submitted",
      "b:submitted->ready",
    ]);
  });
});

// =============================================================================
// Full stage list against an in-memory cluster
// =============================================================================

/** Make every applied workload immediately healthy */
function autoReady(scheduler: FakeScheduler, options?: { pageserverReady?: boolean }): void {
  scheduler.onApply = (source: ApplySource) => {
    const ns = "neon";
    if (source.type === "url") {
      scheduler.put("deployment", workloadObject("Deployment", "cnpg-controller-manager", "cnpg-system", 1));
      return;
    }
    if (source.type !== "manifest") return;
    switch (source.label) {
      case "minio":
        scheduler.put("statefulset", workloadObject("StatefulSet", "minio", ns, 1));
        break;
      case "metadata-db":
        scheduler.put("clusters.postgresql.cnpg.io", {
          apiVersion: "postgresql.cnpg.io/v1",
          kind: "Cluster",
          metadata: { name: "storage-controller-pg-cluster", namespace: ns },
          spec: { instances: 3 },
          status: { readyInstances: 3 },
        });
        break;
      case "storage-controller":
      case "storage-broker":
        scheduler.put("deployment", workloadObject("Deployment", source.label, ns, 1));
        break;
      case "safekeepers":
        scheduler.put("statefulset", workloadObject("StatefulSet", "safekeeper", ns, 3));
        break;
      case "pageservers":
        scheduler.put(
          "statefulset",
          workloadObject("StatefulSet", "pageserver", ns, 2, options?.pageserverReady === false ? 1 : 2)
        );
        break;
      case "proxy":
        scheduler.put("deployment", workloadObject("Deployment", "proxy", ns, 1));
        scheduler.put("service", {
          apiVersion: "v1",
          kind: "Service",
          metadata: { name: "proxy", namespace: ns },
          status: { loadBalancer: { ingress: [{ hostname: "proxy-lb.example.com" }] } },
        });
        break;
    }
  };
}

describe("deployDataPlane", () => {
  let scheduler: FakeScheduler;
  let storage: FakeStorageApi;

  beforeEach(() => {
    scheduler = new FakeScheduler();
    storage = new FakeStorageApi();
  });

  test("applies the fixed topology in order on S3", async () => {
    autoReady(scheduler);
    const result = await deployDataPlane(makeContext({ scheduler, storage }));

    expect(scheduler.appliedLabels()).toEqual([
      "namespace",
      "storage-classes",
      CNPG_MANIFEST_URL,
      "metadata-db",
      "storage-controller",
      "storage-broker",
      "safekeepers",
      "pageservers",
      "proxy",
    ]);
    expect(result.statuses["object-store"]).toBe("skipped");
    expect(Object.values(result.statuses).filter((s) => s === "ready")).toHaveLength(10);
    expect([...storage.nodes.keys()]).toEqual([1, 2]);
    expect(result.proxyHostname).toBe("proxy-lb.example.com");
  });

  test("MinIO adds the object store and creates its bucket", async () => {
    autoReady(scheduler);
    const result = await deployDataPlane(makeContext({ scheduler, storage, backend: "minio" }));

    expect(result.statuses["object-store"]).toBe("ready");
    expect(scheduler.appliedLabels().slice(0, 3)).toEqual(["namespace", "storage-classes", "minio"]);
    const mc = scheduler.execs.find((e) => e.pod === "minio-0");
    expect(mc?.command[2]).toContain("mc mb --ignore-existing local/minio-s3-neon-pageserver");
  });

  test("registration failures are warnings; the proxy still deploys", async () => {
    autoReady(scheduler);
    storage.failingNodes.add(2);
    const result = await deployDataPlane(makeContext({ scheduler, storage }));
    expect(result.statuses["node-registration"]).toBe("ready");
    expect(result.statuses["proxy"]).toBe("ready");
    expect([...storage.nodes.keys()]).toEqual([1]);
  });

  test("a workload that never becomes ready fails the run at its stage", async () => {
    autoReady(scheduler, { pageserverReady: false });
    const transitions: StageTransition[] = [];
    const ctx = makeContext({ scheduler, storage });
    const sequencer = new DeploymentSequencer(DEPLOYMENT_STAGES, (t) => transitions.push(t));

    await expect(sequencer.apply(ctx)).rejects.toBeInstanceOf(TimeoutError);
    expect(sequencer.status("pageservers")).toBe("failed");
    expect(sequencer.status("node-registration")).toBe("pending");
    expect(transitions.at(-1)?.detail).toBe("statefulset/pageserver not ready after 5m 00s (1/2 ready)");
    expect(storage.nodes.size).toBe(0);
  });

  test("missing provisioned state fails before anything is applied", async () => {
    const ctx = makeContext({ scheduler, storage, state: new MemoryStateStore({ REGION: "us-west-2" }) });
    await expect(deployDataPlane(ctx)).rejects.toBeInstanceOf(MissingStateError);
    expect(scheduler.applied).toHaveLength(0);
  });
});
