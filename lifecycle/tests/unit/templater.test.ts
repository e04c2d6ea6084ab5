// tests/unit/templater.test.ts - Manifest rendering

import { describe, test, expect } from "vitest";
import { UnresolvedPlaceholderError, ValidationError } from "@pagestack/contracts";
import { render, renderFile, selectFragments, type FragmentSet } from "../../control/src/deploy/templater";
import { TEMPLATES, renderNamespaced, renderWorkload } from "../../control/src/deploy/manifests";
import { MemoryStateStore } from "../../control/src/material/state-store";

describe("render", () => {
  test("replaces every occurrence of each value token", () => {
    const out = render("a: PLACEHOLDER_NS\nb: PLACEHOLDER_NS-x", { NS: "neon" });
    expect(out).toBe("a: neon\nb: neon-x");
  });

  test("inserts a fragment at the token's indentation", () => {
    const template = "env:\n  PLACEHOLDER_EXTRA\n  - name: B";
    const out = render(template, {}, { EXTRA: "- name: A\n  value: x" });
    expect(out).toBe("env:\n  - name: A\n    value: x\n  - name: B");
  });

  test("elides the whole line for a null fragment", () => {
    const out = render("spec:\n  PLACEHOLDER_SA\n  containers: []", {}, { SA: null });
    expect(out).toBe("spec:\n  containers: []");
  });

  test("substitutes value tokens inside inserted fragments", () => {
    const out = render("  PLACEHOLDER_EXTRA", { NS: "neon" }, { EXTRA: "host: minio.PLACEHOLDER_NS" });
    expect(out).toBe("  host: minio.neon");
  });

  test("lists every unresolved token, sorted and once each", () => {
    expect(() => render("PLACEHOLDER_B PLACEHOLDER_A PLACEHOLDER_B", {}, {}, "x.yaml")).toThrow(
      "Unresolved placeholders in x.yaml: PLACEHOLDER_A, PLACEHOLDER_B"
    );
    try {
      render("PLACEHOLDER_B PLACEHOLDER_A", {});
    } catch (err) {
      expect(err).toBeInstanceOf(UnresolvedPlaceholderError);
      if (err instanceof UnresolvedPlaceholderError) {
        expect(err.tokens).toEqual(["PLACEHOLDER_A", "PLACEHOLDER_B"]);
      }
    }
  });

  test("a key that prefixes a longer token does not resolve it", () => {
    expect(() => render("bucket: PLACEHOLDER_S3_BUCKET", { S3: "x" })).toThrow(
      "Unresolved placeholders: PLACEHOLDER_S3_BUCKET"
    );
    expect(render("PLACEHOLDER_S3 PLACEHOLDER_S3_BUCKET", { S3: "x", S3_BUCKET: "y" })).toBe("x y");
  });

  test("substituted values are inserted literally", () => {
    expect(render("a: PLACEHOLDER_A\nb: PLACEHOLDER_B", { A: "PLACEHOLDER_B", B: "y" })).toBe(
      "a: PLACEHOLDER_B\nb: y"
    );
  });

  test("a fragment token that is not alone on its line is not a fragment", () => {
    expect(() => render("x: PLACEHOLDER_SA", {}, { SA: null })).toThrow(UnresolvedPlaceholderError);
  });
});

describe("selectFragments", () => {
  const set: FragmentSet = {
    ONLY_MINIO: { minio: "m" },
    BOTH: { minio: "m", "aws-s3": "s" },
  };

  test("resolves per backend, null when the backend has no variant", () => {
    expect(selectFragments(set, "aws-s3")).toEqual({ ONLY_MINIO: null, BOTH: "s" });
    expect(selectFragments(set, "minio")).toEqual({ ONLY_MINIO: "m", BOTH: "m" });
  });
});

describe("manifest templates", () => {
  const state = new MemoryStateStore({
    ECR_REGISTRY: "123456789012.dkr.ecr.us-west-2.amazonaws.com",
    S3_BUCKET: "demo-pageserver-data",
    REGION: "us-west-2",
  });

  test("every namespaced and workload template renders completely for both backends", () => {
    for (const template of [TEMPLATES.namespace, TEMPLATES.storageClasses, TEMPLATES.minio, TEMPLATES.metadataDb]) {
      expect(renderNamespaced("neon", template)).not.toMatch(/PLACEHOLDER_/);
    }
    for (const backend of ["aws-s3", "minio"] as const) {
      for (const template of [
        TEMPLATES.storageController,
        TEMPLATES.storageBroker,
        TEMPLATES.safekeeper,
        TEMPLATES.pageserver,
        TEMPLATES.proxy,
      ]) {
        expect(renderWorkload({ namespace: "neon", backend, state }, template)).not.toMatch(/PLACEHOLDER_/);
      }
    }
  });

  test("pageserver on S3 uses the IRSA service account and no static credentials", () => {
    const doc = renderWorkload({ namespace: "neon", backend: "aws-s3", state }, TEMPLATES.pageserver);
    expect(doc).toContain('bucket_name = "demo-pageserver-data"');
    expect(doc).toContain("      serviceAccountName: pageserver-sa\n");
    expect(doc).not.toContain("minio-credentials");
    expect(doc).not.toContain("endpoint = \"http://minio");
  });

  test("pageserver on MinIO points at the in-cluster endpoint with secret credentials", () => {
    const doc = renderWorkload({ namespace: "neon", backend: "minio", state }, TEMPLATES.pageserver);
    expect(doc).toContain('bucket_name = "minio-s3-neon-pageserver"');
    expect(doc).toContain('    endpoint = "http://minio.neon.svc.cluster.local:9000"\n');
    expect(doc).toContain("            - name: AWS_ACCESS_KEY_ID\n");
    expect(doc).not.toContain("serviceAccountName");
  });

  test("cluster config takes the cluster name and region", () => {
    const doc = renderFile(TEMPLATES.clusterConfig, { CLUSTER_NAME: "demo-cluster", REGION: "eu-west-1" });
    expect(doc).toContain("name: demo-cluster");
    expect(doc).toContain("region: eu-west-1");
  });

  test("a missing template file is a validation error", () => {
    expect(() => renderFile("no-such.yaml", {})).toThrow(ValidationError);
  });
});
