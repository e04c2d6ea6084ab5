// deploy/manifests.ts - Template files, substitutions and backend fragments

import type { StorageBackend } from "@pagestack/contracts";
import type { StateStore } from "../material/state-store";
import { MINIO_BUCKET } from "../config";
import { renderFile, selectFragments, type FragmentSet, type Substitutions } from "./templater";

export const TEMPLATES = {
  clusterConfig: "cluster-config.yaml",
  namespace: "namespace.yaml",
  storageClasses: "storage-classes.yaml",
  minio: "minio.yaml",
  metadataDb: "metadata-db.yaml",
  storageController: "storage-controller.yaml",
  storageBroker: "storage-broker.yaml",
  safekeeper: "safekeeper.yaml",
  pageserver: "pageserver.yaml",
  proxy: "proxy.yaml",
} as const;

/** Service account bound to the bucket policy through IRSA */
export const PAGESERVER_SERVICE_ACCOUNT = "pageserver-sa";

/** CloudNativePG release installed as the metadata database operator */
export const CNPG_VERSION = "1.25.1";
export const CNPG_NAMESPACE = "cnpg-system";
export const CNPG_OPERATOR_DEPLOYMENT = "cnpg-controller-manager";
export const CNPG_MANIFEST_URL =
  `https://raw.githubusercontent.com/cloudnative-pg/cloudnative-pg/release-1.25/releases/cnpg-${CNPG_VERSION}.yaml`;

export const METADATA_DB_CLUSTER = "storage-controller-pg-cluster";

/** Repositories under the registry, one per component image */
export const IMAGE_REPOSITORIES = [
  "neon/pageserver",
  "neon/safekeeper",
  "neon/proxy",
  "neon/storage-broker",
  "neon/storage-controller",
  "neon/compute",
] as const;

export const BACKEND_FRAGMENTS: FragmentSet = {
  REMOTE_STORAGE_EXTRA: {
    minio: 'endpoint = "http://minio.PLACEHOLDER_NAMESPACE.svc.cluster.local:9000"',
  },
  S3_CREDENTIALS_ENV: {
    minio: [
      "- name: AWS_ACCESS_KEY_ID",
      "  valueFrom:",
      "    secretKeyRef:",
      "      name: minio-credentials",
      "      key: AWS_ACCESS_KEY_ID",
      "- name: AWS_SECRET_ACCESS_KEY",
      "  valueFrom:",
      "    secretKeyRef:",
      "      name: minio-credentials",
      "      key: AWS_SECRET_ACCESS_KEY",
    ].join("\n"),
  },
  SERVICE_ACCOUNT: {
    "aws-s3": `serviceAccountName: ${PAGESERVER_SERVICE_ACCOUNT}`,
  },
};

export interface ManifestContext {
  namespace: string;
  backend: StorageBackend;
  state: StateStore;
  manifestDir?: string;
}

/**
 * Substitutions for the workload templates. Keys that a template does not
 * use are harmless; state keys are only required when read.
 */
export function workloadSubstitutions(ctx: ManifestContext): Substitutions {
  return {
    NAMESPACE: ctx.namespace,
    ECR_REGISTRY: ctx.state.require("ECR_REGISTRY"),
    S3_BUCKET: ctx.backend === "minio" ? MINIO_BUCKET : ctx.state.require("S3_BUCKET"),
    REGION: ctx.state.require("REGION"),
  };
}

export function renderWorkload(ctx: ManifestContext, template: string): string {
  return renderFile(
    template,
    workloadSubstitutions(ctx),
    selectFragments(BACKEND_FRAGMENTS, ctx.backend),
    ctx.manifestDir
  );
}

/** Templates that need only the namespace (no provisioned state) */
export function renderNamespaced(namespace: string, template: string, manifestDir?: string): string {
  return renderFile(template, { NAMESPACE: namespace }, {}, manifestDir);
}
