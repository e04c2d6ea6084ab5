// compute/spec.ts - Runtime configuration for a compute instance

import { randomUUID } from "crypto";
import { Value } from "@sinclair/typebox/value";
import {
  ComputeSpecSchema,
  ValidationError,
  type ComputeSetting,
  type ComputeSpec,
} from "@pagestack/contracts";
import { PAGESERVER_PG_PORT, pageserverAddress } from "../registrar/registrar";

export const SAFEKEEPER_REPLICAS = 3;
export const SAFEKEEPER_PG_PORT = 5454;

export function safekeeperAddresses(namespace: string): string[] {
  return Array.from(
    { length: SAFEKEEPER_REPLICAS },
    (_, i) => `safekeeper-${i}.safekeeper.${namespace}.svc.cluster.local:${SAFEKEEPER_PG_PORT}`
  );
}

/** Computes always read pages from the first pageserver replica */
export function pageserverConnstring(namespace: string): string {
  return `host=${pageserverAddress(0, namespace)} port=${PAGESERVER_PG_PORT}`;
}

export interface ComputeSpecInput {
  computeId: string;
  tenantId: string;
  timelineId: string;
  namespace: string;
  now?: Date;
  operationId?: string;
}

function setting(name: string, value: string, vartype: ComputeSetting["vartype"]): ComputeSetting {
  return { name, value, vartype };
}

export function buildComputeSpec(input: ComputeSpecInput): ComputeSpec {
  const pageserver = pageserverConnstring(input.namespace);
  const safekeepers = safekeeperAddresses(input.namespace);

  const spec: ComputeSpec = {
    format_version: 1.0,
    timestamp: (input.now ?? new Date()).toISOString(),
    operation_uuid: input.operationId ?? randomUUID(),
    cluster: {
      cluster_id: input.computeId,
      name: input.computeId,
      roles: [{ name: "postgres", encrypted_password: null, options: null }],
      databases: [{ name: "postgres", owner: "postgres" }],
      settings: [
        setting("port", "5432", "integer"),
        setting("listen_addresses", "0.0.0.0", "string"),
        setting("max_connections", "100", "integer"),
        setting("shared_buffers", "131072", "integer"),
        setting("fsync", "off", "bool"),
        setting("wal_level", "logical", "enum"),
        setting("hot_standby", "on", "bool"),
        setting("shared_preload_libraries", "neon", "string"),
        setting("synchronous_standby_names", "walproposer", "string"),
        setting("neon.tenant_id", input.tenantId, "string"),
        setting("neon.timeline_id", input.timelineId, "string"),
        setting("neon.pageserver_connstring", pageserver, "string"),
        setting("neon.safekeepers", safekeepers.join(","), "string"),
        setting("max_wal_senders", "10", "integer"),
        setting("max_replication_slots", "10", "integer"),
        setting("wal_sender_timeout", "0", "integer"),
        setting("password_encryption", "md5", "enum"),
        setting("log_connections", "on", "bool"),
      ],
    },
    delta_operations: [],
    tenant_id: input.tenantId,
    timeline_id: input.timelineId,
    pageserver_connstring: pageserver,
    safekeeper_connstrings: safekeepers,
    mode: "Primary",
    skip_pg_catalog_updates: false,
  };

  assertValidComputeSpec(spec);
  return spec;
}

export function assertValidComputeSpec(spec: unknown): asserts spec is ComputeSpec {
  if (Value.Check(ComputeSpecSchema, spec)) return;
  const errors = [...Value.Errors(ComputeSpecSchema, spec)].map((e) => `${e.path}: ${e.message}`);
  throw new ValidationError(`Invalid compute configuration: ${errors.join("; ")}`, {
    code: "INVALID_COMPUTE_SPEC",
    details: { errors },
  });
}
