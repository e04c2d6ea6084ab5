// registrar/registrar.ts - Node Registrar
//
// Storage nodes do not announce themselves; each pageserver ordinal is
// registered with the storage controller once the StatefulSet is up.

import {
  PreconditionError,
  errorMessage,
  type NodeRegistrationRequest,
  type RegistrationOutcome,
} from "@pagestack/contracts";
import { desiredReplicas } from "../provider/kube/objects";
import type { SchedulerClient, StorageApiClient } from "../provider/types";

export const PAGESERVER_STATEFULSET = "pageserver";
export const PAGESERVER_PG_PORT = 6400;
export const PAGESERVER_HTTP_PORT = 9898;

/** Stable in-cluster DNS name of a pageserver replica */
export function pageserverAddress(ordinal: number, namespace: string): string {
  return `${PAGESERVER_STATEFULSET}-${ordinal}.${PAGESERVER_STATEFULSET}.${namespace}.svc.cluster.local`;
}

export function registrationRecord(ordinal: number, address: string): NodeRegistrationRequest {
  return {
    node_id: ordinal + 1,
    listen_pg_addr: address,
    listen_pg_port: PAGESERVER_PG_PORT,
    listen_http_addr: address,
    listen_http_port: PAGESERVER_HTTP_PORT,
    availability_zone_id: `az-${ordinal}`,
  };
}

export function registerReplica(
  ordinal: number,
  address: string,
  storage: StorageApiClient
): Promise<RegistrationOutcome> {
  return storage.registerNode(registrationRecord(ordinal, address));
}

export interface RegistrationReport {
  registered: number[];
  alreadyRegistered: number[];
  failed: Array<{ ordinal: number; error: string }>;
}

/**
 * Register ordinals 0..replicas-1 in order. A failed ordinal is logged and
 * counted; the remaining ordinals are still attempted.
 */
export async function registerAll(
  replicas: number,
  options: { namespace: string; storage: StorageApiClient }
): Promise<RegistrationReport> {
  const report: RegistrationReport = { registered: [], alreadyRegistered: [], failed: [] };

  for (let ordinal = 0; ordinal < replicas; ordinal++) {
    const address = pageserverAddress(ordinal, options.namespace);
    try {
      const outcome = await registerReplica(ordinal, address, options.storage);
      if (outcome === "registered") {
        report.registered.push(ordinal);
        console.log(`[registrar] Registered pageserver-${ordinal} as node ${ordinal + 1}`);
      } else {
        report.alreadyRegistered.push(ordinal);
        console.log(`[registrar] pageserver-${ordinal} already registered`);
      }
    } catch (err) {
      report.failed.push({ ordinal, error: errorMessage(err) });
      console.warn(`[registrar] Failed to register pageserver-${ordinal}: ${errorMessage(err)}`);
    }
  }

  return report;
}

/** Register every replica the pageserver StatefulSet declares */
export async function registerPageservers(options: {
  scheduler: SchedulerClient;
  storage: StorageApiClient;
  namespace: string;
}): Promise<RegistrationReport> {
  const statefulSet = await options.scheduler.get("statefulset", PAGESERVER_STATEFULSET, options.namespace);
  if (!statefulSet) {
    throw new PreconditionError(`StatefulSet ${PAGESERVER_STATEFULSET} not found in ${options.namespace}`, {
      code: "PAGESERVERS_NOT_DEPLOYED",
      hint: "pagestack deploy",
    });
  }
  return registerAll(desiredReplicas(statefulSet), options);
}
