// compute/ids.ts - Compute id derivation

import { ConflictError, type ComputeId, type TenantId, type TimelineId } from "@pagestack/contracts";
import type { SchedulerClient } from "../provider/types";

export const COMPUTE_ID_PREFIX_LENGTH = 8;
const PREFIX_STEP = 4;
const FULL_LENGTH = 32;

export const TENANT_LABEL = "tenant-id";
export const TIMELINE_LABEL = "timeline-id";

export function computeIdFor(tenantId: TenantId, length: number = COMPUTE_ID_PREFIX_LENGTH): ComputeId {
  return `compute-${tenantId.slice(0, length)}`;
}

/**
 * Pick the compute id for a (tenant, timeline) pair: `compute-<first 8 hex
 * of the tenant>`, lengthened by 4 characters at a time while a pod with that
 * name is bound to another tenant or another timeline. A running compute read
 * its configuration at startup, so it is never re-pointed; only a pod bound to
 * the same pair keeps its id and is re-applied.
 */
export async function deriveComputeId(
  tenantId: TenantId,
  timelineId: TimelineId,
  scheduler: SchedulerClient,
  namespace: string
): Promise<ComputeId> {
  for (let length = COMPUTE_ID_PREFIX_LENGTH; length <= FULL_LENGTH; length += PREFIX_STEP) {
    const candidate = computeIdFor(tenantId, length);
    const existing = await scheduler.get("pod", candidate, namespace);
    if (!existing) return candidate;

    const labels = existing.metadata.labels ?? {};
    const owner = labels[TENANT_LABEL];
    const timeline = labels[TIMELINE_LABEL];
    if (owner === tenantId && timeline === timelineId) return candidate;
    const bound = owner === tenantId ? `timeline ${timeline ?? "unknown"}` : `tenant ${owner ?? "unknown"}`;
    console.warn(`[compute] ${candidate} is bound to ${bound}, lengthening id`);
  }

  throw new ConflictError(`Every compute id for tenant ${tenantId} is bound to another tenant or timeline`, {
    code: "COMPUTE_ID_CONFLICT",
    details: { tenantId, timelineId },
  });
}
