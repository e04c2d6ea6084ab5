// tenants/clear.ts - Tenant maintenance through the storage controller
//
// Deleting through the controller removes both its metadata and the
// pageserver state. Used before switching storage backends.

import { errorMessage, type TenantId } from "@pagestack/contracts";
import type { StorageApiClient } from "../provider/types";

export interface ClearTenantsReport {
  tenants: TenantId[];
  deleted: TenantId[];
  failed: Array<{ tenantId: TenantId; error: string }>;
  declined: boolean;
}

export async function listTenantIds(storage: StorageApiClient): Promise<TenantId[]> {
  const tenants = await storage.listTenants();
  return tenants.map((t) => t.tenant_id);
}

/**
 * Delete every tenant after one confirmation. Failures are logged and
 * counted; the remaining tenants are still attempted.
 */
export async function clearTenants(
  storage: StorageApiClient,
  options: { confirm: (tenantIds: TenantId[]) => Promise<boolean> }
): Promise<ClearTenantsReport> {
  const tenants = await listTenantIds(storage);
  const report: ClearTenantsReport = { tenants, deleted: [], failed: [], declined: false };
  if (tenants.length === 0) {
    console.log("[tenants] No tenants found, nothing to do");
    return report;
  }

  if (!(await options.confirm(tenants))) {
    console.log("[tenants] Aborted");
    return { ...report, declined: true };
  }

  for (const tenantId of tenants) {
    try {
      await storage.deleteTenant(tenantId);
      report.deleted.push(tenantId);
      console.log(`[tenants] Deleted ${tenantId}`);
    } catch (err) {
      report.failed.push({ tenantId, error: errorMessage(err) });
      console.warn(`[tenants] WARNING: failed to delete ${tenantId}: ${errorMessage(err)}`);
    }
  }

  if (report.failed.length > 0) {
    console.warn(`[tenants] WARNING: ${report.failed.length} tenant(s) failed to delete; re-run to retry`);
  } else {
    console.log("[tenants] All tenants deleted");
  }
  return report;
}
