// cli/src/commands/tenants.ts - tenants [--delete]

import { clearTenants, createRuntime, listTenantIds, type DeployConfig } from '@pagestack/lifecycle';
import { parseBooleanFlags } from '../args';
import { exitCodeFor, output } from '../config';
import { confirmTyped } from '../prompt';
import { printSummary, tenantsTally } from '../tally';

export async function tenantsCommand(config: DeployConfig, args: string[]): Promise<number> {
  const flags = parseBooleanFlags('tenants', args, ['--delete']);
  const { storage } = createRuntime(config, { requireState: true });

  if (!flags.has('--delete')) {
    const tenants = await listTenantIds(storage);
    output(tenants, () => {
      if (tenants.length === 0) {
        console.log('No tenants found.');
        return;
      }
      for (const id of tenants) console.log(id);
    });
    printSummary('tenants', { passed: tenants.length, failed: 0, warnings: 0 });
    return 0;
  }

  const report = await clearTenants(storage, {
    confirm: async (tenantIds) => {
      console.log(`About to delete ${tenantIds.length} tenant(s) and all of their timelines.`);
      return confirmTyped('Delete all tenants?');
    },
  });
  const tally = tenantsTally(report);
  output(report, () => {
    if (report.declined || report.tenants.length === 0) return;
    console.log(`Deleted ${report.deleted.length} of ${report.tenants.length} tenant(s).`);
  });
  printSummary('tenants', tally.totals);
  return exitCodeFor(tally.totals.failed);
}
