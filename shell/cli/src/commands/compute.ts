// cli/src/commands/compute.ts - compute create | list | teardown

import {
  ComputeLifecycleManager,
  createRuntime,
  type ComputeSummary,
  type DeployConfig,
} from '@pagestack/lifecycle';
import { UsageError, parseComputeCreateArgs, parseTeardownTarget } from '../args';
import { exitCodeFor, output, printTable } from '../config';
import { confirmTyped } from '../prompt';
import { computeCreateTally, computeListTally, computeTeardownTally, printSummary } from '../tally';

function createManager(config: DeployConfig): ComputeLifecycleManager {
  const runtime = createRuntime(config, { requireState: true });
  return new ComputeLifecycleManager({
    scheduler: runtime.scheduler,
    storage: runtime.storage,
    state: runtime.state,
    namespace: config.namespace,
    pgVersion: config.pgVersion,
    clock: runtime.clock,
  });
}

export function formatComputeRows(computes: ComputeSummary[]): string[][] {
  return computes.map(c => [
    c.computeId,
    c.tenantId ?? '-',
    c.timelineId ?? '-',
    c.ready ? 'ready' : c.phase,
    c.createdAt ? c.createdAt.slice(0, 16).replace('T', ' ') : '-',
  ]);
}

export async function computeCommand(config: DeployConfig, args: string[]): Promise<number> {
  const sub = args[0];
  const rest = args.slice(1);

  switch (sub) {
    case 'create': {
      const request = parseComputeCreateArgs(rest);
      const handle = await createManager(config).createCompute(request);
      const tally = computeCreateTally(handle);
      output(handle, () => {
        console.log(`Compute ${handle.computeId} ${handle.ready ? 'ready' : 'created (not ready yet)'}`);
        console.log(`  tenant:   ${handle.tenantId} (${handle.tenant})`);
        console.log(`  timeline: ${handle.timelineId} (${handle.timeline})`);
        console.log(`  endpoint: ${handle.endpoint}`);
        if (!handle.ready) {
          console.log(`  Check: kubectl describe pod ${handle.computeId} -n ${handle.namespace}`);
        }
      });
      printSummary('compute', tally.totals);
      return 0;
    }

    case 'list': {
      if (rest.length > 0) throw new UsageError('compute list takes no arguments');
      const computes = await createManager(config).listComputes();
      const tally = computeListTally(computes);
      output(computes, () => {
        if (computes.length === 0) {
          console.log('No computes found.');
          return;
        }
        printTable(['ID', 'TENANT', 'TIMELINE', 'STATE', 'CREATED'], formatComputeRows(computes), [24, 32, 32, 9, 16]);
      });
      printSummary('compute', tally.totals);
      return 0;
    }

    case 'teardown': {
      const target = parseTeardownTarget(rest);
      const report = await createManager(config).teardownCompute(target, {
        confirm: async (computeIds) => {
          console.log(`About to delete ${computeIds.length} compute(s):`);
          for (const id of computeIds) console.log(`  ${id}`);
          console.log('Tenants and timelines are kept.');
          return confirmTyped('Delete them?');
        },
      });
      const tally = computeTeardownTally(report);
      output(report, () => {
        if (report.declined) return;
        console.log(`Deleted ${report.deleted.length} of ${report.requested.length} compute(s).`);
      });
      printSummary('compute', tally.totals);
      return exitCodeFor(tally.totals.failed);
    }

    default:
      throw new UsageError(sub ? `Unknown compute subcommand: ${sub}` : 'compute requires a subcommand: create | list | teardown');
  }
}
