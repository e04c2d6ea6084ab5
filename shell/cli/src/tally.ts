// cli/src/tally.ts - Pass/fail/warning accounting for each command's result

import {
  RunTally,
  formatTally,
  type ClearTenantsReport,
  type ComputeHandle,
  type ComputeSummary,
  type ComputeTeardownReport,
  type DeployResult,
  type ProvisionReport,
  type RegistrationReport,
  type TallyCounts,
} from '@pagestack/lifecycle';

export function provisionTally(report: ProvisionReport): RunTally {
  const tally = new RunTally('provision');
  for (const r of report.results) tally.pass(`${r.resource} ${r.outcome}`);
  return tally;
}

export function deployTally(result: DeployResult): RunTally {
  const tally = new RunTally('deploy');
  for (const [stage, status] of Object.entries(result.statuses)) {
    if (status === 'ready' || status === 'skipped') tally.pass(`${stage} ${status}`);
    else if (status === 'failed') tally.fail(stage);
    else tally.warn(`${stage} still ${status}`);
  }
  if (!result.proxyHostname) tally.warn('proxy load balancer not assigned yet');
  return tally;
}

export function registrationTally(report: RegistrationReport): RunTally {
  const tally = new RunTally('register');
  for (const ordinal of report.registered) tally.pass(`pageserver-${ordinal} registered`);
  for (const ordinal of report.alreadyRegistered) tally.pass(`pageserver-${ordinal} already registered`);
  for (const f of report.failed) tally.fail(`pageserver-${f.ordinal}: ${f.error}`);
  return tally;
}

export function computeCreateTally(handle: ComputeHandle): RunTally {
  const tally = new RunTally('compute');
  tally.pass(`tenant ${handle.tenantId} ${handle.tenant}`);
  tally.pass(`timeline ${handle.timelineId} ${handle.timeline}`);
  if (handle.ready) tally.pass(`${handle.computeId} ready`);
  else tally.warn(`${handle.computeId} not ready yet`);
  return tally;
}

export function computeListTally(computes: ComputeSummary[]): RunTally {
  const tally = new RunTally('compute');
  tally.pass(`${computes.length} compute(s) listed`);
  return tally;
}

export function computeTeardownTally(report: ComputeTeardownReport): RunTally {
  const tally = new RunTally('compute');
  for (const id of report.deleted) tally.pass(`${id} deleted`);
  for (const f of report.failed) tally.fail(`${f.computeId}: ${f.error}`);
  return tally;
}

export function tenantsTally(report: ClearTenantsReport): RunTally {
  const tally = new RunTally('tenants');
  for (const id of report.deleted) tally.pass(`${id} deleted`);
  for (const f of report.failed) tally.fail(`${f.tenantId}: ${f.error}`);
  return tally;
}

export function combineTotals(...tallies: RunTally[]): TallyCounts {
  const sum: TallyCounts = { passed: 0, failed: 0, warnings: 0 };
  for (const { totals } of tallies) {
    sum.passed += totals.passed;
    sum.failed += totals.failed;
    sum.warnings += totals.warnings;
  }
  return sum;
}

/** Closing line of every command */
export function printSummary(tag: string, counts: TallyCounts): void {
  console.log(`[${tag}] Summary: ${formatTally(counts)}`);
}
