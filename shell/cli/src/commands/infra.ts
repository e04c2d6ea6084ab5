// cli/src/commands/infra.ts - provision, deploy, up, register, teardown, state

import { formatDuration } from '@pagestack/contracts';
import {
  FileStateStore,
  createRuntime,
  deployDataPlane,
  provisionInfrastructure,
  registerPageservers,
  stageContext,
  teardownAll,
  type DeployConfig,
  type DeployResult,
  type ProvisionReport,
  type RuntimeContext,
} from '@pagestack/lifecycle';
import { exitCodeFor, output, printTable } from '../config';
import { confirmTyped } from '../prompt';
import { combineTotals, deployTally, printSummary, provisionTally, registrationTally } from '../tally';

function runProvision(runtime: RuntimeContext): Promise<ProvisionReport> {
  return provisionInfrastructure({
    config: runtime.config,
    aws: runtime.aws,
    scheduler: runtime.scheduler,
    state: runtime.state,
    clock: runtime.clock,
  });
}

function printProvisionReport(report: ProvisionReport): void {
  const rows = report.results.map(r => [r.resource, r.identifier, r.outcome]);
  printTable(['RESOURCE', 'IDENTIFIER', 'OUTCOME'], rows, [18, 60, 8]);
}

function printDeployResult(result: DeployResult, namespace: string): void {
  const rows = Object.entries(result.statuses).map(([stage, status]) => [stage, status]);
  printTable(['STAGE', 'STATUS'], rows, [20, 10]);
  console.log('');
  if (result.proxyHostname) {
    console.log(`Proxy endpoint: ${result.proxyHostname}:5432`);
  } else {
    console.log(`Proxy load balancer not assigned yet: kubectl get svc proxy -n ${namespace}`);
  }
}

// ─── Commands ────────────────────────────────────────────────────────────────

export async function provisionCommand(config: DeployConfig): Promise<number> {
  const runtime = createRuntime(config);
  const report = await runProvision(runtime);
  const tally = provisionTally(report);
  output(report, () => printProvisionReport(report));
  printSummary('provision', tally.totals);
  return exitCodeFor(tally.totals.failed);
}

export async function deployCommand(config: DeployConfig): Promise<number> {
  const runtime = createRuntime(config, { requireState: true });
  const result = await deployDataPlane(stageContext(runtime));
  const tally = deployTally(result);
  output(result, () => printDeployResult(result, config.namespace));
  printSummary('deploy', tally.totals);
  return exitCodeFor(tally.totals.failed);
}

export async function upCommand(config: DeployConfig): Promise<number> {
  console.log(`This creates an EKS cluster, ECR repositories${config.storageBackend === 'aws-s3' ? ', an S3 bucket, a VPC endpoint and an IAM policy' : ''} in ${config.region}.`);
  console.log('These resources are billed to your AWS account until `pagestack teardown`.');
  if (!(await confirmTyped('Continue?'))) {
    console.log('Aborted.');
    printSummary('up', { passed: 0, failed: 0, warnings: 0 });
    return 0;
  }

  const runtime = createRuntime(config);
  const start = runtime.clock.now();
  const provision = await runProvision(runtime);
  const deploy = await deployDataPlane(stageContext(runtime));
  const elapsedMs = runtime.clock.now() - start;
  const totals = combineTotals(provisionTally(provision), deployTally(deploy));

  output({ provision, deploy, elapsedMs }, () => {
    printProvisionReport(provision);
    console.log('');
    printDeployResult(deploy, config.namespace);
    console.log(`\nUp in ${formatDuration(elapsedMs)}.`);
  });
  printSummary('up', totals);
  return exitCodeFor(totals.failed);
}

export async function registerCommand(config: DeployConfig): Promise<number> {
  const runtime = createRuntime(config, { requireState: true });
  const report = await registerPageservers({
    scheduler: runtime.scheduler,
    storage: runtime.storage,
    namespace: config.namespace,
  });
  const tally = registrationTally(report);
  output(report, () => {
    console.log(`Registered: ${report.registered.length}, already registered: ${report.alreadyRegistered.length}, failed: ${report.failed.length}`);
  });
  printSummary('register', tally.totals);
  return exitCodeFor(tally.totals.failed);
}

export async function teardownCommand(config: DeployConfig): Promise<number> {
  const runtime = createRuntime(config);
  const report = await teardownAll(
    { config, aws: runtime.aws, scheduler: runtime.scheduler, state: runtime.state },
    {
      confirm: async () => {
        console.log(`This permanently deletes every pagestack resource with prefix "${config.prefix}" in ${config.region}, including stored data.`);
        return confirmTyped('Tear down?');
      },
    }
  );

  const data = {
    ...report,
    steps: report.steps.map(s => ({ step: s.step, status: s.status, ...(s.detail ? { detail: s.detail } : {}) })),
  };
  output(data, () => {
    if (report.declined) return;
    if (!report.stateCleared) {
      console.log(`State kept at ${config.stateFile}; re-run \`pagestack teardown\` to retry failed steps.`);
    }
  });
  printSummary('teardown', report);
  return exitCodeFor(report.failed);
}

export async function stateCommand(config: DeployConfig): Promise<number> {
  const entries = FileStateStore.openExisting(config.stateFile).entries();
  output(Object.fromEntries(entries), () => {
    console.log(`# ${config.stateFile}`);
    for (const [key, value] of entries) {
      console.log(`${key}=${value}`);
    }
  });
  printSummary('state', { passed: entries.length, failed: 0, warnings: 0 });
  return 0;
}
