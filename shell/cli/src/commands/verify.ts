// cli/src/commands/verify.ts - verify

import { createRuntime, verifyDeployment, type DeployConfig } from '@pagestack/lifecycle';
import { exitCodeFor, output } from '../config';
import { printSummary } from '../tally';

export async function verifyCommand(config: DeployConfig): Promise<number> {
  const runtime = createRuntime(config, { requireState: true });
  const report = await verifyDeployment({
    scheduler: runtime.scheduler,
    namespace: config.namespace,
    state: runtime.state,
  });
  output(report, () => {
    console.log(report.ok ? 'Deployment healthy.' : `Deployment has ${report.failed} failing check(s):`);
    for (const failure of report.failures) {
      console.log(`  ${failure}`);
    }
  });
  printSummary('verify', report);
  return exitCodeFor(report.failed);
}
