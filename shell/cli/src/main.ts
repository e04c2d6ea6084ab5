#!/usr/bin/env tsx

import { loadDeployConfig, type DeployConfig } from '@pagestack/lifecycle';
import { UsageError, parseGlobalFlags } from './args';
import { computeCommand } from './commands/compute';
import {
  deployCommand,
  provisionCommand,
  registerCommand,
  stateCommand,
  teardownCommand,
  upCommand,
} from './commands/infra';
import { tenantsCommand } from './commands/tenants';
import { verifyCommand } from './commands/verify';
import { reportFailure, setOutputMode } from './config';
import { printSummary } from './tally';

function printUsage(exitCode = 1): never {
  const out = exitCode === 0 ? console.log : console.error;
  out('Usage: pagestack <command> [options]');
  out('');
  out('Commands:');
  out('  up                          Provision AWS infrastructure and deploy (asks for confirmation)');
  out('  provision                   Create or adopt the cluster, bucket, endpoint, policy and registries');
  out('  deploy                      Deploy the storage data plane onto the cluster');
  out('  register                    Register pageservers with the storage controller');
  out('  compute create [options]    Create a compute (--tenant, --timeline, --branch-from, --branch-lsn, --pg-version)');
  out('  compute list                List computes');
  out('  compute teardown <id>       Delete one compute (tenant and timeline are kept)');
  out('  compute teardown --all      Delete every compute (asks for confirmation)');
  out('  tenants [--delete]          List tenants, or delete all of them (asks for confirmation)');
  out('  verify                      Check pods, volumes, services and health endpoints');
  out('  teardown                    Delete every provisioned resource (asks for confirmation)');
  out('  state                       Print the recorded deployment state');
  out('  help                        Show this help');
  out('');
  out('Global flags (before or after command):');
  out('  --json                      Output as JSON ({ "status", "data" } envelope)');
  out('');
  out('Configuration: ~/.pagestack/config.toml [deploy] section, overridden by PAGESTACK_* env vars.');
  process.exit(exitCode);
}

function dispatch(command: string, args: string[], config: DeployConfig): Promise<number> {
  const noArgs = (run: (c: DeployConfig) => Promise<number>): Promise<number> => {
    if (args.length > 0) throw new UsageError(`${command} takes no arguments`);
    return run(config);
  };

  switch (command) {
    case 'up': return noArgs(upCommand);
    case 'provision': return noArgs(provisionCommand);
    case 'deploy': return noArgs(deployCommand);
    case 'register': return noArgs(registerCommand);
    case 'compute': return computeCommand(config, args);
    case 'tenants': return tenantsCommand(config, args);
    case 'verify': return noArgs(verifyCommand);
    case 'teardown': return noArgs(teardownCommand);
    case 'state': return noArgs(stateCommand);
    default:
      throw new UsageError(`Unknown command: ${command}`);
  }
}

async function main(): Promise<number> {
  const { json, remainingArgs: args } = parseGlobalFlags(process.argv.slice(2));
  if (json) setOutputMode('json');

  if (args.length === 0 || args[0] === '-h' || args[0] === '--help' || args[0] === 'help') {
    printUsage(args.length === 0 ? 1 : 0);
  }

  const command = args[0];
  try {
    const config = loadDeployConfig(process.env);
    return await dispatch(command, args.slice(1), config);
  } catch (err) {
    if (err instanceof UsageError) {
      console.error(err.message);
      printUsage(2);
    }
    reportFailure(command, err);
    printSummary(command, { passed: 0, failed: 1, warnings: 0 });
    return 1;
  }
}

main().then(
  (code) => process.exit(code),
  (error: unknown) => {
    reportFailure('pagestack', error);
    process.exit(1);
  }
);
