// config/timing.ts - Centralized Timing Constants

// =============================================================================
// DURATION PARSING
// =============================================================================

export function parseDuration(value: string): number {
  const match = value.match(/^(\d+(?:\.\d+)?)\s*(ms|s|m|h)$/i);
  if (!match) throw new Error(`Invalid duration: ${value}`);
  const [, num = '', unit = ''] = match;
  const n = parseFloat(num);
  switch (unit.toLowerCase()) {
    case 'ms':
      return n;
    case 's':
      return n * 1000;
    case 'm':
      return n * 60_000;
    case 'h':
      return n * 3_600_000;
    default:
      throw new Error(`Unknown duration unit: ${unit}`);
  }
}

function getEnvDuration(key: string, defaultMs: number): number {
  const value = process.env[key];
  return value ? parseDuration(value) : defaultMs;
}

// =============================================================================
// BASE TIMING CONSTANTS
// =============================================================================

export const TIMING = {
  // ROLLOUTS -- interval < every timeout
  ROLLOUT_POLL_INTERVAL_MS: getEnvDuration('PAGESTACK_ROLLOUT_POLL_INTERVAL', 5_000), // 5s
  DEPLOYMENT_ROLLOUT_TIMEOUT_MS: getEnvDuration('PAGESTACK_DEPLOYMENT_ROLLOUT_TIMEOUT', 120_000), // 2m
  STATEFULSET_ROLLOUT_TIMEOUT_MS: getEnvDuration('PAGESTACK_STATEFULSET_ROLLOUT_TIMEOUT', 300_000), // 5m
  OPERATOR_ROLLOUT_TIMEOUT_MS: getEnvDuration('PAGESTACK_OPERATOR_ROLLOUT_TIMEOUT', 120_000), // 2m
  OBJECT_STORE_ROLLOUT_TIMEOUT_MS: getEnvDuration('PAGESTACK_OBJECT_STORE_ROLLOUT_TIMEOUT', 120_000), // 2m

  // METADATA DATABASE
  METADATA_DB_POLL_INTERVAL_MS: getEnvDuration('PAGESTACK_METADATA_DB_POLL_INTERVAL', 10_000), // 10s
  METADATA_DB_READY_TIMEOUT_MS: getEnvDuration('PAGESTACK_METADATA_DB_READY_TIMEOUT', 300_000), // 5m

  // COMPUTE
  COMPUTE_POLL_INTERVAL_MS: getEnvDuration('PAGESTACK_COMPUTE_POLL_INTERVAL', 2_000), // 2s
  COMPUTE_READY_TIMEOUT_MS: getEnvDuration('PAGESTACK_COMPUTE_READY_TIMEOUT', 120_000), // 2m

  // TEARDOWN
  NAMESPACE_DELETE_TIMEOUT_MS: getEnvDuration('PAGESTACK_NAMESPACE_DELETE_TIMEOUT', 120_000), // 2m

  // RETRY -- Constraint: base < max
  RETRY_BASE_DELAY_MS: getEnvDuration('PAGESTACK_RETRY_BASE_DELAY', 1_000), // 1s
  RETRY_MAX_DELAY_MS: getEnvDuration('PAGESTACK_RETRY_MAX_DELAY', 30_000), // 30s

  // SUBPROCESS / HTTP CEILINGS
  KUBECTL_TIMEOUT_MS: getEnvDuration('PAGESTACK_KUBECTL_TIMEOUT', 60_000), // 60s
  KUBECTL_APPLY_TIMEOUT_MS: getEnvDuration('PAGESTACK_KUBECTL_APPLY_TIMEOUT', 180_000), // 3m
  EKSCTL_TIMEOUT_MS: getEnvDuration('PAGESTACK_EKSCTL_TIMEOUT', 2_700_000), // 45m
  STORAGE_API_TIMEOUT_MS: getEnvDuration('PAGESTACK_STORAGE_API_TIMEOUT', 30_000), // 30s
} as const;
