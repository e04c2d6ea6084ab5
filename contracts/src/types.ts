// types.ts - Cross-cutting Primitives and Utilities

import { randomBytes } from 'crypto';

// =============================================================================
// PRIMITIVES
// =============================================================================

/** Unix timestamp in milliseconds */
export type TimestampMs = number;

/** Duration in milliseconds */
export type DurationMs = number;

/** 128-bit identifier rendered as 32 lowercase hex characters */
export type HexId = string;

export type TenantId = HexId;
export type TimelineId = HexId;

/** Scheduler object name of a compute instance, e.g. `compute-3f9a01bc` */
export type ComputeId = string;

/** Where storage nodes persist layer files */
export type StorageBackend = 'aws-s3' | 'minio';

export const STORAGE_BACKENDS: readonly StorageBackend[] = ['aws-s3', 'minio'];

export function isStorageBackend(value: string): value is StorageBackend {
  return value === 'aws-s3' || value === 'minio';
}

// =============================================================================
// DEPLOYMENT STATE KEYS
// =============================================================================

export const STATE_KEYS = [
  'PREFIX',
  'REGION',
  'ACCOUNT_ID',
  'STORAGE_BACKEND',
  'CLUSTER_NAME',
  'S3_BUCKET',
  'VPC_ID',
  'VPC_ENDPOINT_ID',
  'IAM_POLICY_ARN',
  'OIDC_PROVIDER',
  'IRSA_SERVICE_ACCOUNT',
  'ECR_REGISTRY',
] as const;

export type StateKey = (typeof STATE_KEYS)[number];

export function isStateKey(value: string): value is StateKey {
  return STATE_KEYS.some((key) => key === value);
}

// =============================================================================
// ID UTILITIES
// =============================================================================

const HEX_ID_PATTERN = /^[0-9a-f]{32}$/;

/** Generate a random 128-bit id as 32 lowercase hex characters */
export function generateHexId(): HexId {
  return randomBytes(16).toString('hex');
}

export function isHexId(value: string): boolean {
  return HEX_ID_PATTERN.test(value);
}

/** Format a millisecond duration as `1m 05s` / `42s` */
export function formatDuration(ms: DurationMs): string {
  const totalSeconds = Math.floor(ms / 1000);
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  if (minutes === 0) return `${seconds}s`;
  return `${minutes}m ${String(seconds).padStart(2, '0')}s`;
}
