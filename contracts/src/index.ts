// index.ts - Re-exports from all modules

// Types & primitives
export type {
  TimestampMs,
  DurationMs,
  HexId,
  TenantId,
  TimelineId,
  ComputeId,
  StorageBackend,
  StateKey,
} from './types';

export {
  STORAGE_BACKENDS,
  STATE_KEYS,
  isStorageBackend,
  isStateKey,
  generateHexId,
  isHexId,
  formatDuration,
} from './types';

// Errors
export type { ErrorCategory } from './errors';
export {
  PagestackError,
  PreconditionError,
  MissingStateError,
  ValidationError,
  UnresolvedPlaceholderError,
  NotFoundError,
  ConflictError,
  TimeoutError,
  errorMessage,
} from './errors';

// Timing
export { TIMING, parseDuration } from './config/timing';

// Compute runtime configuration
export type { ComputeSetting, ComputeSpec } from './api/compute-spec';
export {
  ComputeSettingSchema,
  ComputeRoleSchema,
  ComputeDatabaseSchema,
  ComputeSpecSchema,
} from './api/compute-spec';

// Storage HTTP API
export type {
  CreateTenantRequest,
  CreateTimelineRequest,
  NodeRegistrationRequest,
  TenantInfo,
  TimelineInfo,
  RegistrationOutcome,
} from './api/storage';
export {
  TenantInfoSchema,
  TenantListResponseSchema,
  TimelineInfoSchema,
  TimelineListResponseSchema,
} from './api/storage';
