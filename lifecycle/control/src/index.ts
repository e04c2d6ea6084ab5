// index.ts - Public API of @pagestack/lifecycle

// Configuration & wiring
export {
  PAGESTACK_DIR,
  DEFAULT_DEPLOY_CONFIG,
  DeployConfigSchema,
  MINIO_BUCKET,
  loadDeployConfig,
  parseSimpleToml,
  resourceNames,
} from "./config";
export type { DeployConfig, ResourceNames } from "./config";
export { createRuntime, createStorageApiClient, stageContext, storageApiEndpoints } from "./context";
export type { RuntimeContext, RuntimeOptions } from "./context";

// State
export { FileStateStore, MemoryStateStore, formatStateFile, parseStateFile } from "./material/state-store";
export type { StateStore } from "./material/state-store";

// Provisioning
export { ensure, provisionInfrastructure, assertAwsCredentials } from "./provision/provisioner";
export type { EnsureResult, EnsureOutcome, ProvisionContext, ProvisionReport } from "./provision/provisioner";
export type { ResourceDescriptor } from "./provision/descriptors";

// Deployment
export { render, renderFile, selectFragments } from "./deploy/templater";
export { DeploymentSequencer, validateStages } from "./deploy/sequencer";
export type { Stage, StageContext, StageStatus, StageTransition, DeploymentReport } from "./deploy/sequencer";
export { DEPLOYMENT_STAGES } from "./deploy/stages";
export { deployDataPlane } from "./deploy/deploy";
export type { DeployResult } from "./deploy/deploy";
export { registerPageservers } from "./registrar/registrar";
export type { RegistrationReport } from "./registrar/registrar";

// Computes
export { ComputeLifecycleManager, ALL_COMPUTES } from "./compute/lifecycle";
export type {
  ComputeHandle,
  ComputeSummary,
  ComputeTeardownReport,
  CreateComputeRequest,
  TeardownTarget,
} from "./compute/lifecycle";

// Maintenance
export { teardownAll } from "./teardown/teardown";
export type { TeardownReport } from "./teardown/teardown";
export { clearTenants, listTenantIds } from "./tenants/clear";
export type { ClearTenantsReport } from "./tenants/clear";
export { verifyDeployment } from "./verify/verify";
export type { VerifyReport } from "./verify/verify";

// Shared plumbing
export { RunTally, formatTally } from "./workflow/result";
export type { TallyCounts } from "./workflow/result";
export { waitUntilReady } from "./workflow/poll";
export type { Clock } from "./workflow/clock";
export { ProviderOperationError, ConcreteProviderError } from "./provider/errors";
