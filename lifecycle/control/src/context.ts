// context.ts - Wire providers, scheduler, storage API and state from config

import { createAwsProviders, type AwsProviders } from "./provider/aws";
import type { ExecFunction } from "./provider/exec";
import { KubectlScheduler } from "./provider/kube/scheduler";
import {
  FetchTransport,
  HttpStorageApiClient,
  PodExecTransport,
  type StorageApiEndpoints,
} from "./provider/storage-api/client";
import type { SchedulerClient, StorageApiClient } from "./provider/types";
import { FileStateStore, type StateStore } from "./material/state-store";
import { PAGESERVER_HTTP_PORT, PAGESERVER_STATEFULSET } from "./registrar/registrar";
import { systemClock, type Clock } from "./workflow/clock";
import type { DeployConfig } from "./config";
import type { StageContext } from "./deploy/sequencer";

const STORAGE_CONTROLLER_PORT = 1234;

export interface RuntimeContext {
  config: DeployConfig;
  aws: AwsProviders;
  scheduler: SchedulerClient;
  storage: StorageApiClient;
  state: StateStore;
  clock: Clock;
}

export function storageApiEndpoints(config: DeployConfig): StorageApiEndpoints {
  if (config.storageApi === "http") {
    return {
      pageserverUrl: config.pageserverUrl ?? `http://localhost:${PAGESERVER_HTTP_PORT}`,
      storageControllerUrl: config.storageControllerUrl ?? `http://localhost:${STORAGE_CONTROLLER_PORT}`,
    };
  }
  // curl runs inside pageserver-0: its own API is on localhost
  return {
    pageserverUrl: `http://localhost:${PAGESERVER_HTTP_PORT}`,
    storageControllerUrl: `http://storage-controller.${config.namespace}.svc.cluster.local:${STORAGE_CONTROLLER_PORT}`,
  };
}

export function createStorageApiClient(
  config: DeployConfig,
  scheduler: SchedulerClient,
  clock?: Clock
): StorageApiClient {
  const transport = config.storageApi === "http"
    ? new FetchTransport()
    : new PodExecTransport(scheduler, config.namespace, `${PAGESERVER_STATEFULSET}-0`);
  return new HttpStorageApiClient(transport, storageApiEndpoints(config), clock);
}

export interface RuntimeOptions {
  /** Open the state file only if it already exists (everything after provisioning) */
  requireState?: boolean;
  _execFactory?: ExecFunction;
}

export function createRuntime(config: DeployConfig, options?: RuntimeOptions): RuntimeContext {
  const clock = systemClock;
  const scheduler = new KubectlScheduler({ context: config.kubeContext, _execFactory: options?._execFactory });
  const state = options?.requireState
    ? FileStateStore.openExisting(config.stateFile)
    : new FileStateStore(config.stateFile);
  return {
    config,
    aws: createAwsProviders(config.region, { _execFactory: options?._execFactory }),
    scheduler,
    storage: createStorageApiClient(config, scheduler, clock),
    state,
    clock,
  };
}

export function stageContext(runtime: RuntimeContext): StageContext {
  return {
    scheduler: runtime.scheduler,
    storage: runtime.storage,
    state: runtime.state,
    namespace: runtime.config.namespace,
    backend: runtime.config.storageBackend,
    clock: runtime.clock,
  };
}
