// provider/storage-api/client.ts - Pageserver + storage controller HTTP API
//
// Both services are cluster-internal. The default transport therefore runs
// curl inside a pageserver pod via the scheduler; a fetch transport is used
// when the operator has port-forwarded or otherwise exposed them.

import { Value } from "@sinclair/typebox/value";
import type { TSchema, Static } from "@sinclair/typebox";
import {
  TIMING,
  TenantListResponseSchema,
  TimelineListResponseSchema,
  errorMessage,
  type NodeRegistrationRequest,
  type RegistrationOutcome,
  type TenantInfo,
  type TimelineInfo,
} from "@pagestack/contracts";
import { ConcreteProviderError } from "../errors";
import type { CreateOutcome, SchedulerClient, StorageApiClient } from "../types";
import { withRetry } from "../../workflow/retry";
import type { Clock } from "../../workflow/clock";

// =============================================================================
// Transports
// =============================================================================

export type HttpMethod = "GET" | "POST" | "DELETE";

export interface HttpResponse {
  status: number;
  body: string;
}

export interface HttpTransport {
  request(method: HttpMethod, url: string, body?: unknown): Promise<HttpResponse>;
}

/** Direct HTTP via global fetch */
export class FetchTransport implements HttpTransport {
  constructor(private readonly timeoutMs: number = TIMING.STORAGE_API_TIMEOUT_MS) {}

  async request(method: HttpMethod, url: string, body?: unknown): Promise<HttpResponse> {
    let response: Response;
    try {
      response = await fetch(url, {
        method,
        headers: body === undefined ? undefined : { "Content-Type": "application/json" },
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      throw new ConcreteProviderError("storage-api", "NETWORK_ERROR",
        `${method} ${url} failed: ${errorMessage(err)}`,
        { retryable: true, details: { method, url } }
      );
    }
    return { status: response.status, body: await response.text() };
  }
}

const STATUS_MARKER = "\n__HTTP_STATUS__:";

/** curl run inside a pod, for services only reachable from the cluster network */
export class PodExecTransport implements HttpTransport {
  constructor(
    private readonly scheduler: SchedulerClient,
    private readonly namespace: string,
    private readonly pod: string
  ) {}

  async request(method: HttpMethod, url: string, body?: unknown): Promise<HttpResponse> {
    const command = [
      "curl", "-sS",
      "--max-time", String(Math.ceil(TIMING.STORAGE_API_TIMEOUT_MS / 1000)),
      "-X", method,
      "-w", `${STATUS_MARKER}%{http_code}`,
    ];
    if (body !== undefined) {
      command.push("-H", "Content-Type: application/json", "-d", JSON.stringify(body));
    }
    command.push(url);

    const result = await this.scheduler.exec(this.pod, this.namespace, command);
    const markerIdx = result.stdout.lastIndexOf(STATUS_MARKER);
    if (result.exitCode !== 0 || markerIdx === -1) {
      throw new ConcreteProviderError("storage-api", "NETWORK_ERROR",
        `${method} ${url} via ${this.pod} failed (exit ${result.exitCode}): ${result.stderr.trim()}`,
        { retryable: true, details: { method, url, pod: this.pod } }
      );
    }
    const status = Number(result.stdout.slice(markerIdx + STATUS_MARKER.length).trim());
    return { status, body: result.stdout.slice(0, markerIdx) };
  }
}

// =============================================================================
// Client
// =============================================================================

export interface StorageApiEndpoints {
  /** Pageserver management API, e.g. http://localhost:9898 from inside pageserver-0 */
  pageserverUrl: string;
  /** Storage controller API, e.g. http://storage-controller.neon.svc.cluster.local:1234 */
  storageControllerUrl: string;
}

export class HttpStorageApiClient implements StorageApiClient {
  constructor(
    private readonly transport: HttpTransport,
    private readonly endpoints: StorageApiEndpoints,
    private readonly clock?: Clock
  ) {}

  private call(method: HttpMethod, url: string, body?: unknown): Promise<HttpResponse> {
    return withRetry(`${method} ${url}`, async () => {
      const response = await this.transport.request(method, url, body);
      if (response.status === 429 || response.status >= 500) {
        throw statusError(method, url, response);
      }
      return response;
    }, { clock: this.clock });
  }

  async createTenant(tenantId: string): Promise<CreateOutcome> {
    const url = `${this.endpoints.pageserverUrl}/v1/tenant`;
    const response = await this.call("POST", url, { new_tenant_id: tenantId });
    if (response.status === 409) return "exists";
    if (!isSuccess(response.status)) throw statusError("POST", url, response);
    return "created";
  }

  async createTimeline(
    tenantId: string,
    timelineId: string,
    options: { pgVersion: number; ancestorTimelineId?: string; ancestorStartLsn?: string }
  ): Promise<CreateOutcome> {
    const url = `${this.endpoints.pageserverUrl}/v1/tenant/${tenantId}/timeline`;
    const response = await this.call("POST", url, {
      new_timeline_id: timelineId,
      pg_version: options.pgVersion,
      ...(options.ancestorTimelineId ? { ancestor_timeline_id: options.ancestorTimelineId } : {}),
      ...(options.ancestorStartLsn ? { ancestor_start_lsn: options.ancestorStartLsn } : {}),
    });
    if (response.status === 409) return "exists";
    if (!isSuccess(response.status)) throw statusError("POST", url, response);
    return "created";
  }

  async listTimelines(tenantId: string): Promise<TimelineInfo[]> {
    const url = `${this.endpoints.pageserverUrl}/v1/tenant/${tenantId}/timeline`;
    const response = await this.call("GET", url);
    if (!isSuccess(response.status)) throw statusError("GET", url, response);
    return parseBody(TimelineListResponseSchema, response, url);
  }

  async listTenants(): Promise<TenantInfo[]> {
    const url = `${this.endpoints.storageControllerUrl}/control/v1/tenant`;
    const response = await this.call("GET", url);
    if (!isSuccess(response.status)) throw statusError("GET", url, response);
    return parseBody(TenantListResponseSchema, response, url);
  }

  async deleteTenant(tenantId: string): Promise<void> {
    const url = `${this.endpoints.storageControllerUrl}/v1/tenant/${tenantId}`;
    const response = await this.call("DELETE", url);
    if (!isSuccess(response.status)) throw statusError("DELETE", url, response);
  }

  async registerNode(request: NodeRegistrationRequest): Promise<RegistrationOutcome> {
    const url = `${this.endpoints.storageControllerUrl}/control/v1/node`;
    const response = await this.call("POST", url, request);
    if (response.status === 409) return "already_registered";
    if (!isSuccess(response.status)) throw statusError("POST", url, response);
    return "registered";
  }
}

// =============================================================================
// Helpers
// =============================================================================

function isSuccess(status: number): boolean {
  return status >= 200 && status < 300;
}

export function statusError(method: HttpMethod, url: string, response: HttpResponse): ConcreteProviderError {
  const message = `${method} ${url} returned ${response.status}: ${response.body.trim().slice(0, 200)}`;
  const details = { method, url, status: response.status };
  if (response.status === 404) {
    return new ConcreteProviderError("storage-api", "NOT_FOUND", message, { details });
  }
  if (response.status === 409) {
    return new ConcreteProviderError("storage-api", "ALREADY_EXISTS", message, { details });
  }
  if (response.status === 429) {
    return new ConcreteProviderError("storage-api", "RATE_LIMIT_ERROR", message, { retryable: true, details });
  }
  if (response.status >= 500) {
    return new ConcreteProviderError("storage-api", "PROVIDER_INTERNAL", message, { retryable: true, details });
  }
  return new ConcreteProviderError("storage-api", "INVALID_SPEC", message, { details });
}

function parseBody<S extends TSchema>(schema: S, response: HttpResponse, url: string): Static<S> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(response.body);
  } catch {
    throw new ConcreteProviderError("storage-api", "PROVIDER_INTERNAL", `Non-JSON response from ${url}`, {
      details: { url },
    });
  }
  if (!Value.Check(schema, parsed)) {
    const first = [...Value.Errors(schema, parsed)][0];
    throw new ConcreteProviderError("storage-api", "PROVIDER_INTERNAL",
      `Unexpected response shape from ${url}${first ? `: ${first.path} ${first.message}` : ""}`,
      { details: { url } }
    );
  }
  return parsed;
}
