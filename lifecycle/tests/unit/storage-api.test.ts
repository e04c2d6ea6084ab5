// tests/unit/storage-api.test.ts - Storage HTTP API client and transports

import { describe, test, expect, beforeEach } from "vitest";
import type { NodeRegistrationRequest } from "@pagestack/contracts";
import { ProviderOperationError } from "../../control/src/provider/errors";
import {
  HttpStorageApiClient,
  PodExecTransport,
  type HttpMethod,
  type HttpResponse,
  type HttpTransport,
} from "../../control/src/provider/storage-api/client";
import { FakeScheduler, ManualClock } from "../mock-providers";

const ENDPOINTS = {
  pageserverUrl: "http://localhost:9898",
  storageControllerUrl: "http://storage-controller.neon.svc.cluster.local:1234",
};
const TENANT = "aaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaa";
const TIMELINE = "bbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbb";

/** Replays queued responses and records every request */
class ScriptedTransport implements HttpTransport {
  readonly requests: Array<{ method: HttpMethod; url: string; body?: unknown }> = [];
  private readonly responses: HttpResponse[] = [];

  respond(status: number, body: unknown = ""): this {
    this.responses.push({ status, body: typeof body === "string" ? body : JSON.stringify(body) });
    return this;
  }

  async request(method: HttpMethod, url: string, body?: unknown): Promise<HttpResponse> {
    this.requests.push({ method, url, ...(body === undefined ? {} : { body }) });
    return this.responses.shift() ?? { status: 200, body: "" };
  }
}

describe("HttpStorageApiClient", () => {
  let transport: ScriptedTransport;
  let clock: ManualClock;
  let client: HttpStorageApiClient;

  beforeEach(() => {
    transport = new ScriptedTransport();
    clock = new ManualClock();
    client = new HttpStorageApiClient(transport, ENDPOINTS, clock);
  });

  test("createTenant posts the new id; 409 means it already exists", async () => {
    transport.respond(201).respond(409, "tenant exists");
    expect(await client.createTenant(TENANT)).toBe("created");
    expect(await client.createTenant(TENANT)).toBe("exists");
    expect(transport.requests[0]).toEqual({
      method: "POST",
      url: "http://localhost:9898/v1/tenant",
      body: { new_tenant_id: TENANT },
    });
  });

  test("createTimeline sends the branch point only when given", async () => {
    transport.respond(201).respond(201);
    await client.createTimeline(TENANT, TIMELINE, { pgVersion: 17 });
    await client.createTimeline(TENANT, TIMELINE, { pgVersion: 16, ancestorTimelineId: TENANT });

    expect(transport.requests.map((r) => r.body)).toEqual([
      { new_timeline_id: TIMELINE, pg_version: 17 },
      { new_timeline_id: TIMELINE, pg_version: 16, ancestor_timeline_id: TENANT },
    ]);
    expect(transport.requests[0]?.url).toBe(`http://localhost:9898/v1/tenant/${TENANT}/timeline`);
  });

  test("listTenants validates the response shape", async () => {
    transport.respond(200, [{ tenant_id: TENANT }]).respond(200, { tenants: [] }).respond(200, "<html>");
    expect(await client.listTenants()).toEqual([{ tenant_id: TENANT }]);
    await expect(client.listTenants()).rejects.toThrow("Unexpected response shape");
    await expect(client.listTenants()).rejects.toThrow(
      "Non-JSON response from http://storage-controller.neon.svc.cluster.local:1234/control/v1/tenant"
    );
  });

  test("registerNode treats 409 as already registered", async () => {
    const record: NodeRegistrationRequest = {
      node_id: 1,
      listen_pg_addr: "pageserver-0",
      listen_pg_port: 6400,
      listen_http_addr: "pageserver-0",
      listen_http_port: 9898,
      availability_zone_id: "az-0",
    };
    transport.respond(200).respond(409);
    expect(await client.registerNode(record)).toBe("registered");
    expect(await client.registerNode(record)).toBe("already_registered");
    expect(transport.requests[0]?.url).toBe("http://storage-controller.neon.svc.cluster.local:1234/control/v1/node");
  });

  test("server errors are retried with backoff", async () => {
    transport.respond(503, "starting").respond(502).respond(200);
    await client.deleteTenant(TENANT);
    expect(transport.requests).toHaveLength(3);
    expect(clock.sleeps).toEqual([1000, 2000]);
  });

  test("persistent server errors give up after the retry budget", async () => {
    for (let i = 0; i < 5; i++) transport.respond(500, "boom");
    const err = await client.deleteTenant(TENANT).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ProviderOperationError);
    expect(err).toMatchObject({ code: "PROVIDER_INTERNAL" });
    expect(transport.requests).toHaveLength(4);
  });

  test("client errors are not retried", async () => {
    transport.respond(404, "no such tenant");
    const err = await client.deleteTenant(TENANT).catch((e: unknown) => e);
    expect(err).toMatchObject({ code: "NOT_FOUND" });
    expect(transport.requests).toHaveLength(1);
  });
});

describe("PodExecTransport", () => {
  test("runs curl in the pod and splits the status code from the body", async () => {
    const scheduler = new FakeScheduler();
    scheduler.onExec = () => ({ exitCode: 0, stdout: '[{"tenant_id":"x"}]\n__HTTP_STATUS__:200', stderr: "" });
    const transport = new PodExecTransport(scheduler, "neon", "pageserver-0");

    const response = await transport.request("POST", "http://localhost:9898/v1/tenant", { new_tenant_id: TENANT });
    expect(response).toEqual({ status: 200, body: '[{"tenant_id":"x"}]' });

    const call = scheduler.execs[0];
    expect(call?.pod).toBe("pageserver-0");
    expect(call?.command.slice(0, 2)).toEqual(["curl", "-sS"]);
    expect(call?.command.slice(-5)).toEqual([
      "-H",
      "Content-Type: application/json",
      "-d",
      JSON.stringify({ new_tenant_id: TENANT }),
      "http://localhost:9898/v1/tenant",
    ]);
  });

  test("a failed curl is a retryable network error", async () => {
    const scheduler = new FakeScheduler();
    scheduler.onExec = () => ({ exitCode: 7, stdout: "", stderr: "Failed to connect\n" });
    const transport = new PodExecTransport(scheduler, "neon", "pageserver-0");

    const err = await transport.request("GET", "http://localhost:9898/v1/status").catch((e: unknown) => e);
    expect(err).toMatchObject({ code: "NETWORK_ERROR", retryable: true });
    expect(err).toHaveProperty(
      "message",
      "GET http://localhost:9898/v1/status via pageserver-0 failed (exit 7): Failed to connect"
    );
  });
});
