/**
 * SDK Integration Tests
 *
 * Wires the ClusterhookClient to a real createApp() Hono instance
 * (in-memory, no HTTP server). Proves the SDK and server agree on the
 * wire format and the receiver lifecycle works end-to-end.
 *
 * Verifies:
 * - Create → get → trigger → delete for a webhook receiver
 * - Signal receivers notified as the caller
 * - Listing with sort and markers
 * - Error codes surface as ClusterhookError
 */

import { describe, it, expect, beforeEach } from "vitest";
import { createApp } from "@clusterhook/node";
import type { AppInstance } from "@clusterhook/node";
import { ClusterhookClient } from "../src/client.js";
import { ClusterhookError } from "../src/types.js";

// =============================================================================
// Bridge: Hono app.request() as fetch function
// =============================================================================

function createAppFetch(instance: AppInstance): typeof fetch {
  return async (input: string | URL | Request, init?: RequestInit): Promise<Response> => {
    const url = new URL(typeof input === "string" ? input : input instanceof URL ? input.toString() : input.url);
    return instance.app.request(new Request(`http://localhost${url.pathname}${url.search}`, init));
  };
}

// =============================================================================
// Setup
// =============================================================================

let instance: AppInstance;
let alice: ClusterhookClient;
let bob: ClusterhookClient;
let anonymous: ClusterhookClient;

function clientFor(apiKey: string | undefined): ClusterhookClient {
  return new ClusterhookClient({
    baseUrl: "http://hooks.test",
    apiKey,
    fetchFn: createAppFetch(instance),
    retries: 0,
  });
}

beforeEach(() => {
  instance = createApp({
    serviceConfig: {
      publicBaseUrl: "http://hooks.test",
      clusters: [
        { id: "c-1", name: "web", project: "proj-a", status: "ACTIVE" },
        { id: "c-9", name: "batch", project: "proj-b", status: "ACTIVE" },
      ],
    },
    auth: {
      apiKeys: new Map([
        ["key-alice", { key: "key-alice", role: "member", user: "alice", project: "proj-a" }],
        ["key-bob", { key: "key-bob", role: "member", user: "bob", project: "proj-b" }],
      ]),
      defaultDomain: "default",
    },
  });
  alice = clientFor("key-alice");
  bob = clientFor("key-bob");
  anonymous = clientFor(undefined);
});

// =============================================================================
// Lifecycle
// =============================================================================

describe("SDK → Server integration: webhook receivers", () => {
  it("creates, reads, triggers and deletes", async () => {
    const created = await alice.receivers.create({
      name: "scale-web",
      type: "webhook",
      clusterId: "c-1",
      action: "CLUSTER_SCALE_UP",
      params: { count: 1 },
    });
    expect(created.status).toBe(201);
    expect(created.headers["location"]).toBe(`/v1/receivers/${created.data.id}`);
    expect(created.data.channel?.alarm_url).toBe(
      `http://hooks.test/v1/webhooks/${created.data.id}/trigger?V=1`,
    );

    const fetched = await alice.receivers.get(created.data.id);
    expect(fetched.data).toEqual(created.data);
    expect(fetched.headers["etag"]).toBeDefined();

    const fired = await anonymous.receivers.trigger(created.data.id, { count: 4 });
    expect(fired.status).toBe(202);
    expect(fired.data).toMatchObject({ action: "CLUSTER_SCALE_UP", target: "c-1", status: "READY" });
    expect(fired.headers["location"]).toBe(`/v1/actions/${fired.data.id}`);

    const deleted = await alice.receivers.delete(created.data.id);
    expect(deleted.status).toBe(204);

    await expect(anonymous.receivers.trigger(created.data.id)).rejects.toMatchObject({
      code: "RECEIVER_NOT_FOUND",
      statusCode: 404,
    });
  });

  it("hides receivers from other projects", async () => {
    const created = await alice.receivers.create({
      name: "scale-web",
      type: "webhook",
      clusterId: "c-1",
      action: "CLUSTER_SCALE_UP",
    });

    await expect(bob.receivers.get(created.data.id)).rejects.toMatchObject({ statusCode: 404 });
    await expect(bob.receivers.delete(created.data.id)).rejects.toMatchObject({ statusCode: 404 });
  });
});

describe("SDK → Server integration: signal receivers", () => {
  it("notifies as the owning project and refuses others", async () => {
    const created = await alice.receivers.create({
      name: "drain",
      type: "signal",
      clusterId: "c-1",
      action: "CLUSTER_DEL_NODES",
    });
    expect(created.data.channel).toBeNull();

    const notified = await alice.receivers.notify(created.data.id);
    expect(notified.status).toBe(202);

    await expect(bob.receivers.notify(created.data.id)).rejects.toMatchObject({
      code: "UNAUTHORIZED",
      statusCode: 401,
    });
  });
});

describe("SDK → Server integration: listing", () => {
  it("pages through receivers in name order", async () => {
    for (const name of ["c", "a", "d", "b"]) {
      await alice.receivers.create({ name, type: "signal", clusterId: "c-1", action: "CLUSTER_UPDATE" });
    }

    const first = await alice.receivers.list({ sort: ["name"], limit: 3 });
    expect(first.data.receivers.map((r) => r.name)).toEqual(["a", "b", "c"]);
    expect(first.data.pagination.hasMore).toBe(true);

    const names: string[] = [];
    for await (const r of alice.receivers.listAll({ sort: ["name:desc"], limit: 3 })) {
      names.push(r.name);
    }
    expect(names).toEqual(["d", "c", "b", "a"]);
  });
});

describe("SDK → Server integration: errors", () => {
  it("reports validation failures with their codes", async () => {
    const attempt = alice.receivers.create({
      name: "bad",
      type: "webhook",
      clusterId: "c-9",
      action: "CLUSTER_SCALE_UP",
    });

    await expect(attempt).rejects.toBeInstanceOf(ClusterhookError);
    await expect(attempt).rejects.toMatchObject({ code: "CLUSTER_NOT_FOUND", statusCode: 400 });
  });

  it("requires credentials for the receivers API", async () => {
    await expect(anonymous.receivers.list()).rejects.toMatchObject({
      code: "UNAUTHORIZED",
      message: "Authentication required",
    });
  });
});
