/**
 * Receivers client tests
 *
 * Verifies:
 * - Request paths, query strings and bodies for each operation
 * - Envelope unwrapping ({ receiver }, { action })
 * - listAll follows markers
 */

import { describe, it, expect, vi } from "vitest";
import { ClusterhookClient } from "../src/client.js";
import { ClusterhookError } from "../src/types.js";
import type { Receiver } from "../src/types.js";

// =============================================================================
// Mock Fetch Helper
// =============================================================================

interface Recorded {
  readonly method: string;
  readonly url: string;
  readonly body: unknown;
}

function recordingFetch(reply: (call: Recorded) => { status: number; body?: unknown }) {
  const calls: Recorded[] = [];
  const fetchFn = vi.fn(async (input: string | URL | Request, init?: RequestInit): Promise<Response> => {
    const url = typeof input === "string" ? input : input instanceof URL ? input.toString() : input.url;
    const call: Recorded = {
      method: init?.method ?? "GET",
      url,
      body: typeof init?.body === "string" ? JSON.parse(init.body) : undefined,
    };
    calls.push(call);
    const { status, body } = reply(call);
    return new Response(body === undefined ? null : JSON.stringify(body), { status });
  });
  return { fetchFn, calls };
}

// =============================================================================
// Fixtures
// =============================================================================

function receiver(id: string, name = id): Receiver {
  return {
    id,
    name,
    type: "webhook",
    cluster_id: "c-1",
    action: "CLUSTER_SCALE_UP",
    actor: { trust_id: `trust-${id}` },
    params: {},
    channel: { alarm_url: `https://hooks.example.com/v1/webhooks/${id}/trigger?V=1` },
    project: "proj-a",
    domain: "default",
    user: "alice",
    created_at: "2026-01-01T00:00:00.000Z",
    updated_at: null,
  };
}

const ACTION = {
  id: "a-1",
  action: "CLUSTER_SCALE_UP",
  target: "c-1",
  status: "READY",
  created_at: "2026-01-01T00:00:01.000Z",
};

function makeClient(reply: (call: Recorded) => { status: number; body?: unknown }) {
  const { fetchFn, calls } = recordingFetch(reply);
  const client = new ClusterhookClient({
    baseUrl: "https://hooks.example.com",
    apiKey: "test-key",
    fetchFn,
    retries: 0,
  });
  return { client, calls };
}

// =============================================================================
// Operations
// =============================================================================

describe("ReceiversNamespace", () => {
  it("creates a receiver with the wire field names", async () => {
    const { client, calls } = makeClient(() => ({ status: 201, body: { receiver: receiver("r-1") } }));

    const result = await client.receivers.create({
      name: "scale-web",
      type: "webhook",
      clusterId: "c-1",
      action: "CLUSTER_SCALE_UP",
      params: { count: 1 },
    });

    expect(result.status).toBe(201);
    expect(result.data.id).toBe("r-1");
    expect(calls).toEqual([
      {
        method: "POST",
        url: "https://hooks.example.com/v1/receivers",
        body: {
          receiver: {
            name: "scale-web",
            type: "webhook",
            cluster_id: "c-1",
            action: "CLUSTER_SCALE_UP",
            params: { count: 1 },
          },
        },
      },
    ]);
  });

  it("gets a receiver by encoded id", async () => {
    const { client, calls } = makeClient(() => ({ status: 200, body: { receiver: receiver("a/b") } }));

    const result = await client.receivers.get("a/b");

    expect(result.data.name).toBe("a/b");
    expect(calls[0]?.url).toBe("https://hooks.example.com/v1/receivers/a%2Fb");
  });

  it("deletes a receiver", async () => {
    const { client, calls } = makeClient(() => ({ status: 204 }));

    const result = await client.receivers.delete("r-1");

    expect(result.status).toBe(204);
    expect(calls[0]).toMatchObject({ method: "DELETE", url: "https://hooks.example.com/v1/receivers/r-1" });
  });

  it("builds the list query string", async () => {
    const { client, calls } = makeClient(() => ({
      status: 200,
      body: { receivers: [], pagination: { marker: null, hasMore: false } },
    }));

    await client.receivers.list({
      limit: 5,
      sort: ["name:desc", "created_at"],
      globalProject: true,
      names: ["a", "b"],
      type: "signal",
      clusterId: "c-2",
      action: "CLUSTER_DEL_NODES",
    });
    await client.receivers.list();

    expect(calls.map((c) => c.url)).toEqual([
      "https://hooks.example.com/v1/receivers?limit=5&sort=name%3Adesc%2Ccreated_at&global_project=true&name=a&name=b&type=signal&cluster_id=c-2&action=CLUSTER_DEL_NODES",
      "https://hooks.example.com/v1/receivers",
    ]);
  });

  it("follows markers in listAll", async () => {
    const pages = new Map<string, unknown>([
      ["", { receivers: [receiver("r-1"), receiver("r-2")], pagination: { marker: "m1", hasMore: true } }],
      ["m1", { receivers: [receiver("r-3")], pagination: { marker: null, hasMore: false } }],
    ]);
    const { client, calls } = makeClient((call) => ({
      status: 200,
      body: pages.get(new URL(call.url).searchParams.get("marker") ?? ""),
    }));

    const ids: string[] = [];
    for await (const r of client.receivers.listAll({ limit: 2 })) {
      ids.push(r.id);
    }

    expect(ids).toEqual(["r-1", "r-2", "r-3"]);
    expect(calls).toHaveLength(2);
  });

  it("notifies a signal receiver", async () => {
    const { client, calls } = makeClient(() => ({ status: 202, body: { action: ACTION } }));

    const result = await client.receivers.notify("r-1", { count: 2 });

    expect(result.data).toEqual(ACTION);
    expect(calls[0]).toEqual({
      method: "POST",
      url: "https://hooks.example.com/v1/receivers/r-1/notify",
      body: { params: { count: 2 } },
    });
  });

  it("triggers a webhook receiver with the protocol version", async () => {
    const { client, calls } = makeClient(() => ({ status: 202, body: { action: ACTION } }));

    await client.receivers.trigger("r-1");

    expect(calls[0]).toEqual({
      method: "POST",
      url: "https://hooks.example.com/v1/webhooks/r-1/trigger?V=1",
      body: {},
    });
  });

  it("surfaces API errors", async () => {
    const { client } = makeClient(() => ({
      status: 409,
      body: { error: { code: "NAME_CONFLICT", message: "A receiver named 'x' already exists in project 'proj-a'" } },
    }));

    const attempt = client.receivers.create({
      name: "x",
      type: "signal",
      clusterId: "c-1",
      action: "CLUSTER_SCALE_UP",
    });

    await expect(attempt).rejects.toBeInstanceOf(ClusterhookError);
    await expect(attempt).rejects.toMatchObject({ code: "NAME_CONFLICT", statusCode: 409 });
  });
});
