/**
 * Tests for request DTOs and sort parsing.
 */

import { describe, it, expect } from "vitest";
import {
  CreateReceiverSchema,
  ListReceiversQuerySchema,
  parseSort,
  sortSignature,
} from "../src/types/dto.js";

describe("parseSort", () => {
  it("maps wire keys to domain keys with ascending default", () => {
    expect(parseSort("cluster_id,created_at:desc")).toEqual({
      ok: true,
      sort: [
        { key: "clusterId", direction: "asc" },
        { key: "createdAt", direction: "desc" },
      ],
    });
  });

  it("tolerates whitespace between entries", () => {
    const parsed = parseSort(" name:desc , type ");
    expect(parsed.ok && sortSignature(parsed.sort)).toBe("name:desc,type:asc");
  });

  it.each([
    ["colour", "Unsupported sort key 'colour'; expected one of: name, type, cluster_id, action, created_at"],
    ["clusterId", "Unsupported sort key 'clusterId'; expected one of: name, type, cluster_id, action, created_at"],
    ["name:up", "Unsupported sort direction in 'name:up'"],
    ["name:asc:extra", "Unsupported sort direction in 'name:asc:extra'"],
    ["name,name:desc", "Sort key 'name' given more than once"],
  ])("rejects %j", (raw, message) => {
    expect(parseSort(raw)).toEqual({ ok: false, message });
  });
});

describe("ListReceiversQuerySchema", () => {
  it("applies the default limit and converts flags", () => {
    expect(ListReceiversQuerySchema.parse({ global_project: "true" })).toEqual({
      limit: 20,
      global_project: true,
    });
  });

  it("coerces the limit", () => {
    expect(ListReceiversQuerySchema.parse({ limit: "1000" }).limit).toBe(1000);
  });

  it("rejects unknown parameters", () => {
    expect(ListReceiversQuerySchema.safeParse({ project: "proj-b" }).success).toBe(false);
  });
});

describe("CreateReceiverSchema", () => {
  it("leaves type and action to the lifecycle", () => {
    const parsed = CreateReceiverSchema.safeParse({
      receiver: { name: "r", cluster_id: "c-1", type: "email", action: "NOPE" },
    });
    expect(parsed.success).toBe(true);
  });

  it("limits the name to 255 characters", () => {
    const parsed = CreateReceiverSchema.safeParse({
      receiver: { name: "n".repeat(256), cluster_id: "c-1", type: "webhook", action: "CLUSTER_SCALE_UP" },
    });
    expect(parsed.success).toBe(false);
  });
});
