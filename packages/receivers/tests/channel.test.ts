/**
 * Tests for the channel allocator.
 *
 * Verifies:
 * - Webhook URL shape and encoding
 * - Signal receivers have no channel
 * - Determinism: recomputing from the same id yields the same URL
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { createChannelAllocator, webhookTriggerPath } from "../src/channel.js";

describe("createChannelAllocator", () => {
  const channel = createChannelAllocator("http://hooks.test:8778");

  it("builds the webhook trigger URL from the receiver id", () => {
    expect(channel("r-123", "webhook")).toEqual({
      alarm_url: "http://hooks.test:8778/v1/webhooks/r-123/trigger?V=1",
    });
  });

  it("returns null for signal receivers", () => {
    expect(channel("r-123", "signal")).toBeNull();
  });

  it("ignores trailing slashes on the base URL", () => {
    const slashed = createChannelAllocator("http://hooks.test:8778///");
    expect(slashed("r-1", "webhook")).toEqual({
      alarm_url: "http://hooks.test:8778/v1/webhooks/r-1/trigger?V=1",
    });
  });

  it("keeps a base path", () => {
    const prefixed = createChannelAllocator("https://api.test/clustering/");
    expect(prefixed("r-1", "webhook")?.alarm_url).toBe(
      "https://api.test/clustering/v1/webhooks/r-1/trigger?V=1",
    );
  });

  it("percent-encodes ids", () => {
    expect(webhookTriggerPath("a/b c")).toBe("/v1/webhooks/a%2Fb%20c/trigger?V=1");
  });
});

describe("channel determinism (property)", () => {
  it("same id always yields the same channel, across allocators", () => {
    fc.assert(
      fc.property(fc.string({ minLength: 1, maxLength: 64 }), (id) => {
        const first = createChannelAllocator("http://hooks.test:8778");
        const second = createChannelAllocator("http://hooks.test:8778");
        expect(first(id, "webhook")).toEqual(second(id, "webhook"));
        expect(first(id, "webhook")).toEqual(first(id, "webhook"));
      }),
    );
  });

  it("distinct ids yield distinct URLs", () => {
    fc.assert(
      fc.property(
        fc.string({ minLength: 1, maxLength: 32 }),
        fc.string({ minLength: 1, maxLength: 32 }),
        (a, b) => {
          fc.pre(a !== b);
          const channel = createChannelAllocator("http://hooks.test:8778");
          expect(channel(a, "webhook")?.alarm_url).not.toBe(channel(b, "webhook")?.alarm_url);
        },
      ),
    );
  });
});
