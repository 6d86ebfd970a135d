/**
 * Tests for ReceiverLifecycle.
 *
 * Verifies:
 * - Validation rejects bad input before any side effect
 * - A failed create leaves neither a credential nor a record behind
 * - Delete revokes the credential and stays retryable
 * - Project visibility for show, list and delete
 * - The channel is always recomputed from the id
 */

import { describe, it, expect, beforeEach } from "vitest";
import type { ReceiverRecord } from "@clusterhook/types";
import type { TrustRecord, TrustRequest } from "../src/delegation/types.js";
import { InMemoryReceiverStore } from "../src/store/in-memory-store.js";
import { InMemoryIdentityService } from "../src/delegation/in-memory-identity-service.js";
import { DelegationError, ReceiverError, StoreError } from "../src/errors.js";
import type { CreateReceiverInput } from "../src/lifecycle.js";
import { sleep } from "../src/retry.js";
import { ALICE, BASE_URL, BOB, OPERATOR, READER, createHarness } from "./setup.js";
import type { Harness } from "./setup.js";

const WEBHOOK: CreateReceiverInput = {
  name: "scale-web",
  type: "webhook",
  clusterId: "c-1",
  action: "CLUSTER_SCALE_UP",
  params: { count: "1" },
};

const SIGNAL: CreateReceiverInput = {
  name: "drain-db",
  type: "signal",
  clusterId: "c-2",
  action: "CLUSTER_DEL_NODES",
};

class SlowIdentityService extends InMemoryIdentityService {
  override async createTrust(request: TrustRequest): Promise<TrustRecord> {
    await sleep(50);
    return super.createTrust(request);
  }
}

class FailingInsertStore extends InMemoryReceiverStore {
  override async insert(_record: ReceiverRecord): Promise<void> {
    throw new StoreError("STORE_UNAVAILABLE", "disk full");
  }
}

class FlakyDeleteStore extends InMemoryReceiverStore {
  failNextDelete = true;

  override async compareAndDelete(id: string, expectedActor: string): Promise<boolean> {
    if (this.failNextDelete) {
      this.failNextDelete = false;
      throw new StoreError("STORE_UNAVAILABLE", "disk full");
    }
    return super.compareAndDelete(id, expectedActor);
  }
}

/** Identity service whose trust deletion fails a set number of times */
class FlakyIdentityService extends InMemoryIdentityService {
  deleteAttempts = 0;

  constructor(private failures: number) {
    super();
  }

  override async deleteTrust(trustId: string): Promise<void> {
    this.deleteAttempts++;
    if (this.failures > 0) {
      this.failures--;
      throw new Error("identity service unreachable");
    }
    return super.deleteTrust(trustId);
  }
}

async function caught(promise: Promise<unknown>): Promise<unknown> {
  return promise.then(
    () => undefined,
    (e: unknown) => e,
  );
}

describe("ReceiverLifecycle", () => {
  let h: Harness;

  beforeEach(() => {
    h = createHarness();
  });

  // =========================================================================
  // Create
  // =========================================================================

  describe("create", () => {
    it("creates a webhook receiver with a delegated credential", async () => {
      const receiver = await h.lifecycle.create(WEBHOOK, ALICE);

      expect(h.identity.liveTrustIds()).toEqual([receiver.actor]);
      expect(receiver).toMatchObject({
        name: "scale-web",
        type: "webhook",
        clusterId: "c-1",
        action: "CLUSTER_SCALE_UP",
        params: { count: "1" },
        project: "proj-a",
        domain: "default",
        user: "alice",
        updatedAt: null,
      });
      expect(receiver.channel).toEqual({
        alarm_url: `${BASE_URL}/v1/webhooks/${receiver.id}/trigger?V=1`,
      });
    });

    it("creates a signal receiver without a credential or channel", async () => {
      const receiver = await h.lifecycle.create(SIGNAL, ALICE);

      expect(receiver.actor).toBe("");
      expect(receiver.channel).toBeNull();
      expect(receiver.params).toEqual({});
      expect(h.identity.size).toBe(0);
    });

    it("trims the name", async () => {
      const receiver = await h.lifecycle.create({ ...SIGNAL, name: "  padded  " }, ALICE);
      expect(receiver.name).toBe("padded");
    });

    it("persists the record without its channel", async () => {
      const receiver = await h.lifecycle.create(WEBHOOK, ALICE);
      const stored = await h.store.get(receiver.id);
      expect(stored).toBeDefined();
      expect(stored).not.toHaveProperty("channel");
    });

    it("logs the creation", async () => {
      const receiver = await h.lifecycle.create(WEBHOOK, ALICE);
      const line = h.lines.find((l) => l.msg === "Receiver created");
      expect(line).toMatchObject({ receiverId: receiver.id, type: "webhook", project: "proj-a" });
    });

    it.each<[string, Partial<CreateReceiverInput>, string, string]>([
      ["an unknown type", { type: "email" }, "INVALID_TYPE", "Receiver type 'email' is not supported; expected one of: webhook, signal"],
      ["an unknown action", { action: "CLUSTER_EXPLODE" }, "UNKNOWN_ACTION", "Action 'CLUSTER_EXPLODE' is not a recognized cluster action"],
      ["a blank name", { name: "   " }, "VALIDATION_FAILED", "Receiver name cannot be empty"],
      ["list params", { params: ["count"] }, "VALIDATION_FAILED", "Receiver params must be a map"],
      ["a supplied actor", { actor: { trust_id: "t-1" } }, "VALIDATION_FAILED", "Receiver actor is assigned by the service and cannot be supplied"],
      ["a cluster in another project", { clusterId: "c-9" }, "CLUSTER_NOT_FOUND", "Cluster 'c-9' not found"],
      ["a missing cluster", { clusterId: "c-404" }, "CLUSTER_NOT_FOUND", "Cluster 'c-404' not found"],
    ])("rejects %s without side effects", async (_label, patch, code, message) => {
      const err = await caught(h.lifecycle.create({ ...WEBHOOK, ...patch }, ALICE));

      expect(err).toBeInstanceOf(ReceiverError);
      expect(err).toMatchObject({ code, message });
      expect(h.identity.size).toBe(0);
      expect(await h.store.list()).toEqual([]);
    });

    it("accepts an empty actor hint", async () => {
      const receiver = await h.lifecycle.create({ ...WEBHOOK, actor: {} }, ALICE);
      expect(receiver.actor).not.toBe("");
    });

    it("refuses a read-only requester", async () => {
      const err = await caught(h.lifecycle.create(WEBHOOK, READER));
      expect(err).toMatchObject({
        code: "FORBIDDEN",
        message: "User 'rita' may not create receivers in project 'proj-a'",
      });
      expect(h.identity.size).toBe(0);
    });

    it("refuses a duplicate name before issuing a credential", async () => {
      await h.lifecycle.create(WEBHOOK, ALICE);

      const err = await caught(h.lifecycle.create({ ...WEBHOOK, clusterId: "c-2" }, ALICE));
      expect(err).toBeInstanceOf(StoreError);
      expect(err).toMatchObject({
        code: "NAME_CONFLICT",
        message: "A receiver named 'scale-web' already exists in project 'proj-a'",
      });
      expect(h.identity.size).toBe(1);
    });

    it("allows the same name in another project", async () => {
      await h.lifecycle.create(WEBHOOK, ALICE);
      const other = await h.lifecycle.create({ ...WEBHOOK, clusterId: "c-9" }, BOB);
      expect(other.project).toBe("proj-b");
    });

    it("persists nothing when delegation fails", async () => {
      const harness = createHarness({ identity: { deniedUsers: ["alice"] } });

      const err = await caught(harness.lifecycle.create(WEBHOOK, ALICE));
      expect(err).toBeInstanceOf(DelegationError);
      expect(err).toMatchObject({ code: "DELEGATION_FAILED" });
      expect(await harness.store.list()).toEqual([]);
    });

    it("leaves no credential behind when delegation times out", async () => {
      const identity = new SlowIdentityService();
      const harness = createHarness({ identityService: identity, delegationTimeoutMs: 10 });

      const err = await caught(harness.lifecycle.create(WEBHOOK, ALICE));
      expect(err).toMatchObject({ code: "DELEGATION_FAILED" });
      expect(await harness.store.list()).toEqual([]);

      await sleep(150);
      expect(identity.liveTrustIds()).toEqual([]);
    });

    it("revokes the credential when the record cannot be stored", async () => {
      const harness = createHarness({ store: new FailingInsertStore() });

      const err = await caught(harness.lifecycle.create(WEBHOOK, ALICE));
      expect(err).toMatchObject({ code: "STORE_UNAVAILABLE", message: "disk full" });
      expect(harness.identity.size).toBe(0);
      expect(harness.lines.map((l) => l.msg)).toContain(
        "Receiver insert failed; revoking its credential",
      );
    });
  });

  // =========================================================================
  // Delete
  // =========================================================================

  describe("delete", () => {
    it("revokes the credential and removes the record", async () => {
      const receiver = await h.lifecycle.create(WEBHOOK, ALICE);
      await h.lifecycle.delete(receiver.id, ALICE);

      expect(h.identity.size).toBe(0);
      expect(await h.store.get(receiver.id)).toBeUndefined();
      expect(h.lines.map((l) => l.msg)).toContain("Receiver deleted");
    });

    it("removes a signal receiver", async () => {
      const receiver = await h.lifecycle.create(SIGNAL, ALICE);
      await h.lifecycle.delete(receiver.id, ALICE);
      expect(await h.store.get(receiver.id)).toBeUndefined();
    });

    it("leaves no live credentials after deleting every receiver", async () => {
      const created = [
        await h.lifecycle.create(WEBHOOK, ALICE),
        await h.lifecycle.create({ ...WEBHOOK, name: "second", clusterId: "c-2" }, ALICE),
        await h.lifecycle.create({ ...WEBHOOK, name: "third", clusterId: "c-9" }, BOB),
        await h.lifecycle.create(SIGNAL, ALICE),
      ];
      expect(h.identity.size).toBe(3);

      for (const receiver of created) {
        await h.lifecycle.delete(receiver.id, OPERATOR);
      }
      expect(h.identity.liveTrustIds()).toEqual([]);
      expect(await h.store.list()).toEqual([]);
    });

    it("completes on retry after the store fails past revocation", async () => {
      const store = new FlakyDeleteStore();
      const harness = createHarness({ store });
      const receiver = await harness.lifecycle.create(WEBHOOK, ALICE);

      const err = await caught(harness.lifecycle.delete(receiver.id, ALICE));
      expect(err).toMatchObject({ code: "STORE_UNAVAILABLE" });
      expect(harness.identity.size).toBe(0);
      expect(await store.get(receiver.id)).toBeDefined();

      await harness.lifecycle.delete(receiver.id, ALICE);
      expect(await store.get(receiver.id)).toBeUndefined();
      expect(harness.lines.map((l) => l.msg)).toContain("Credential already revoked");
    });

    it("retries transient revocation failures", async () => {
      const identityService = new FlakyIdentityService(2);
      const harness = createHarness({ identityService });
      const receiver = await harness.lifecycle.create(WEBHOOK, ALICE);

      await harness.lifecycle.delete(receiver.id, ALICE);
      expect(identityService.deleteAttempts).toBe(3);
      expect(identityService.size).toBe(0);
      expect(await harness.store.get(receiver.id)).toBeUndefined();
    });

    it("still removes the record when revocation keeps failing", async () => {
      const identityService = new FlakyIdentityService(10);
      const harness = createHarness({ identityService });
      const receiver = await harness.lifecycle.create(WEBHOOK, ALICE);

      await harness.lifecycle.delete(receiver.id, ALICE);
      expect(identityService.deleteAttempts).toBe(3);
      expect(await harness.store.get(receiver.id)).toBeUndefined();
      const warning = harness.lines.find((l) => l.msg === "Credential revocation failed");
      expect(warning).toMatchObject({ receiverId: receiver.id, trustId: receiver.actor });
    });

    it("reports a missing receiver", async () => {
      const err = await caught(h.lifecycle.delete("missing", ALICE));
      expect(err).toMatchObject({
        code: "RECEIVER_NOT_FOUND",
        message: "Receiver 'missing' not found",
      });
    });

    it("reports a second delete as missing", async () => {
      const receiver = await h.lifecycle.create(WEBHOOK, ALICE);
      await h.lifecycle.delete(receiver.id, ALICE);

      const err = await caught(h.lifecycle.delete(receiver.id, ALICE));
      expect(err).toMatchObject({ code: "RECEIVER_NOT_FOUND" });
    });

    it("hides other projects' receivers", async () => {
      const receiver = await h.lifecycle.create(WEBHOOK, ALICE);

      const err = await caught(h.lifecycle.delete(receiver.id, BOB));
      expect(err).toMatchObject({ code: "RECEIVER_NOT_FOUND" });
      expect(h.identity.size).toBe(1);
    });

    it("refuses a read-only requester", async () => {
      const receiver = await h.lifecycle.create(WEBHOOK, ALICE);

      const err = await caught(h.lifecycle.delete(receiver.id, READER));
      expect(err).toMatchObject({ code: "FORBIDDEN" });
      expect(await h.store.get(receiver.id)).toBeDefined();
    });
  });

  // =========================================================================
  // Reads
  // =========================================================================

  describe("show and list", () => {
    it("recomputes the same channel the create returned", async () => {
      const created = await h.lifecycle.create(WEBHOOK, ALICE);
      const shown = await h.lifecycle.show(created.id, ALICE);

      expect(shown.channel).toEqual(created.channel);
      expect(shown).toEqual(created);
    });

    it("hides receivers from other projects", async () => {
      const created = await h.lifecycle.create(WEBHOOK, ALICE);

      const err = await caught(h.lifecycle.show(created.id, BOB));
      expect(err).toMatchObject({ code: "RECEIVER_NOT_FOUND" });
    });

    it("shows any receiver to an operator", async () => {
      const created = await h.lifecycle.create(WEBHOOK, ALICE);
      const shown = await h.lifecycle.show(created.id, OPERATOR);
      expect(shown.id).toBe(created.id);
    });

    it("lists only the requester's project", async () => {
      await h.lifecycle.create(WEBHOOK, ALICE);
      await h.lifecycle.create(SIGNAL, ALICE);
      await h.lifecycle.create({ ...WEBHOOK, clusterId: "c-9" }, BOB);

      const mine = await h.lifecycle.list(ALICE);
      expect(mine.map((r) => r.project)).toEqual(["proj-a", "proj-a"]);

      const theirs = await h.lifecycle.list(BOB);
      expect(theirs).toHaveLength(1);
    });

    it("lists every project for an operator asking globally", async () => {
      await h.lifecycle.create(WEBHOOK, ALICE);
      await h.lifecycle.create({ ...WEBHOOK, clusterId: "c-9" }, BOB);

      expect(await h.lifecycle.list(OPERATOR, { globalProject: true })).toHaveLength(2);
      expect(await h.lifecycle.list(OPERATOR)).toHaveLength(0);
    });

    it("refuses a global listing from a non-operator", async () => {
      const err = await caught(h.lifecycle.list(ALICE, { globalProject: true }));
      expect(err).toMatchObject({
        code: "FORBIDDEN",
        message: "Listing receivers across projects requires operator scope",
      });
    });

    it("filters and sorts", async () => {
      await h.lifecycle.create({ ...WEBHOOK, name: "b-hook" }, ALICE);
      await h.lifecycle.create({ ...WEBHOOK, name: "a-hook", clusterId: "c-2" }, ALICE);
      await h.lifecycle.create(SIGNAL, ALICE);

      const webhooks = await h.lifecycle.list(ALICE, {
        type: "webhook",
        sort: [{ key: "name", direction: "asc" }],
      });
      expect(webhooks.map((r) => r.name)).toEqual(["a-hook", "b-hook"]);
      expect(webhooks.every((r) => r.channel !== null)).toBe(true);

      const byCluster = await h.lifecycle.list(ALICE, { clusterId: "c-2" });
      expect(byCluster.map((r) => r.name).sort()).toEqual(["a-hook", "drain-db"]);
    });
  });
});
