/**
 * ReceiverLifecycle — create, delete, list and show receivers.
 *
 * Create and delete span two systems (identity service, store) and are
 * ordered so that a failure part-way never leaves a credential without a
 * receiver, or a visible receiver without its credential:
 *
 * - create: issue credential → insert record; a failed insert revokes
 *   the credential before the error propagates
 * - delete: revoke credential → compare-and-delete record; revocation
 *   problems are logged, never fatal, so a retry always completes
 *
 * Every receiver handed out has its channel recomputed from its id.
 */

import { randomUUID } from "node:crypto";
import type { Logger } from "pino";
import type {
  Receiver,
  ReceiverParams,
  ReceiverRecord,
  ReceiverType,
  RequesterIdentity,
} from "@clusterhook/types";
import {
  canWrite,
  isActionName,
  isOperator,
  isReceiverParams,
  isReceiverType,
} from "@clusterhook/types";
import { ReceiverError, StoreError, hasErrorCode } from "./errors.js";
import { createChannelAllocator } from "./channel.js";
import type { ChannelAllocator } from "./channel.js";
import { DEFAULT_RETRY_CONFIG, sleep, withRetry } from "./retry.js";
import type { RetryConfig } from "./retry.js";
import { credentialHandle } from "./delegation/types.js";
import type { CredentialDelegator, CredentialHandle } from "./delegation/types.js";
import type { ClusterRegistry } from "./collaborators/cluster-registry.js";
import type { ReceiverStore, SortSpec } from "./store/types.js";

// =============================================================================
// Inputs
// =============================================================================

/**
 * Raw create request. Fields are validated here, not by the caller,
 * so every entry point gets the same errors.
 */
export interface CreateReceiverInput {
  readonly name: string;
  readonly type: string;
  readonly clusterId: string;
  readonly action: string;
  /**
   * Credential hint. The service assigns the actor itself, so this must
   * be absent or empty.
   */
  readonly actor?: Readonly<Record<string, unknown>> | undefined;
  readonly params?: unknown;
}

export interface ListReceiversOptions {
  /** List across every project; operators only */
  readonly globalProject?: boolean | undefined;
  readonly names?: readonly string[] | undefined;
  readonly type?: ReceiverType | undefined;
  readonly clusterId?: string | undefined;
  readonly action?: string | undefined;
  readonly sort?: readonly SortSpec[] | undefined;
}

export interface ReceiverLifecycleDeps {
  readonly store: ReceiverStore;
  readonly delegator: CredentialDelegator;
  readonly clusters: ClusterRegistry;
  /** Channel derivation; defaults to one bound to http://localhost:8778 */
  readonly channel?: ChannelAllocator | undefined;
  readonly logger?: Logger | undefined;
  readonly revocationRetry?: RetryConfig | undefined;
  readonly sleepFn?: ((ms: number) => Promise<void>) | undefined;
  readonly now?: (() => Date) | undefined;
  readonly generateId?: (() => string) | undefined;
}

// =============================================================================
// Lifecycle
// =============================================================================

export class ReceiverLifecycle {
  private readonly store: ReceiverStore;
  private readonly delegator: CredentialDelegator;
  private readonly clusters: ClusterRegistry;
  private readonly channel: ChannelAllocator;
  private readonly logger: Logger | undefined;
  private readonly revocationRetry: RetryConfig;
  private readonly sleepFn: (ms: number) => Promise<void>;
  private readonly now: () => Date;
  private readonly generateId: () => string;

  constructor(deps: ReceiverLifecycleDeps) {
    this.store = deps.store;
    this.delegator = deps.delegator;
    this.clusters = deps.clusters;
    this.channel = deps.channel ?? createChannelAllocator("http://localhost:8778");
    this.logger = deps.logger;
    this.revocationRetry = deps.revocationRetry ?? DEFAULT_RETRY_CONFIG;
    this.sleepFn = deps.sleepFn ?? sleep;
    this.now = deps.now ?? (() => new Date());
    this.generateId = deps.generateId ?? randomUUID;
  }

  // ─── Create ─────────────────────────────────────────────────────────

  /**
   * @throws ReceiverError INVALID_TYPE, UNKNOWN_ACTION, VALIDATION_FAILED,
   *   FORBIDDEN or CLUSTER_NOT_FOUND (no side effects)
   * @throws DelegationError DELEGATION_FAILED (nothing persisted)
   * @throws StoreError (credential already revoked)
   */
  async create(
    input: CreateReceiverInput,
    requester: RequesterIdentity,
  ): Promise<Receiver> {
    if (!isReceiverType(input.type)) {
      throw new ReceiverError(
        "INVALID_TYPE",
        `Receiver type '${input.type}' is not supported; expected one of: webhook, signal`,
      );
    }
    if (!isActionName(input.action)) {
      throw new ReceiverError(
        "UNKNOWN_ACTION",
        `Action '${input.action}' is not a recognized cluster action`,
      );
    }
    const name = input.name.trim();
    if (name === "") {
      throw new ReceiverError("VALIDATION_FAILED", "Receiver name cannot be empty");
    }
    const params = input.params ?? {};
    if (!isReceiverParams(params)) {
      throw new ReceiverError("VALIDATION_FAILED", "Receiver params must be a map");
    }
    if (input.actor !== undefined && Object.keys(input.actor).length > 0) {
      throw new ReceiverError(
        "VALIDATION_FAILED",
        "Receiver actor is assigned by the service and cannot be supplied",
      );
    }
    if (!canWrite(requester)) {
      throw new ReceiverError(
        "FORBIDDEN",
        `User '${requester.user}' may not create receivers in project '${requester.project}'`,
      );
    }

    const cluster = await this.clusters.find(input.clusterId, requester);
    if (cluster === undefined) {
      throw new ReceiverError(
        "CLUSTER_NOT_FOUND",
        `Cluster '${input.clusterId}' not found`,
      );
    }

    if ((await this.store.findByName(requester.project, name)) !== undefined) {
      throw new StoreError(
        "NAME_CONFLICT",
        `A receiver named '${name}' already exists in project '${requester.project}'`,
      );
    }

    let handle: CredentialHandle | undefined;
    if (input.type === "webhook") {
      handle = await this.delegator.issue(requester, {
        clusterId: cluster.id,
        action: input.action,
      });
    }

    const createdAt = this.now().toISOString();
    const record: ReceiverRecord = {
      id: this.generateId(),
      name,
      type: input.type,
      clusterId: cluster.id,
      action: input.action,
      actor: handle?.trustId ?? "",
      params,
      project: requester.project,
      domain: requester.domain,
      user: requester.user,
      createdAt,
      updatedAt: null,
    };

    try {
      await this.store.insert(record);
    } catch (err: unknown) {
      if (handle !== undefined) {
        await this.compensate(record, handle);
      }
      throw err;
    }

    this.logger?.info(
      { receiverId: record.id, type: record.type, clusterId: record.clusterId, project: record.project },
      "Receiver created",
    );
    return this.decorate(record);
  }

  // ─── Delete ─────────────────────────────────────────────────────────

  /**
   * @returns the receiver as it was before removal
   * @throws ReceiverError RECEIVER_NOT_FOUND or FORBIDDEN
   * @throws StoreError if the record cannot be removed (safe to retry)
   */
  async delete(receiverId: string, requester: RequesterIdentity): Promise<Receiver> {
    const record = await this.findVisible(receiverId, requester);

    if (!canWrite(requester)) {
      throw new ReceiverError(
        "FORBIDDEN",
        `User '${requester.user}' may not delete receivers in project '${record.project}'`,
      );
    }

    if (record.actor !== "") {
      await this.revokeQuietly(record, credentialHandle(record.actor));
    }

    const removed = await this.store.compareAndDelete(record.id, record.actor);
    if (!removed) {
      throw new ReceiverError("RECEIVER_NOT_FOUND", `Receiver '${receiverId}' not found`);
    }

    this.logger?.info({ receiverId, project: record.project }, "Receiver deleted");
    return this.decorate(record);
  }

  // ─── Reads ──────────────────────────────────────────────────────────

  /**
   * @throws ReceiverError RECEIVER_NOT_FOUND
   */
  async show(receiverId: string, requester: RequesterIdentity): Promise<Receiver> {
    return this.decorate(await this.findVisible(receiverId, requester));
  }

  /**
   * Receivers visible to the requester, in sort order.
   *
   * @throws ReceiverError FORBIDDEN when a non-operator asks for every project
   */
  async list(
    requester: RequesterIdentity,
    options: ListReceiversOptions = {},
  ): Promise<readonly Receiver[]> {
    if (options.globalProject === true && !isOperator(requester)) {
      throw new ReceiverError(
        "FORBIDDEN",
        "Listing receivers across projects requires operator scope",
      );
    }

    const records = await this.store.list({
      project: options.globalProject === true ? undefined : requester.project,
      names: options.names,
      type: options.type,
      clusterId: options.clusterId,
      action: options.action,
      sort: options.sort,
    });
    return records.map((r) => this.decorate(r));
  }

  // ─── Internals ──────────────────────────────────────────────────────

  private decorate(record: ReceiverRecord): Receiver {
    return { ...record, channel: this.channel(record.id, record.type) };
  }

  private async findVisible(
    receiverId: string,
    requester: RequesterIdentity,
  ): Promise<ReceiverRecord> {
    const record = await this.store.get(receiverId);
    if (
      record === undefined ||
      (record.project !== requester.project && !isOperator(requester))
    ) {
      throw new ReceiverError("RECEIVER_NOT_FOUND", `Receiver '${receiverId}' not found`);
    }
    return record;
  }

  /**
   * Undo a credential issued for a receiver that was never persisted.
   */
  private async compensate(record: ReceiverRecord, handle: CredentialHandle): Promise<void> {
    this.logger?.warn(
      { receiverId: record.id, trustId: handle.trustId },
      "Receiver insert failed; revoking its credential",
    );
    await this.revokeQuietly(record, handle);
  }

  /**
   * Revoke with retries on transient failure. Never throws: an already
   * revoked credential is the desired end state, and one that cannot be
   * revoked now is left for an out-of-band sweep.
   */
  private async revokeQuietly(record: ReceiverRecord, handle: CredentialHandle): Promise<void> {
    try {
      await withRetry(
        () => this.delegator.revoke(handle),
        this.revocationRetry,
        (err) => hasErrorCode(err, "REVOCATION_FAILED"),
        this.sleepFn,
      );
    } catch (err: unknown) {
      if (hasErrorCode(err, "ALREADY_REVOKED")) {
        this.logger?.info(
          { receiverId: record.id, trustId: handle.trustId },
          "Credential already revoked",
        );
        return;
      }
      this.logger?.warn(
        {
          receiverId: record.id,
          trustId: handle.trustId,
          err: err instanceof Error ? err.message : String(err),
        },
        "Credential revocation failed",
      );
    }
  }
}
