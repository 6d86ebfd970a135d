/**
 * ReceiverService — Composition root for the receiver subsystem.
 *
 * Route handlers delegate to this service; they never build domain
 * objects themselves. The external collaborators (identity service,
 * cluster registry, action engine) are injected, with in-process
 * stand-ins when none are given.
 */

import type { Logger } from "pino";
import type {
  ClusterRef,
  Receiver,
  ReceiverParams,
  RequesterIdentity,
} from "@clusterhook/types";
import {
  DEFAULT_RETRY_CONFIG,
  InMemoryActionEngine,
  InMemoryClusterRegistry,
  InMemoryIdentityService,
  InMemoryReceiverStore,
  JsonlReceiverStore,
  ReceiverLifecycle,
  TriggerDispatcher,
  createChannelAllocator,
  TrustDelegator,
  ANONYMOUS,
} from "@clusterhook/receivers";
import type {
  ActionEngine,
  ClusterRegistry,
  CreateReceiverInput,
  IdentityService,
  InvocationResult,
  ListReceiversOptions,
  ReceiverStore,
} from "@clusterhook/receivers";
import { AuditLog } from "./audit-log.js";

// =============================================================================
// Configuration
// =============================================================================

export interface ReceiverServiceConfig {
  /** Base URL webhook channels are derived from */
  readonly publicBaseUrl: string;
  /** JSONL store file; in-memory store when unset */
  readonly storePath?: string | undefined;
  /** Clusters for the in-process registry */
  readonly clusters?: readonly ClusterRef[] | undefined;
  readonly delegationTimeoutMs?: number | undefined;
  readonly revocationMaxAttempts?: number | undefined;
  readonly logger?: Logger | undefined;

  // Collaborator overrides
  readonly store?: ReceiverStore | undefined;
  readonly identityService?: IdentityService | undefined;
  readonly clusterRegistry?: ClusterRegistry | undefined;
  readonly actionEngine?: ActionEngine | undefined;
}

// =============================================================================
// Service
// =============================================================================

export class ReceiverService {
  readonly store: ReceiverStore;
  readonly lifecycle: ReceiverLifecycle;
  readonly dispatcher: TriggerDispatcher;
  readonly auditLog: AuditLog;

  constructor(config: ReceiverServiceConfig) {
    const logger = config.logger;

    this.store =
      config.store ??
      (config.storePath !== undefined
        ? new JsonlReceiverStore({ filePath: config.storePath })
        : new InMemoryReceiverStore());

    const clusterRegistry =
      config.clusterRegistry ?? new InMemoryClusterRegistry(config.clusters ?? []);
    const delegator = new TrustDelegator({
      identityService: config.identityService ?? new InMemoryIdentityService(),
      timeoutMs: config.delegationTimeoutMs,
      logger: logger?.child({ component: "delegator" }),
    });

    this.lifecycle = new ReceiverLifecycle({
      store: this.store,
      delegator,
      clusters: clusterRegistry,
      channel: createChannelAllocator(config.publicBaseUrl),
      logger: logger?.child({ component: "lifecycle" }),
      revocationRetry: {
        ...DEFAULT_RETRY_CONFIG,
        maxAttempts: config.revocationMaxAttempts ?? DEFAULT_RETRY_CONFIG.maxAttempts,
      },
    });

    this.dispatcher = new TriggerDispatcher({
      store: this.store,
      delegator,
      engine: config.actionEngine ?? new InMemoryActionEngine(),
      logger: logger?.child({ component: "dispatcher" }),
    });

    this.auditLog = new AuditLog();
  }

  // ─── Receivers ─────────────────────────────────────────────────────

  async createReceiver(
    input: CreateReceiverInput,
    requester: RequesterIdentity,
  ): Promise<Receiver> {
    const receiver = await this.lifecycle.create(input, requester);
    this.auditLog.append({
      tenantId: receiver.project,
      action: "create",
      resourceType: "receiver",
      resourceId: receiver.id,
      actor: requester.user,
    });
    return receiver;
  }

  async deleteReceiver(id: string, requester: RequesterIdentity): Promise<void> {
    const receiver = await this.lifecycle.delete(id, requester);
    this.auditLog.append({
      tenantId: receiver.project,
      action: "delete",
      resourceType: "receiver",
      resourceId: id,
      actor: requester.user,
    });
  }

  getReceiver(id: string, requester: RequesterIdentity): Promise<Receiver> {
    return this.lifecycle.show(id, requester);
  }

  listReceivers(
    requester: RequesterIdentity,
    options: ListReceiversOptions,
  ): Promise<readonly Receiver[]> {
    return this.lifecycle.list(requester, options);
  }

  // ─── Invocation ────────────────────────────────────────────────────

  /**
   * Webhook path: anonymous, authorized by the receiver's credential.
   */
  async triggerWebhook(
    id: string,
    params: ReceiverParams | undefined,
  ): Promise<InvocationResult> {
    const result = await this.dispatcher.invoke(id, params, ANONYMOUS);
    this.recordTrigger(result, "webhook");
    return result;
  }

  /**
   * Signal path: the caller authenticates with their own identity.
   */
  async notify(
    id: string,
    params: ReceiverParams | undefined,
    requester: RequesterIdentity,
  ): Promise<InvocationResult> {
    const result = await this.dispatcher.invoke(id, params, {
      kind: "identity",
      identity: requester,
    });
    this.recordTrigger(result, requester.user);
    return result;
  }

  // ─── Health ────────────────────────────────────────────────────────

  /**
   * @throws StoreError STORE_UNAVAILABLE
   */
  ping(): Promise<void> {
    return this.store.ping();
  }

  private recordTrigger(result: InvocationResult, actor: string): void {
    this.auditLog.append({
      tenantId: result.project,
      action: "trigger",
      resourceType: "receiver",
      resourceId: result.receiverId,
      actor,
      detail: `${result.action.action} → ${result.action.id}`,
    });
  }
}
