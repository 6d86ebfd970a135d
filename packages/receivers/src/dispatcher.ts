/**
 * Trigger Dispatcher — runtime entry point for receiver invocations.
 *
 * An invocation moves through:
 *
 *   RECEIVED → AUTHENTICATING → AUTHORIZED → SUBMITTED
 *                            ↘ REJECTED (UNAUTHORIZED | DISPATCH_REJECTED)
 *
 * SUBMITTED is terminal here; what happens to the action afterwards is
 * the action engine's business. The dispatcher holds no state between
 * calls and never queues or locks: concurrent invocations of the same
 * receiver are each authenticated and submitted on their own.
 */

import type { Logger } from "pino";
import type {
  ActingIdentity,
  ActionHandle,
  ReceiverParams,
  ReceiverRecord,
  ReceiverType,
  RequesterIdentity,
} from "@clusterhook/types";
import { canWrite, isOperator } from "@clusterhook/types";
import { DelegationError, ReceiverError } from "./errors.js";
import { ActionRejectedError } from "./collaborators/action-engine.js";
import type { ActionEngine } from "./collaborators/action-engine.js";
import { credentialHandle } from "./delegation/types.js";
import type { CredentialDelegator } from "./delegation/types.js";
import type { ReceiverStore } from "./store/types.js";

// =============================================================================
// Types
// =============================================================================

/**
 * What the invoker presented. Webhook calls are anonymous; signal calls
 * carry the caller's own authenticated identity.
 */
export type InvocationAuth =
  | { readonly kind: "anonymous" }
  | { readonly kind: "identity"; readonly identity: RequesterIdentity };

export const ANONYMOUS: InvocationAuth = { kind: "anonymous" };

export type InvocationState =
  | "RECEIVED"
  | "AUTHENTICATING"
  | "AUTHORIZED"
  | "SUBMITTED"
  | "REJECTED";

export interface InvocationTransition {
  readonly receiverId: string;
  readonly state: InvocationState;
  /** Error code, for REJECTED */
  readonly reason?: string | undefined;
}

export interface InvocationResult {
  readonly state: "SUBMITTED";
  readonly receiverId: string;
  /** Project owning the receiver */
  readonly project: string;
  readonly action: ActionHandle;
  /** Effective parameters the action was submitted with */
  readonly params: ReceiverParams;
  readonly actor: ActingIdentity;
}

/**
 * Per-variant authentication strategy.
 */
export interface Authenticator {
  /**
   * @throws ReceiverError UNAUTHORIZED
   */
  authenticate(
    receiver: ReceiverRecord,
    auth: InvocationAuth,
  ): Promise<ActingIdentity>;
}

// =============================================================================
// Authenticators
// =============================================================================

/**
 * Webhook: whoever called, act as the receiver owner through the stored
 * delegated credential.
 */
export function webhookAuthenticator(delegator: CredentialDelegator): Authenticator {
  return {
    async authenticate(receiver) {
      if (receiver.actor === "") {
        throw new ReceiverError(
          "UNAUTHORIZED",
          `Receiver '${receiver.id}' has no delegated credential`,
        );
      }
      try {
        return await delegator.impersonate(credentialHandle(receiver.actor), {
          clusterId: receiver.clusterId,
          action: receiver.action,
        });
      } catch (err: unknown) {
        if (err instanceof DelegationError) {
          throw new ReceiverError("UNAUTHORIZED", err.message);
        }
        throw err;
      }
    },
  };
}

/**
 * Signal: the caller's own credential must be good for the receiver's
 * project (with write access) or carry operator scope.
 */
export function signalAuthenticator(): Authenticator {
  return {
    async authenticate(receiver, auth) {
      if (auth.kind !== "identity") {
        throw new ReceiverError(
          "UNAUTHORIZED",
          `Receiver '${receiver.id}' requires an authenticated caller`,
        );
      }
      const { identity } = auth;
      const allowed =
        isOperator(identity) ||
        (identity.project === receiver.project && canWrite(identity));
      if (!allowed) {
        throw new ReceiverError(
          "UNAUTHORIZED",
          `Caller '${identity.user}' may not signal receiver '${receiver.id}'`,
        );
      }
      return {
        user: identity.user,
        project: identity.project,
        domain: identity.domain,
        via: "direct",
      };
    },
  };
}

export function createAuthenticators(
  delegator: CredentialDelegator,
): Readonly<Record<ReceiverType, Authenticator>> {
  return {
    webhook: webhookAuthenticator(delegator),
    signal: signalAuthenticator(),
  };
}

/**
 * Invocation values win per key; unspecified keys keep the stored default.
 */
export function mergeParams(
  defaults: ReceiverParams,
  overrides: ReceiverParams | undefined,
): ReceiverParams {
  return { ...defaults, ...(overrides ?? {}) };
}

// =============================================================================
// Dispatcher
// =============================================================================

export interface TriggerDispatcherDeps {
  readonly store: ReceiverStore;
  readonly delegator: CredentialDelegator;
  readonly engine: ActionEngine;
  readonly logger?: Logger | undefined;
  readonly onTransition?: ((transition: InvocationTransition) => void) | undefined;
}

export class TriggerDispatcher {
  private readonly store: ReceiverStore;
  private readonly engine: ActionEngine;
  private readonly authenticators: Readonly<Record<ReceiverType, Authenticator>>;
  private readonly logger: Logger | undefined;
  private readonly onTransition: ((transition: InvocationTransition) => void) | undefined;

  constructor(deps: TriggerDispatcherDeps) {
    this.store = deps.store;
    this.engine = deps.engine;
    this.authenticators = createAuthenticators(deps.delegator);
    this.logger = deps.logger;
    this.onTransition = deps.onTransition;
  }

  /**
   * Authenticate an invocation and submit the receiver's action.
   *
   * Returns as soon as the engine accepts the submission.
   *
   * @throws ReceiverError RECEIVER_NOT_FOUND, UNAUTHORIZED, DISPATCH_REJECTED or UNAVAILABLE
   */
  async invoke(
    receiverId: string,
    params: ReceiverParams | undefined,
    auth: InvocationAuth,
  ): Promise<InvocationResult> {
    this.transition(receiverId, "RECEIVED");

    const receiver = await this.store.get(receiverId);
    if (receiver === undefined) {
      return this.reject(
        receiverId,
        new ReceiverError("RECEIVER_NOT_FOUND", `Receiver '${receiverId}' not found`),
      );
    }

    this.transition(receiverId, "AUTHENTICATING");
    let actor: ActingIdentity;
    try {
      actor = await this.authenticators[receiver.type].authenticate(receiver, auth);
    } catch (err: unknown) {
      if (err instanceof ReceiverError) {
        return this.reject(receiverId, err);
      }
      throw err;
    }
    this.transition(receiverId, "AUTHORIZED");

    const effective = mergeParams(receiver.params, params);

    let action: ActionHandle;
    try {
      action = await this.engine.submit({
        action: receiver.action,
        clusterId: receiver.clusterId,
        params: effective,
        actor,
        cause: `receiver:${receiver.id}`,
      });
    } catch (err: unknown) {
      if (err instanceof ActionRejectedError) {
        return this.reject(
          receiverId,
          new ReceiverError("DISPATCH_REJECTED", err.message),
        );
      }
      return this.reject(
        receiverId,
        new ReceiverError(
          "UNAVAILABLE",
          `Action engine unavailable: ${err instanceof Error ? err.message : String(err)}`,
        ),
      );
    }

    this.transition(receiverId, "SUBMITTED");
    return {
      state: "SUBMITTED",
      receiverId,
      project: receiver.project,
      action,
      params: effective,
      actor,
    };
  }

  private transition(receiverId: string, state: InvocationState, reason?: string): void {
    this.logger?.debug({ receiverId, state, reason }, "Invocation transition");
    this.onTransition?.({ receiverId, state, reason });
  }

  private reject(receiverId: string, err: ReceiverError): never {
    this.transition(receiverId, "REJECTED", err.code);
    throw err;
  }
}
