/**
 * TrustDelegator — CredentialDelegator backed by identity service trusts.
 *
 * Translates the identity service's vocabulary (trusts, not-found,
 * expired) into credential handles and DelegationErrors, and bounds every
 * call with a timeout.
 */

import type { Logger } from "pino";
import type { ActingIdentity, RequesterIdentity } from "@clusterhook/types";
import { DelegationError } from "../errors.js";
import { TimeoutError, withTimeout } from "../retry.js";
import {
  TrustExpiredError,
  TrustNotFoundError,
  credentialHandle,
} from "./types.js";
import type {
  CredentialDelegator,
  CredentialHandle,
  DelegationScope,
  IdentityService,
  TrustRecord,
} from "./types.js";

export interface TrustDelegatorOptions {
  readonly identityService: IdentityService;
  /** Upper bound for each identity service call. Default: 10000 */
  readonly timeoutMs?: number | undefined;
  readonly logger?: Logger | undefined;
}

const DEFAULT_TIMEOUT_MS = 10_000;

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class TrustDelegator implements CredentialDelegator {
  private readonly identityService: IdentityService;
  private readonly timeoutMs: number;
  private readonly logger: Logger | undefined;

  constructor(options: TrustDelegatorOptions) {
    this.identityService = options.identityService;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.logger = options.logger;
  }

  async issue(
    requester: RequesterIdentity,
    scope: DelegationScope,
  ): Promise<CredentialHandle> {
    const pending = this.identityService.createTrust({
      trustor: {
        user: requester.user,
        project: requester.project,
        domain: requester.domain,
      },
      scope,
    });

    try {
      const trust = await withTimeout(pending, this.timeoutMs, "Trust creation");
      this.logger?.debug(
        { trustId: trust.id, user: requester.user, clusterId: scope.clusterId },
        "Trust issued",
      );
      return credentialHandle(trust.id);
    } catch (err: unknown) {
      if (err instanceof TimeoutError) {
        this.revokeLate(pending, requester.user);
      }
      throw new DelegationError(
        "DELEGATION_FAILED",
        `Failed to delegate for user '${requester.user}': ${errorMessage(err)}`,
      );
    }
  }

  /**
   * A trust created after its caller timed out is owned by nobody.
   * Delete it once the identity service answers.
   */
  private revokeLate(pending: Promise<TrustRecord>, user: string): void {
    pending
      .then(async (trust) => {
        await this.identityService.deleteTrust(trust.id);
        this.logger?.warn({ trustId: trust.id, user }, "Revoked trust issued after timeout");
      })
      .catch((err: unknown) => {
        this.logger?.warn(
          { user, err: errorMessage(err) },
          "Could not revoke trust issued after timeout",
        );
      });
  }

  async revoke(handle: CredentialHandle): Promise<void> {
    try {
      await withTimeout(
        this.identityService.deleteTrust(handle.trustId),
        this.timeoutMs,
        "Trust deletion",
      );
    } catch (err: unknown) {
      if (err instanceof TrustNotFoundError) {
        throw new DelegationError(
          "ALREADY_REVOKED",
          `Trust '${handle.trustId}' is already revoked`,
          handle.trustId,
        );
      }
      throw new DelegationError(
        "REVOCATION_FAILED",
        err instanceof TimeoutError
          ? err.message
          : `Failed to revoke trust '${handle.trustId}': ${errorMessage(err)}`,
        handle.trustId,
      );
    }
  }

  async impersonate(
    handle: CredentialHandle,
    scope?: DelegationScope,
  ): Promise<ActingIdentity> {
    const trust = await this.authenticate(handle);

    if (
      scope !== undefined &&
      (trust.scope.clusterId !== scope.clusterId ||
        trust.scope.action !== scope.action)
    ) {
      throw new DelegationError(
        "CREDENTIAL_INVALID",
        `Trust '${handle.trustId}' is not scoped to ${scope.action} on cluster '${scope.clusterId}'`,
        handle.trustId,
      );
    }

    return {
      user: trust.trustorUser,
      project: trust.project,
      domain: trust.domain,
      via: "trust",
      trustId: trust.id,
    };
  }

  private async authenticate(handle: CredentialHandle): Promise<TrustRecord> {
    try {
      return await withTimeout(
        this.identityService.authenticateTrust(handle.trustId),
        this.timeoutMs,
        "Trust authentication",
      );
    } catch (err: unknown) {
      const reason =
        err instanceof TrustNotFoundError
          ? "revoked"
          : err instanceof TrustExpiredError
            ? "expired"
            : errorMessage(err);
      throw new DelegationError(
        "CREDENTIAL_INVALID",
        `Trust '${handle.trustId}' cannot be used: ${reason}`,
        handle.trustId,
      );
    }
  }
}
