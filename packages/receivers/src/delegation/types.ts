/**
 * Credential delegation types.
 *
 * The identity service issues trusts: a trust lets the receiver service
 * act as the trustor (the user who created a webhook receiver) without
 * holding that user's session. A trust is scoped to one action on one
 * cluster and lives until it is deleted or expires.
 *
 * Two layers:
 * - IdentityService: the port to the external identity service
 * - CredentialDelegator: what the receiver subsystem consumes, speaking
 *   in CredentialHandles and DelegationErrors
 */

import type {
  ActingIdentity,
  ActionName,
  RequesterIdentity,
} from "@clusterhook/types";

// =============================================================================
// Scope & Handle
// =============================================================================

/**
 * What a delegated credential may be used for.
 */
export interface DelegationScope {
  readonly clusterId: string;
  readonly action: ActionName;
}

/**
 * Opaque capability referencing one trust.
 *
 * Owned by exactly one receiver; persisted as the receiver's `actor`.
 */
export interface CredentialHandle {
  readonly trustId: string;
}

export function credentialHandle(trustId: string): CredentialHandle {
  return { trustId };
}

// =============================================================================
// Identity Service Port
// =============================================================================

export interface TrustRequest {
  readonly trustor: {
    readonly user: string;
    readonly project: string;
    readonly domain: string;
  };
  readonly scope: DelegationScope;
}

export interface TrustRecord {
  readonly id: string;
  readonly trustorUser: string;
  readonly project: string;
  readonly domain: string;
  readonly scope: DelegationScope;
  readonly createdAt: string;
  /** ISO 8601, or null for trusts that never expire */
  readonly expiresAt: string | null;
}

export interface IdentityService {
  /**
   * @throws DelegationNotAllowedError if the trustor may not delegate
   */
  createTrust(request: TrustRequest): Promise<TrustRecord>;

  /**
   * @throws TrustNotFoundError if the trust does not exist (any more)
   */
  deleteTrust(trustId: string): Promise<void>;

  /**
   * Authenticate with a trust and return it.
   *
   * @throws TrustNotFoundError if the trust was deleted
   * @throws TrustExpiredError if the trust has expired
   */
  authenticateTrust(trustId: string): Promise<TrustRecord>;
}

export class TrustNotFoundError extends Error {
  constructor(public readonly trustId: string) {
    super(`Trust '${trustId}' not found`);
    this.name = "TrustNotFoundError";
  }
}

export class TrustExpiredError extends Error {
  constructor(public readonly trustId: string) {
    super(`Trust '${trustId}' has expired`);
    this.name = "TrustExpiredError";
  }
}

export class DelegationNotAllowedError extends Error {
  constructor(public readonly user: string) {
    super(`User '${user}' may not delegate`);
    this.name = "DelegationNotAllowedError";
  }
}

// =============================================================================
// Credential Delegator
// =============================================================================

export interface CredentialDelegator {
  /**
   * Issue a credential that acts as `requester` for `scope` until revoked.
   *
   * @throws DelegationError DELEGATION_FAILED
   */
  issue(
    requester: RequesterIdentity,
    scope: DelegationScope,
  ): Promise<CredentialHandle>;

  /**
   * @throws DelegationError ALREADY_REVOKED (non-fatal) or REVOCATION_FAILED (transient)
   */
  revoke(handle: CredentialHandle): Promise<void>;

  /**
   * Obtain the identity the credential acts as. When `scope` is given the
   * credential must have been issued for exactly that scope.
   *
   * @throws DelegationError CREDENTIAL_INVALID
   */
  impersonate(
    handle: CredentialHandle,
    scope?: DelegationScope,
  ): Promise<ActingIdentity>;
}
