/**
 * In-memory identity service.
 *
 * Stand-in for the external identity service in development mode and
 * tests. Trusts live in a Map; expiry is evaluated against an injectable
 * clock.
 */

import { randomUUID } from "node:crypto";
import {
  DelegationNotAllowedError,
  TrustExpiredError,
  TrustNotFoundError,
} from "./types.js";
import type { IdentityService, TrustRecord, TrustRequest } from "./types.js";

export interface InMemoryIdentityServiceOptions {
  /** Users refused delegation rights */
  readonly deniedUsers?: readonly string[] | undefined;
  /** Lifetime of issued trusts in ms; unset means trusts never expire */
  readonly trustTtlMs?: number | undefined;
  readonly now?: (() => Date) | undefined;
}

export class InMemoryIdentityService implements IdentityService {
  private readonly _trusts = new Map<string, TrustRecord>();
  private readonly _deniedUsers: Set<string>;
  private readonly _trustTtlMs: number | undefined;
  private readonly _now: () => Date;

  constructor(options: InMemoryIdentityServiceOptions = {}) {
    this._deniedUsers = new Set(options.deniedUsers ?? []);
    this._trustTtlMs = options.trustTtlMs;
    this._now = options.now ?? (() => new Date());
  }

  async createTrust(request: TrustRequest): Promise<TrustRecord> {
    if (this._deniedUsers.has(request.trustor.user)) {
      throw new DelegationNotAllowedError(request.trustor.user);
    }

    const now = this._now();
    const trust: TrustRecord = {
      id: randomUUID(),
      trustorUser: request.trustor.user,
      project: request.trustor.project,
      domain: request.trustor.domain,
      scope: request.scope,
      createdAt: now.toISOString(),
      expiresAt:
        this._trustTtlMs === undefined
          ? null
          : new Date(now.getTime() + this._trustTtlMs).toISOString(),
    };
    this._trusts.set(trust.id, trust);
    return trust;
  }

  async deleteTrust(trustId: string): Promise<void> {
    if (!this._trusts.delete(trustId)) {
      throw new TrustNotFoundError(trustId);
    }
  }

  async authenticateTrust(trustId: string): Promise<TrustRecord> {
    const trust = this._trusts.get(trustId);
    if (trust === undefined) {
      throw new TrustNotFoundError(trustId);
    }
    if (trust.expiresAt !== null && trust.expiresAt <= this._now().toISOString()) {
      throw new TrustExpiredError(trustId);
    }
    return trust;
  }

  // ─── Introspection ─────────────────────────────────────────────────

  /**
   * Ids of trusts that still exist (expired ones included).
   */
  liveTrustIds(): readonly string[] {
    return [...this._trusts.keys()];
  }

  denyDelegation(user: string): void {
    this._deniedUsers.add(user);
  }

  get size(): number {
    return this._trusts.size;
  }
}
