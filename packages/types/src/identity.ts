/**
 * Identity Types
 *
 * RequesterIdentity is the authenticated caller of an API operation.
 * ActingIdentity is who an action is submitted as: either the caller
 * themselves (signal) or the receiver owner through a delegated trust
 * (webhook).
 */

export type Permission = "read" | "write" | "admin";

export interface RequesterIdentity {
  readonly user: string;
  readonly project: string;
  readonly domain: string;
  readonly permissions: readonly Permission[];
}

export interface ActingIdentity {
  readonly user: string;
  readonly project: string;
  readonly domain: string;
  readonly via: "trust" | "direct";

  /** Set when `via` is "trust" */
  readonly trustId?: string | undefined;
}

/**
 * Operator scope: may see and manage receivers of every project.
 */
export function isOperator(identity: RequesterIdentity): boolean {
  return identity.permissions.includes("admin");
}

export function canWrite(identity: RequesterIdentity): boolean {
  return identity.permissions.includes("write");
}
