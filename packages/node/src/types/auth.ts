/**
 * Authentication and authorization types.
 *
 * Supports two auth strategies:
 * 1. API key via X-Api-Key header
 * 2. JWT bearer token via Authorization header
 *
 * Role hierarchy: admin > member > reader
 */

import type { Permission, RequesterIdentity } from "@clusterhook/types";

// =============================================================================
// Roles & Permissions
// =============================================================================

export type Role = "admin" | "member" | "reader";

export const ROLES: readonly Role[] = ["admin", "member", "reader"];

/** Which permissions each role grants */
export const ROLE_PERMISSIONS: Record<Role, readonly Permission[]> = {
  reader: ["read"],
  member: ["read", "write"],
  admin: ["read", "write", "admin"],
};

export function isRole(value: unknown): value is Role {
  return value === "admin" || value === "member" || value === "reader";
}

/**
 * Check whether a role has a specific permission.
 */
export function hasPermission(role: Role, permission: Permission): boolean {
  return ROLE_PERMISSIONS[role].includes(permission);
}

// =============================================================================
// Auth Context
// =============================================================================

/**
 * Resolved caller, set by the auth middleware (or by the development
 * header middleware when auth is not configured).
 */
export interface AuthContext {
  readonly type: "api-key" | "jwt" | "header";
  readonly user: string;
  readonly role: Role;
  readonly project: string;
  readonly domain: string;
}

export function toRequester(auth: AuthContext): RequesterIdentity {
  return {
    user: auth.user,
    project: auth.project,
    domain: auth.domain,
    permissions: ROLE_PERMISSIONS[auth.role],
  };
}

// =============================================================================
// API Key Record
// =============================================================================

export interface ApiKeyRecord {
  readonly key: string;
  readonly role: Role;
  readonly user: string;
  readonly project: string;
}

// =============================================================================
// JWT Claims
// =============================================================================

export interface JwtClaims {
  readonly sub: string;
  readonly role: Role;
  readonly project: string;
  readonly domain?: string | undefined;
  readonly iss: string;
  readonly exp: number;
  readonly iat: number;
}
