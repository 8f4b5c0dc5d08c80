/**
 * Authentication and authorization types.
 *
 * Every caller resolves to an on-chain identity plus a role:
 * 1. API key via X-Api-Key header (secured mode)
 * 2. X-Caller-Identity header (unsecured mode: development, tests)
 *
 * Role hierarchy: admin > operator > viewer
 */

import type { Identity } from "@mintgate/types";

// =============================================================================
// Roles & Permissions
// =============================================================================

export type Role = "admin" | "operator" | "viewer";

/** Permission levels for role-based access control */
export type Permission = "read" | "write" | "admin";

/** Which permissions each role grants */
export const ROLE_PERMISSIONS: Record<Role, readonly Permission[]> = {
  viewer: ["read"],
  operator: ["read", "write"],
  admin: ["read", "write", "admin"],
};

export function isRole(value: string): value is Role {
  return value === "admin" || value === "operator" || value === "viewer";
}

export function hasPermission(role: Role, permission: Permission): boolean {
  return ROLE_PERMISSIONS[role].includes(permission);
}

// =============================================================================
// Auth Context
// =============================================================================

/**
 * Resolved caller, set by the auth middleware.
 */
export interface AuthContext {
  readonly type: "api-key" | "header";
  readonly identity: Identity;
  readonly role: Role;
}

// =============================================================================
// API Key Record
// =============================================================================

export interface ApiKeyRecord {
  readonly key: string;
  readonly role: Role;

  /** Address the key acts as */
  readonly identity: Identity;
}
