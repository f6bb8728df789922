/**
 * Authentication and authorization types.
 *
 * Every API key is bound to one on-chain identity: requests made with
 * the key act as that address (debtor, creditor, admin, ...).
 *
 * Role hierarchy: admin > operator > viewer
 */

import type { Address } from "@bondline/types";

// =============================================================================
// Roles & Permissions
// =============================================================================

export type Role = "admin" | "operator" | "viewer";

/**
 * - read:  queries
 * - write: deposits, withdrawals, relay sends
 * - admin: vault parameters, source price, manual delivery
 */
export type Permission = "read" | "write" | "admin";

/** Which permissions each role grants */
export const ROLE_PERMISSIONS: Record<Role, readonly Permission[]> = {
  viewer: ["read"],
  operator: ["read", "write"],
  admin: ["read", "write", "admin"],
};

export function hasPermission(role: Role, permission: Permission): boolean {
  return ROLE_PERMISSIONS[role].includes(permission);
}

// =============================================================================
// Auth Context
// =============================================================================

/**
 * Resolved authentication context, set by the auth middleware.
 */
export interface AuthContext {
  readonly type: "api-key" | "header";
  readonly identity: string;
  readonly role: Role;

  /** Address the request acts as */
  readonly address: Address;
}

// =============================================================================
// API Key Record
// =============================================================================

export interface ApiKeyRecord {
  readonly key: string;
  readonly role: Role;
  readonly address: Address;
}
