/**
 * Authentication middleware.
 *
 * Secured mode: X-Api-Key header → looked up in the configured key
 * registry; the request acts as the key's bound address.
 *
 * Unsecured mode (tests, dev): X-Caller-Address header names the
 * address the request acts as, with the admin role.
 *
 * On success, sets `c.set("auth", authContext)`.
 * On failure, returns 401 or 403.
 */

import type { MiddlewareHandler } from "hono";
import { getAddress } from "viem";
import { isAddressLike } from "@bondline/types";
import type { AppEnv } from "../types/api-contract.js";
import type { ApiKeyRecord, Permission } from "../types/auth.js";
import { hasPermission } from "../types/auth.js";
import { createErrorEnvelope } from "../types/error.js";

export const API_KEY_HEADER = "X-Api-Key";
export const CALLER_HEADER = "X-Caller-Address";

// =============================================================================
// Auth Middleware
// =============================================================================

export interface AuthConfig {
  /** Map of API key → record */
  readonly apiKeys: ReadonlyMap<string, ApiKeyRecord>;
}

export function authMiddleware(config: AuthConfig): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const apiKey = c.req.header(API_KEY_HEADER);
    if (apiKey === undefined) {
      return c.json(createErrorEnvelope("UNAUTHORIZED", "Authentication required"), 401);
    }

    const record = config.apiKeys.get(apiKey);
    if (record === undefined) {
      return c.json(createErrorEnvelope("UNAUTHORIZED", "Invalid API key"), 401);
    }

    c.set("auth", {
      type: "api-key",
      identity: record.key,
      role: record.role,
      address: getAddress(record.address),
    });
    return next();
  };
}

/**
 * Trust the caller's own claim of who it is. Never use in production.
 */
export function callerHeaderMiddleware(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const caller = c.req.header(CALLER_HEADER);
    if (caller === undefined) {
      return c.json(
        createErrorEnvelope("UNAUTHORIZED", `${CALLER_HEADER} header required`),
        401,
      );
    }
    if (!isAddressLike(caller)) {
      return c.json(
        createErrorEnvelope("UNAUTHORIZED", `Invalid ${CALLER_HEADER}: "${caller}"`),
        401,
      );
    }

    c.set("auth", { type: "header", identity: caller, role: "admin", address: getAddress(caller) });
    return next();
  };
}

// =============================================================================
// Permission Guard
// =============================================================================

/**
 * Must run AFTER an auth middleware. Returns 403 if the authenticated
 * role lacks the required permission.
 */
export function requirePermission(
  permission: Permission,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const auth = c.get("auth");
    if (!hasPermission(auth.role, permission)) {
      return c.json(
        createErrorEnvelope(
          "FORBIDDEN",
          `Role '${auth.role}' lacks '${permission}' permission`,
        ),
        403,
      );
    }
    return next();
  };
}
