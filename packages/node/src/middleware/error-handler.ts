/**
 * Global error handler middleware.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response.
 *
 * Maps domain error codes (VaultError, OracleError, RelayError,
 * LedgerError, EventStoreError) to HTTP status codes:
 * - authorization → 403
 * - state preconditions → 409
 * - business rule violations → 422
 * - malformed input → 400
 * - unknown ids → 404
 * - price unavailable → 503
 */

import type { Context } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import { ZodError } from "zod";
import { createErrorEnvelope } from "../types/error.js";
import { formatZodErrors } from "./validate.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

const STATUS_MAP: Readonly<Record<string, ContentfulStatusCode>> = {
  // Authorization
  ONLY_DEBTOR: 403,
  ONLY_DEBTOR_OR_CREDITOR: 403,
  ONLY_ADMIN: 403,
  NOT_BOND_OWNER: 403,
  INVALID_SOURCE: 403,
  UNEXPECTED_MESSAGE: 403,

  // Vault state preconditions
  PRINCIPAL_ALREADY_PAID: 409,
  PRINCIPAL_NOT_PAID: 409,
  BOND_ALREADY_EXISTS: 409,
  CONCURRENCY_CONFLICT: 409,

  // Business rules
  ZERO_AMOUNT: 422,
  INVALID_PRINCIPAL_AMOUNT: 422,
  EXCESSIVE_VAULT_FEES: 422,
  INVALID_BOND_MATURITY: 422,
  INSUFFICIENT_ASSETS: 422,
  EXCEEDS_MAX_WITHDRAW: 422,
  INSUFFICIENT_BALANCE: 422,
  INSUFFICIENT_ALLOWANCE: 422,

  // Malformed input
  ZERO_ADDRESS: 400,
  INVALID_ADDRESS: 400,
  INVALID_AMOUNT: 400,
  MALFORMED_PAYLOAD: 400,
  VALIDATION_ERROR: 400,

  // Unknown ids
  ROUND_NOT_FOUND: 404,
  MESSAGE_NOT_FOUND: 404,
  BOND_NOT_FOUND: 404,
  UNKNOWN_DOMAIN: 404,

  // Sealed entry points
  NOT_SUPPORTED: 405,

  // Oracle integrity
  STALE_PRICE: 503,
  INVALID_PRICE_VALUE: 503,
  PRICE_FEEDS_TIME_MISMATCH: 503,
};

function errorCodeOf(err: Error): string | undefined {
  return "code" in err && typeof err.code === "string" ? err.code : undefined;
}

// =============================================================================
// Middleware
// =============================================================================

/**
 * Global error handler. Registered as Hono's onError handler.
 */
export function handleError(err: Error, c: Context): Response {
  if (err instanceof ZodError) {
    return c.json(
      createErrorEnvelope("VALIDATION_ERROR", "Request validation failed", {
        issues: formatZodErrors(err),
      }),
      400,
    );
  }

  const code = errorCodeOf(err);
  const status = code !== undefined ? (STATUS_MAP[code] ?? 500) : 500;

  // Don't leak internal details
  if (status === 500) {
    return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
  }
  return c.json(createErrorEnvelope(code ?? "INTERNAL_ERROR", err.message), status);
}
