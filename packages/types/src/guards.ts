/**
 * Runtime Type Guards
 *
 * Narrowing functions for Bondline domain types.
 * Used at system boundaries (HTTP inputs, decoded payloads, stored events).
 */

import { isAddress, isHex } from "viem";
import type { Address, DomainId } from "./chain.js";
import type { PriceRound } from "./price.js";
import type { DomainEvent, EventMetadata, EventSource } from "./event.js";

// =============================================================================
// Chain guards
// =============================================================================

export function isDomainId(value: unknown): value is DomainId {
  return typeof value === "string" && isHex(value, { strict: true }) && value.length === 66;
}

/**
 * Non-strict address check: accepts any casing, not only checksummed.
 */
export function isAddressLike(value: unknown): value is Address {
  return typeof value === "string" && isAddress(value, { strict: false });
}

// =============================================================================
// Price guards
// =============================================================================

const UINT80_MAX = (1n << 80n) - 1n;

export function isPriceRound(value: unknown): value is PriceRound {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v["roundId"] === "bigint" &&
    v["roundId"] >= 0n &&
    v["roundId"] <= UINT80_MAX &&
    typeof v["answer"] === "bigint" &&
    typeof v["startedAt"] === "bigint" &&
    v["startedAt"] >= 0n &&
    typeof v["updatedAt"] === "bigint" &&
    v["updatedAt"] >= 0n &&
    typeof v["answeredInRound"] === "bigint" &&
    v["answeredInRound"] >= 0n &&
    v["answeredInRound"] <= UINT80_MAX
  );
}

// =============================================================================
// Event guards
// =============================================================================

const EVENT_SOURCES = new Set<string>(["vault", "oracle", "relayer", "aggregator", "relay"]);

export function isEventSource(value: unknown): value is EventSource {
  return typeof value === "string" && EVENT_SOURCES.has(value);
}

export function isEventMetadata(value: unknown): value is EventMetadata {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v["eventId"] === "string" &&
    typeof v["timestamp"] === "string" &&
    typeof v["actor"] === "string" &&
    typeof v["correlationId"] === "string" &&
    isEventSource(v["source"])
  );
}

export function isDomainEvent(value: unknown): value is DomainEvent {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v["type"] === "string" &&
    isEventMetadata(v["metadata"]) &&
    v["payload"] !== null &&
    typeof v["payload"] === "object"
  );
}
