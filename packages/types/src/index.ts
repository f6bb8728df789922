/**
 * @bondline/types — Shared domain types for the Bondline stack.
 *
 * These types are used across all Bondline packages:
 * - Chain identifiers (addresses, domains, clocks)
 * - Round-based price feeds
 * - Collaborator contracts (ownership registry, fungible asset)
 * - Event architecture
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - Amounts and prices are bigint
 * - No semantic interpretation in types — meaning lives in consuming code
 */

// Chain types
export type { Address, Hex, DomainId, DomainRef, Clock } from "./chain.js";
export { systemClock } from "./chain.js";

// Price types
export type { PriceRound, RoundDataFeed } from "./price.js";
export { EMPTY_ROUND } from "./price.js";

// Collaborators
export type { OwnershipRegistry, AssetToken } from "./collaborators.js";

// Event types
export type { DomainEvent, EventMetadata, EventSource } from "./event.js";

// Runtime type guards
export {
  isDomainId,
  isAddressLike,
  isPriceRound,
  isEventSource,
  isEventMetadata,
  isDomainEvent,
} from "./guards.js";
