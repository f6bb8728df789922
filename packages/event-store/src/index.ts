/**
 * @bondline/event-store — Append-only event persistence.
 *
 * Provides:
 * - EventStore interface for append-only event streams
 * - InMemoryEventStore, hash-chained and optionally catalog-validated
 * - EventCatalog for typed, versioned event schemas
 * - Bond domain event definitions (10 event types)
 *
 * @packageDocumentation
 */

// Core types
export type {
  StoredEvent,
  StoredEventContent,
  ExpectedVersion,
  AppendOptions,
  AppendResult,
  ReadDirection,
  ReadOptions,
  ReadAllOptions,
  EventHandler,
  Subscription,
  EventStore,
  EventStoreErrorCode,
  IntegrityError,
  EventStoreIntegrityResult,
} from "./types.js";
export { EventStoreError } from "./types.js";

// Hash chain
export { computeEventHash, verifyHashChain, GENESIS_HASH } from "./hash-chain.js";

// Implementation
export { InMemoryEventStore } from "./in-memory-store.js";
export type { InMemoryEventStoreOptions } from "./in-memory-store.js";

// Catalog
export type { EventSchema } from "./catalog.js";
export { EventCatalog, CatalogError } from "./catalog.js";

// Bond domain events
export { BOND_EVENTS, createBondCatalog, createBondEvent, streamIdFor } from "./bond-events.js";
export type {
  BondEventType,
  BondEventPayloads,
  BondEventContext,
  StreamOwner,
  PrincipalPaidPayload,
  PrincipalRepaidPayload,
  InterestPaidPayload,
  FeesSetPayload,
  FeesRecipientSetPayload,
  DepositPayload,
  WithdrawPayload,
  AdminTransferredPayload,
  RoundUpdatedPayload,
  RoundRelayedPayload,
} from "./bond-events.js";
