/**
 * Event Types
 *
 * Append-only event architecture.
 * Every emitted vault, oracle and relayer event is captured as a DomainEvent.
 *
 * Rules:
 * - Events are immutable after creation
 * - Every event has metadata (who, when, why)
 * - Payload amounts are decimal strings (bigint does not serialize)
 */

/**
 * Components that emit events.
 */
export type EventSource = "vault" | "oracle" | "relayer" | "aggregator" | "relay";

/**
 * Metadata common to all domain events.
 */
export interface EventMetadata {
  /** Unique event ID */
  readonly eventId: string;

  /** ISO 8601 timestamp */
  readonly timestamp: string;

  /** Address (or service identity) that caused this event */
  readonly actor: string;

  /** ID of the event that caused this event (causal chain) */
  readonly causationId?: string;

  /** ID for grouping events emitted by one operation */
  readonly correlationId: string;

  /** Which component emitted this event */
  readonly source: EventSource;
}

/**
 * A domain event, discriminated by `type`.
 */
export interface DomainEvent {
  /** Event type identifier (e.g., "vault.principal.paid") */
  readonly type: string;

  readonly metadata: EventMetadata;

  /** Event-specific payload (typed by consumers) */
  readonly payload: Readonly<Record<string, unknown>>;
}
