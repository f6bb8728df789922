/**
 * @bondline/event-store — Bond domain event definitions.
 *
 * The catalog of events emitted by the repayment vault, the valuation
 * oracle and the price relayer.
 *
 * Naming convention: `<component>.<entity>.<action>`
 * Examples:
 * - vault.principal.paid
 * - oracle.round.updated
 * - relayer.round.relayed
 *
 * Amounts, prices and round ids travel as base-10 strings.
 */

import { randomUUID } from "node:crypto";
import type { DomainEvent, EventSource } from "@bondline/types";
import type { EventSchema } from "./catalog.js";
import { EventCatalog } from "./catalog.js";

// =============================================================================
// Vault Events
// =============================================================================

export type PrincipalPaidPayload = {
  readonly assets: string;
  readonly value: string;
  readonly creditor: string;
  readonly debtor: string;
};

export type PrincipalRepaidPayload = {
  readonly assets: string;
  readonly value: string;
  readonly debtor: string;
  readonly creditor: string;
};

export type InterestPaidPayload = {
  readonly assets: string;
  readonly value: string;
  readonly debtor: string;
  readonly creditor: string;
  /** Portion of `assets` credited to the fees recipient */
  readonly fees: string;
  readonly feesRecipient: string;
};

export type FeesSetPayload = {
  readonly bips: number;
};

export type FeesRecipientSetPayload = {
  readonly recipient: string;
};

export type DepositPayload = {
  readonly caller: string;
  readonly owner: string;
  readonly assets: string;
  readonly shares: string;
};

export type WithdrawPayload = {
  readonly caller: string;
  readonly receiver: string;
  readonly owner: string;
  readonly assets: string;
  readonly shares: string;
};

export type AdminTransferredPayload = {
  readonly previousAdmin: string;
  readonly newAdmin: string;
};

// =============================================================================
// Oracle & Relayer Events
// =============================================================================

export type RoundUpdatedPayload = {
  readonly roundId: string;
  readonly answer: string;
  readonly startedAt: string;
  readonly updatedAt: string;
  readonly answeredInRound: string;
};

export type RoundRelayedPayload = {
  readonly messageId: string;
  readonly roundId: string;
  readonly answer: string;
  readonly updatedAt: string;
  readonly destinationDomain: string;
  readonly destinationAddress: string;
};

// =============================================================================
// Event Type Constants
// =============================================================================

export const BOND_EVENTS = {
  // Vault
  PRINCIPAL_PAID: "vault.principal.paid",
  PRINCIPAL_REPAID: "vault.principal.repaid",
  INTEREST_PAID: "vault.interest.paid",
  FEES_SET: "vault.fees.set",
  FEES_RECIPIENT_SET: "vault.fees_recipient.set",
  DEPOSIT: "vault.deposit",
  WITHDRAW: "vault.withdraw",
  ADMIN_TRANSFERRED: "vault.admin.transferred",

  // Oracle
  ROUND_UPDATED: "oracle.round.updated",

  // Relayer
  ROUND_RELAYED: "relayer.round.relayed",
} as const;

export type BondEventType = (typeof BOND_EVENTS)[keyof typeof BOND_EVENTS];

/**
 * Payload shape for each event type.
 */
export interface BondEventPayloads {
  "vault.principal.paid": PrincipalPaidPayload;
  "vault.principal.repaid": PrincipalRepaidPayload;
  "vault.interest.paid": InterestPaidPayload;
  "vault.fees.set": FeesSetPayload;
  "vault.fees_recipient.set": FeesRecipientSetPayload;
  "vault.deposit": DepositPayload;
  "vault.withdraw": WithdrawPayload;
  "vault.admin.transferred": AdminTransferredPayload;
  "oracle.round.updated": RoundUpdatedPayload;
  "relayer.round.relayed": RoundRelayedPayload;
}

// =============================================================================
// Event Construction
// =============================================================================

/** Component kinds that own an event stream. */
export type StreamOwner = "vault" | "oracle" | "relayer";

/**
 * Stream id for a component instance, e.g. `vault:0xAbC…`.
 */
export function streamIdFor(owner: StreamOwner, address: string): string {
  return `${owner}:${address}`;
}

export interface BondEventContext {
  readonly source: EventSource;
  readonly actor: string;
  readonly correlationId: string;
  readonly causationId?: string;
  /** ISO 8601. Default: now */
  readonly timestamp?: string;
}

/**
 * Build a typed bond event with fresh metadata.
 */
export function createBondEvent<T extends BondEventType>(
  type: T,
  context: BondEventContext,
  payload: BondEventPayloads[T],
): DomainEvent {
  return {
    type,
    metadata: {
      eventId: randomUUID(),
      timestamp: context.timestamp ?? new Date().toISOString(),
      actor: context.actor,
      ...(context.causationId !== undefined ? { causationId: context.causationId } : {}),
      correlationId: context.correlationId,
      source: context.source,
    },
    payload,
  };
}

// =============================================================================
// Schema Definitions
// =============================================================================

function isObject(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null;
}

function hasString(obj: Record<string, unknown>, key: string): boolean {
  return typeof obj[key] === "string";
}

function hasInteger(obj: Record<string, unknown>, key: string): boolean {
  const v = obj[key];
  return typeof v === "string" && /^-?\d+$/.test(v);
}

function hasStrings(obj: Record<string, unknown>, keys: readonly string[]): boolean {
  return keys.every((k) => hasString(obj, k));
}

function hasIntegers(obj: Record<string, unknown>, keys: readonly string[]): boolean {
  return keys.every((k) => hasInteger(obj, k));
}

const VAULT_SCHEMAS: readonly EventSchema[] = [
  {
    type: BOND_EVENTS.PRINCIPAL_PAID,
    version: 1,
    description: "The creditor funded the bond principal",
    source: "vault",
    validate: (p) =>
      isObject(p) && hasIntegers(p, ["assets", "value"]) && hasStrings(p, ["creditor", "debtor"]),
  },
  {
    type: BOND_EVENTS.PRINCIPAL_REPAID,
    version: 1,
    description: "The debtor repaid part or all of the principal",
    source: "vault",
    validate: (p) =>
      isObject(p) && hasIntegers(p, ["assets", "value"]) && hasStrings(p, ["debtor", "creditor"]),
  },
  {
    type: BOND_EVENTS.INTEREST_PAID,
    version: 1,
    description: "The debtor paid interest, net of vault fees",
    source: "vault",
    validate: (p) =>
      isObject(p) &&
      hasIntegers(p, ["assets", "value", "fees"]) &&
      hasStrings(p, ["debtor", "creditor", "feesRecipient"]),
  },
  {
    type: BOND_EVENTS.FEES_SET,
    version: 1,
    description: "The vault fee rate was changed",
    source: "vault",
    validate: (p) => isObject(p) && typeof p["bips"] === "number",
  },
  {
    type: BOND_EVENTS.FEES_RECIPIENT_SET,
    version: 1,
    description: "The vault fees recipient was changed",
    source: "vault",
    validate: (p) => isObject(p) && hasString(p, "recipient"),
  },
  {
    type: BOND_EVENTS.DEPOSIT,
    version: 1,
    description: "Assets entered custody and shares were minted",
    source: "vault",
    validate: (p) =>
      isObject(p) && hasStrings(p, ["caller", "owner"]) && hasIntegers(p, ["assets", "shares"]),
  },
  {
    type: BOND_EVENTS.WITHDRAW,
    version: 1,
    description: "Shares were burned and assets left custody",
    source: "vault",
    validate: (p) =>
      isObject(p) &&
      hasStrings(p, ["caller", "receiver", "owner"]) &&
      hasIntegers(p, ["assets", "shares"]),
  },
  {
    type: BOND_EVENTS.ADMIN_TRANSFERRED,
    version: 1,
    description: "The vault admin role moved to a new address",
    source: "vault",
    validate: (p) => isObject(p) && hasStrings(p, ["previousAdmin", "newAdmin"]),
  },
];

const ORACLE_SCHEMAS: readonly EventSchema[] = [
  {
    type: BOND_EVENTS.ROUND_UPDATED,
    version: 1,
    description: "A relayed price round was stored",
    source: "oracle",
    validate: (p) =>
      isObject(p) &&
      hasIntegers(p, ["roundId", "answer", "startedAt", "updatedAt", "answeredInRound"]),
  },
];

const RELAYER_SCHEMAS: readonly EventSchema[] = [
  {
    type: BOND_EVENTS.ROUND_RELAYED,
    version: 1,
    description: "The latest local round was submitted to the relay",
    source: "relayer",
    validate: (p) =>
      isObject(p) &&
      hasIntegers(p, ["roundId", "answer", "updatedAt"]) &&
      hasStrings(p, ["messageId", "destinationDomain", "destinationAddress"]),
  },
];

// =============================================================================
// Factory
// =============================================================================

/**
 * Create an EventCatalog with every bond event registered at version 1.
 */
export function createBondCatalog(): EventCatalog {
  const catalog = new EventCatalog();
  for (const schema of [...VAULT_SCHEMAS, ...ORACLE_SCHEMAS, ...RELAYER_SCHEMAS]) {
    catalog.register(schema);
  }
  return catalog;
}
