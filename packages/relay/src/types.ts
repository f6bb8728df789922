/**
 * @bondline/relay — Types for cross-domain messaging.
 *
 * A relay carries opaque payloads from a sender on one domain to a
 * receiver on another. Delivery is asynchronous: submission returns a
 * message id immediately, and the receiver is invoked later (or never).
 *
 * Rules:
 * - A receiver authenticates every message by (sourceDomain, sourceSender)
 * - A delivered message is consumed; failed deliveries are not retried
 */

import type { Address, DomainId, Hex } from "@bondline/types";

// ─── Error Types ─────────────────────────────────────────────────────────

export type RelayErrorCode =
  | "INVALID_SOURCE"
  | "UNEXPECTED_MESSAGE"
  | "UNKNOWN_DOMAIN"
  | "MESSAGE_NOT_FOUND";

/**
 * Structured error from the relay or from a relay endpoint.
 */
export class RelayError extends Error {
  public readonly code: RelayErrorCode;

  constructor(code: RelayErrorCode, message: string) {
    super(message);
    this.name = "RelayError";
    this.code = code;
  }
}

// ─── Messages ────────────────────────────────────────────────────────────

/**
 * Fee paid to the relay for carrying a message.
 */
export interface FeeInfo {
  readonly feeToken: Address;
  readonly amount: bigint;
}

/**
 * What a sender submits to the relay.
 */
export interface CrossDomainMessageInput {
  readonly sourceDomain: DomainId;
  readonly sourceSender: Address;
  readonly destinationDomain: DomainId;
  readonly destinationAddress: Address;
  readonly feeInfo: FeeInfo;
  readonly requiredGasLimit: bigint;
  /** ABI-encoded payload, opaque to the relay */
  readonly payload: Hex;
}

/**
 * A message accepted by the relay and awaiting delivery.
 */
export interface RelayMessage extends CrossDomainMessageInput {
  /** keccak256(abi(sourceDomain, destinationDomain, nonce)) */
  readonly messageId: Hex;
  readonly nonce: bigint;
}

// ─── Endpoints ───────────────────────────────────────────────────────────

/**
 * Outbound relay API, as seen by a sender.
 */
export interface RelayMessenger {
  /**
   * Queue a message for delivery.
   *
   * @returns the relay-assigned message id
   * @throws RelayError when the message cannot be submitted
   */
  sendCrossDomainMessage(message: CrossDomainMessageInput): Hex;
}

/**
 * Inbound relay entry point, implemented by every destination.
 */
export interface RelayReceiver {
  receiveRelayedMessage(sourceDomain: DomainId, sourceSender: Address, payload: Hex): void;
}

// ─── Delivery ────────────────────────────────────────────────────────────

export type DeliveryReceipt =
  | { readonly messageId: Hex; readonly status: "delivered" }
  | { readonly messageId: Hex; readonly status: "failed"; readonly error: Error };
