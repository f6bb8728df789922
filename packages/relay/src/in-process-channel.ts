/**
 * @bondline/relay — In-process relay channel.
 *
 * Joins independently deployed components on different domains
 * through a reliable-or-absent message queue. Nothing is delivered
 * until the operator (or the scheduler) asks for it, which makes lost
 * and out-of-order delivery explicit:
 *
 * - deliver(id)   — deliver one message, in any order
 * - deliverAll()  — deliver everything pending, FIFO
 * - drop(id)      — lose a message
 */

import pino from "pino";
import type { Logger } from "pino";
import { encodeAbiParameters, getAddress, keccak256 } from "viem";
import type { Address, DomainId, Hex } from "@bondline/types";
import { isDomainId } from "@bondline/types";
import type {
  CrossDomainMessageInput,
  DeliveryReceipt,
  RelayMessage,
  RelayMessenger,
  RelayReceiver,
} from "./types.js";
import { RelayError } from "./types.js";

export interface InProcessRelayChannelOptions {
  readonly logger?: Logger;
}

export class InProcessRelayChannel implements RelayMessenger {
  private readonly domains = new Set<DomainId>();
  private readonly receivers = new Map<string, RelayReceiver>();
  private readonly queue = new Map<Hex, RelayMessage>();
  private nonce = 0n;
  private readonly logger: Logger;

  constructor(options: InProcessRelayChannelOptions = {}) {
    this.logger = options.logger ?? pino({ level: "silent" });
  }

  // ─── Topology ────────────────────────────────────────────────────────

  /**
   * Make a domain known to the channel, so it may send.
   */
  addDomain(domain: DomainId): void {
    this.domains.add(normalizeDomain(domain));
  }

  /**
   * Bind a receiver to an address on a domain. Registers the domain.
   */
  register(domain: DomainId, address: Address, receiver: RelayReceiver): void {
    const normalized = normalizeDomain(domain);
    this.domains.add(normalized);
    this.receivers.set(endpointKey(normalized, address), receiver);
  }

  hasDomain(domain: DomainId): boolean {
    return isDomainId(domain) && this.domains.has(normalizeDomain(domain));
  }

  // ─── Sending ─────────────────────────────────────────────────────────

  sendCrossDomainMessage(input: CrossDomainMessageInput): Hex {
    const sourceDomain = normalizeDomain(input.sourceDomain);
    if (!this.domains.has(sourceDomain)) {
      throw new RelayError("UNKNOWN_DOMAIN", `Source domain ${sourceDomain} is not connected to this channel`);
    }
    const destinationDomain = normalizeDomain(input.destinationDomain);

    this.nonce += 1n;
    const messageId = keccak256(
      encodeAbiParameters(
        [{ type: "bytes32" }, { type: "bytes32" }, { type: "uint256" }],
        [sourceDomain, destinationDomain, this.nonce],
      ),
    );

    const message: RelayMessage = {
      ...input,
      sourceDomain,
      destinationDomain,
      messageId,
      nonce: this.nonce,
    };
    this.queue.set(messageId, message);

    this.logger.debug(
      { messageId, sourceDomain, destinationDomain, destinationAddress: input.destinationAddress },
      "Relay message queued",
    );
    return messageId;
  }

  // ─── Delivery ────────────────────────────────────────────────────────

  /** Messages awaiting delivery, oldest first. */
  pending(): readonly RelayMessage[] {
    return [...this.queue.values()];
  }

  /**
   * Deliver one pending message. The message is consumed whatever the
   * receiver does; a receiver error is reported in the receipt.
   */
  deliver(messageId: Hex): DeliveryReceipt {
    const message = this.take(messageId);
    const receiver = this.receivers.get(endpointKey(message.destinationDomain, message.destinationAddress));

    if (receiver === undefined) {
      const error = new RelayError(
        "UNKNOWN_DOMAIN",
        `No receiver at ${message.destinationAddress} on ${message.destinationDomain}`,
      );
      this.logger.warn({ messageId, err: error }, "Relay delivery failed");
      return { messageId, status: "failed", error };
    }

    try {
      receiver.receiveRelayedMessage(message.sourceDomain, message.sourceSender, message.payload);
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      this.logger.warn({ messageId, err: error }, "Relay delivery failed");
      return { messageId, status: "failed", error };
    }

    this.logger.debug({ messageId }, "Relay message delivered");
    return { messageId, status: "delivered" };
  }

  /**
   * Deliver every message pending at the time of the call, FIFO.
   */
  deliverAll(): readonly DeliveryReceipt[] {
    return [...this.queue.keys()].map((id) => this.deliver(id));
  }

  /**
   * Discard a pending message without delivering it.
   */
  drop(messageId: Hex): RelayMessage {
    const message = this.take(messageId);
    this.logger.info({ messageId }, "Relay message dropped");
    return message;
  }

  // ─── Internals ───────────────────────────────────────────────────────

  private take(messageId: string): RelayMessage {
    const id = messageId.toLowerCase();
    const message = [...this.queue.values()].find((m) => m.messageId === id);
    if (message === undefined) {
      throw new RelayError("MESSAGE_NOT_FOUND", `No pending message ${messageId}`);
    }
    this.queue.delete(message.messageId);
    return message;
  }
}

function normalizeDomain(domain: string): DomainId {
  const lower = domain.toLowerCase();
  if (!isDomainId(lower)) {
    throw new RelayError("UNKNOWN_DOMAIN", `Malformed domain id: "${domain}"`);
  }
  return lower;
}

function endpointKey(domain: DomainId, address: Address): string {
  return `${domain}:${getAddress(address)}`;
}
