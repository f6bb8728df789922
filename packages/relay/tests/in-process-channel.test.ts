/**
 * Tests for InProcessRelayChannel.
 *
 * Covers:
 * - Message ids and queueing
 * - FIFO, out-of-order and lost delivery
 * - Receiver failures and unknown destinations
 */

import { describe, it, expect, beforeEach, vi } from "vitest";
import { decodeAbiParameters, encodeAbiParameters, keccak256 } from "viem";
import type { Address, DomainId, Hex } from "@bondline/types";
import { InProcessRelayChannel } from "../src/in-process-channel.js";
import type { CrossDomainMessageInput, RelayReceiver } from "../src/types.js";
import { RelayError } from "../src/types.js";

// ─── Fixtures ────────────────────────────────────────────────────────────

const SOURCE: DomainId = `0x${"11".repeat(32)}`;
const DEST: DomainId = `0x${"22".repeat(32)}`;
const SENDER: Address = "0x1111111111111111111111111111111111111111";
const TARGET: Address = "0x2222222222222222222222222222222222222222";
const FEE_TOKEN: Address = "0x0000000000000000000000000000000000000000";

function message(value: bigint, overrides: Partial<CrossDomainMessageInput> = {}): CrossDomainMessageInput {
  return {
    sourceDomain: SOURCE,
    sourceSender: SENDER,
    destinationDomain: DEST,
    destinationAddress: TARGET,
    feeInfo: { feeToken: FEE_TOKEN, amount: 0n },
    requiredGasLimit: 200_000n,
    payload: encodeAbiParameters([{ type: "uint256" }], [value]),
    ...overrides,
  };
}

class RecordingReceiver implements RelayReceiver {
  readonly received: bigint[] = [];
  readonly sources: string[] = [];

  receiveRelayedMessage(sourceDomain: DomainId, sourceSender: Address, payload: Hex): void {
    const [value] = decodeAbiParameters([{ type: "uint256" }], payload);
    this.received.push(value);
    this.sources.push(`${sourceDomain}:${sourceSender}`);
  }
}

function errorCode(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    if (err instanceof RelayError) return err.code;
    throw err;
  }
  return undefined;
}

// ─── Tests ───────────────────────────────────────────────────────────────

describe("InProcessRelayChannel", () => {
  let channel: InProcessRelayChannel;
  let receiver: RecordingReceiver;

  beforeEach(() => {
    channel = new InProcessRelayChannel();
    receiver = new RecordingReceiver();
    channel.addDomain(SOURCE);
    channel.register(DEST, TARGET, receiver);
  });

  describe("sending", () => {
    it("derives the message id from domains and nonce", () => {
      const id = channel.sendCrossDomainMessage(message(1n));
      const expected = keccak256(
        encodeAbiParameters(
          [{ type: "bytes32" }, { type: "bytes32" }, { type: "uint256" }],
          [SOURCE, DEST, 1n],
        ),
      );
      expect(id).toBe(expected);
    });

    it("assigns distinct ids to identical messages", () => {
      const a = channel.sendCrossDomainMessage(message(1n));
      const b = channel.sendCrossDomainMessage(message(1n));
      expect(a).not.toBe(b);
      expect(channel.pending().map((m) => m.nonce)).toEqual([1n, 2n]);
    });

    it("queues without delivering", () => {
      channel.sendCrossDomainMessage(message(1n));
      expect(receiver.received).toEqual([]);
      expect(channel.pending()).toHaveLength(1);
    });

    it("rejects an unconnected source domain", () => {
      const stranger: DomainId = `0x${"33".repeat(32)}`;
      expect(errorCode(() => channel.sendCrossDomainMessage(message(1n, { sourceDomain: stranger })))).toBe(
        "UNKNOWN_DOMAIN",
      );
      expect(channel.pending()).toEqual([]);
    });

    it("rejects a malformed domain id", () => {
      expect(errorCode(() => channel.addDomain("0x1234"))).toBe("UNKNOWN_DOMAIN");
    });

    it("matches domains case-insensitively", () => {
      expect(channel.hasDomain(`0x${"AA".repeat(32)}`)).toBe(false);
      channel.addDomain(`0x${"aa".repeat(32)}`);
      expect(channel.hasDomain(`0x${"AA".repeat(32)}`)).toBe(true);
    });
  });

  describe("delivery", () => {
    it("delivers all pending messages in submission order", () => {
      channel.sendCrossDomainMessage(message(1n));
      channel.sendCrossDomainMessage(message(2n));

      const receipts = channel.deliverAll();

      expect(receipts.map((r) => r.status)).toEqual(["delivered", "delivered"]);
      expect(receiver.received).toEqual([1n, 2n]);
      expect(receiver.sources).toEqual([`${SOURCE}:${SENDER}`, `${SOURCE}:${SENDER}`]);
      expect(channel.pending()).toEqual([]);
    });

    it("delivers out of order on request", () => {
      const first = channel.sendCrossDomainMessage(message(1n));
      const second = channel.sendCrossDomainMessage(message(2n));

      channel.deliver(second);
      channel.deliver(first);

      expect(receiver.received).toEqual([2n, 1n]);
    });

    it("never delivers a dropped message", () => {
      const lost = channel.sendCrossDomainMessage(message(1n));
      channel.sendCrossDomainMessage(message(2n));

      expect(channel.drop(lost).messageId).toBe(lost);
      channel.deliverAll();

      expect(receiver.received).toEqual([2n]);
      expect(errorCode(() => channel.deliver(lost))).toBe("MESSAGE_NOT_FOUND");
    });

    it("consumes a message whose receiver throws, without retry", () => {
      const failing: RelayReceiver = {
        receiveRelayedMessage: vi.fn(() => {
          throw new RelayError("INVALID_SOURCE", "nope");
        }),
      };
      channel.register(DEST, TARGET, failing);
      const id = channel.sendCrossDomainMessage(message(1n));

      const receipt = channel.deliver(id);

      expect(receipt.status).toBe("failed");
      if (receipt.status === "failed") {
        expect(receipt.error).toBeInstanceOf(RelayError);
        expect(receipt.error.message).toBe("nope");
      }
      expect(channel.pending()).toEqual([]);
      expect(failing.receiveRelayedMessage).toHaveBeenCalledTimes(1);
    });

    it("fails delivery to an address with no receiver", () => {
      const id = channel.sendCrossDomainMessage(
        message(1n, { destinationAddress: "0x3333333333333333333333333333333333333333" }),
      );

      const receipt = channel.deliver(id);

      expect(receipt.status).toBe("failed");
      if (receipt.status === "failed") {
        expect(receipt.error.message).toBe(
          `No receiver at 0x3333333333333333333333333333333333333333 on ${DEST}`,
        );
      }
    });

    it("accepts message ids in any case", () => {
      const id = channel.sendCrossDomainMessage(message(7n));
      channel.deliver(`0x${id.slice(2).toUpperCase()}`);
      expect(receiver.received).toEqual([7n]);
    });
  });
});
