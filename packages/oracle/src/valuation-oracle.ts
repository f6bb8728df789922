/**
 * @bondline/oracle — Valuation oracle.
 *
 * Mirrors a remote price feed's rounds on the local domain. Rounds
 * arrive only through the relay, authenticated against one configured
 * (domain, sender) pair, and are served through the round-based feed
 * interface the vault reads from.
 *
 * Delivery is last-write-wins per round id, and every accepted round
 * becomes the latest, even when it is older than the current one. A
 * delayed message therefore rolls the observed price back; this is
 * logged as a warning.
 */

import { randomUUID } from "node:crypto";
import pino from "pino";
import type { Logger } from "pino";
import { isAddressEqual, zeroAddress } from "viem";
import type { Address, DomainId, DomainRef, Hex, PriceRound, RoundDataFeed } from "@bondline/types";
import { EMPTY_ROUND, isAddressLike } from "@bondline/types";
import type { EventStore } from "@bondline/event-store";
import { BOND_EVENTS, createBondEvent, streamIdFor } from "@bondline/event-store";
import type { RelayReceiver } from "@bondline/relay";
import { RelayError } from "@bondline/relay";
import { OracleError } from "./errors.js";
import { decodePriceRound } from "./round-codec.js";

export interface ValuationOracleConfig {
  readonly address: Address;

  /** The only (domain, sender) allowed to deliver rounds */
  readonly allowedSource: DomainRef;

  /** Decimals of the mirrored feed. Default: 8 */
  readonly decimals?: number;

  /** Default: "Proxied Price Feed" */
  readonly description?: string;

  readonly eventStore?: EventStore;
  readonly logger?: Logger;
}

export class ValuationOracle implements RoundDataFeed, RelayReceiver {
  readonly address: Address;
  readonly allowedSource: DomainRef;
  readonly decimals: number;
  readonly description: string;
  readonly version = 1n;

  private readonly rounds = new Map<bigint, PriceRound>();
  private latestRoundId = 0n;
  private readonly eventStore: EventStore | undefined;
  private readonly logger: Logger;

  constructor(config: ValuationOracleConfig) {
    if (config.allowedSource.address === zeroAddress) {
      throw new OracleError("ZERO_ADDRESS", "Allowed source sender is the zero address");
    }
    this.address = config.address;
    this.allowedSource = config.allowedSource;
    this.decimals = config.decimals ?? 8;
    this.description = config.description ?? "Proxied Price Feed";
    this.eventStore = config.eventStore;
    this.logger = config.logger ?? pino({ level: "silent" });
  }

  // ─── Relay entry point ───────────────────────────────────────────────

  receiveRelayedMessage(sourceDomain: DomainId, sourceSender: Address, payload: Hex): void {
    if (!this.isAllowedSource(sourceDomain, sourceSender)) {
      this.logger.warn({ sourceDomain, sourceSender }, "Rejected round from unauthorized source");
      throw new RelayError(
        "INVALID_SOURCE",
        `Messages from ${sourceSender} on ${sourceDomain} are not accepted`,
      );
    }

    const round = decodePriceRound(payload);

    if (this.rounds.size > 0 && round.roundId < this.latestRoundId) {
      this.logger.warn(
        { roundId: round.roundId.toString(), latestRoundId: this.latestRoundId.toString() },
        "Relayed round is older than the latest round",
      );
    }

    this.rounds.set(round.roundId, round);
    this.latestRoundId = round.roundId;

    this.eventStore?.append(streamIdFor("oracle", this.address), [
      createBondEvent(
        BOND_EVENTS.ROUND_UPDATED,
        { source: "oracle", actor: sourceSender, correlationId: randomUUID() },
        {
          roundId: round.roundId.toString(),
          answer: round.answer.toString(),
          startedAt: round.startedAt.toString(),
          updatedAt: round.updatedAt.toString(),
          answeredInRound: round.answeredInRound.toString(),
        },
      ),
    ]);

    this.logger.info(
      { roundId: round.roundId.toString(), answer: round.answer.toString() },
      "Round updated",
    );
  }

  // ─── Feed ────────────────────────────────────────────────────────────

  latestRoundData(): PriceRound {
    return this.rounds.get(this.latestRoundId) ?? EMPTY_ROUND;
  }

  getRoundData(roundId: bigint): PriceRound {
    const round = this.rounds.get(roundId);
    if (round === undefined) {
      throw new OracleError("ROUND_NOT_FOUND", `Round ${roundId.toString()} has not been received`);
    }
    return round;
  }

  /** Number of distinct rounds stored. */
  roundCount(): number {
    return this.rounds.size;
  }

  // ─── Internals ───────────────────────────────────────────────────────

  private isAllowedSource(domain: string, sender: string): boolean {
    return (
      domain.toLowerCase() === this.allowedSource.domain.toLowerCase() &&
      isAddressLike(sender) &&
      isAddressEqual(sender, this.allowedSource.address)
    );
  }
}
