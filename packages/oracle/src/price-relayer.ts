/**
 * @bondline/oracle — Price relayer.
 *
 * Lives on the source domain next to a local price feed and forwards
 * the feed's latest round to a destination oracle. It keeps no state
 * besides its identity: every send reads the feed afresh, and relay
 * submission failures propagate to the caller.
 *
 * The relayer only sends. Any inbound message is rejected.
 */

import { randomUUID } from "node:crypto";
import pino from "pino";
import type { Logger } from "pino";
import type { Address, DomainId, Hex, PriceRound, RoundDataFeed } from "@bondline/types";
import type { EventStore } from "@bondline/event-store";
import { BOND_EVENTS, createBondEvent, streamIdFor } from "@bondline/event-store";
import type { RelayMessenger, RelayReceiver } from "@bondline/relay";
import { RelayError } from "@bondline/relay";
import { encodePriceRound } from "./round-codec.js";

export interface PriceRelayerConfig {
  readonly address: Address;

  /** Domain the relayer (and its feed) live on */
  readonly domain: DomainId;

  readonly feed: RoundDataFeed;
  readonly messenger: RelayMessenger;
  readonly eventStore?: EventStore;
  readonly logger?: Logger;
}

export class PriceRelayer implements RelayReceiver {
  readonly address: Address;
  readonly domain: DomainId;
  readonly feed: RoundDataFeed;

  private readonly messenger: RelayMessenger;
  private readonly eventStore: EventStore | undefined;
  private readonly logger: Logger;

  constructor(config: PriceRelayerConfig) {
    this.address = config.address;
    this.domain = config.domain;
    this.feed = config.feed;
    this.messenger = config.messenger;
    this.eventStore = config.eventStore;
    this.logger = config.logger ?? pino({ level: "silent" });
  }

  /**
   * Read the feed's latest round and submit it to the relay.
   *
   * @returns the relay-assigned message id
   */
  sendLatestRoundData(
    destinationDomain: DomainId,
    destinationAddress: Address,
    feeToken: Address,
    feeAmount: bigint,
    gasLimit: bigint,
  ): Hex {
    const round = this.feed.latestRoundData();
    const messageId = this.messenger.sendCrossDomainMessage({
      sourceDomain: this.domain,
      sourceSender: this.address,
      destinationDomain,
      destinationAddress,
      feeInfo: { feeToken, amount: feeAmount },
      requiredGasLimit: gasLimit,
      payload: encodePriceRound(round),
    });

    this.eventStore?.append(streamIdFor("relayer", this.address), [
      createBondEvent(
        BOND_EVENTS.ROUND_RELAYED,
        { source: "relayer", actor: this.address, correlationId: randomUUID() },
        {
          messageId,
          roundId: round.roundId.toString(),
          answer: round.answer.toString(),
          updatedAt: round.updatedAt.toString(),
          destinationDomain,
          destinationAddress,
        },
      ),
    ]);

    this.logger.info(
      { messageId, roundId: round.roundId.toString(), destinationDomain },
      "Round relayed",
    );
    return messageId;
  }

  getLatestRoundData(): PriceRound {
    return this.feed.latestRoundData();
  }

  receiveRelayedMessage(sourceDomain: DomainId, sourceSender: Address, _payload: Hex): void {
    throw new RelayError(
      "UNEXPECTED_MESSAGE",
      `Relayer does not accept messages (from ${sourceSender} on ${sourceDomain})`,
    );
  }
}
