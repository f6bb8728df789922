/**
 * @bondline/oracle — Two-feed ratio aggregator.
 *
 * Presents feed1 / feed2 as a single round-based feed:
 *
 *   answer = price1 * 10^decimals / price2
 *
 * Both underlying rounds must have been updated within an hour of each
 * other. Round metadata (ids, timestamps) is taken from feed1.
 */

import { zeroAddress } from "viem";
import type { Address, PriceRound, RoundDataFeed } from "@bondline/types";
import { OracleError } from "./errors.js";

/** Max |updatedAt1 - updatedAt2|, in seconds. */
export const MAX_FEED_TIME_DIFFERENCE = 3_600n;

export interface PriceAggregatorConfig {
  readonly address: Address;
  readonly feed1: RoundDataFeed;
  readonly feed2: RoundDataFeed;

  /** Decimals of the composed answer */
  readonly decimals: number;
}

export class PriceAggregator implements RoundDataFeed {
  readonly address: Address;
  readonly feed1: RoundDataFeed;
  readonly feed2: RoundDataFeed;
  readonly decimals: number;
  readonly version = 1n;

  private readonly scale: bigint;

  constructor(config: PriceAggregatorConfig) {
    if (config.feed1.address === zeroAddress || config.feed2.address === zeroAddress) {
      throw new OracleError("ZERO_ADDRESS", "Aggregated feeds must not be the zero address");
    }
    if (!Number.isInteger(config.decimals) || config.decimals < 0) {
      throw new OracleError("INVALID_PRICE_VALUE", `Decimals must be a non-negative integer, got ${config.decimals}`);
    }
    this.address = config.address;
    this.feed1 = config.feed1;
    this.feed2 = config.feed2;
    this.decimals = config.decimals;
    this.scale = 10n ** BigInt(config.decimals);
  }

  get description(): string {
    return `${this.feed1.description} / ${this.feed2.description}`;
  }

  latestRoundData(): PriceRound {
    return this.compose(this.feed1.latestRoundData(), this.feed2.latestRoundData());
  }

  /** Both feeds are read at the same round id. */
  getRoundData(roundId: bigint): PriceRound {
    return this.compose(this.feed1.getRoundData(roundId), this.feed2.getRoundData(roundId));
  }

  private compose(round1: PriceRound, round2: PriceRound): PriceRound {
    const gap = round1.updatedAt > round2.updatedAt
      ? round1.updatedAt - round2.updatedAt
      : round2.updatedAt - round1.updatedAt;
    if (gap > MAX_FEED_TIME_DIFFERENCE) {
      throw new OracleError(
        "PRICE_FEEDS_TIME_MISMATCH",
        `Feeds were updated ${gap.toString()}s apart (max ${MAX_FEED_TIME_DIFFERENCE.toString()}s)`,
      );
    }
    if (round2.answer <= 0n) {
      throw new OracleError("INVALID_PRICE_VALUE", `Divisor price is ${round2.answer.toString()}`);
    }

    return {
      roundId: round1.roundId,
      answer: (round1.answer * this.scale) / round2.answer,
      startedAt: round1.startedAt,
      updatedAt: round1.updatedAt,
      answeredInRound: round1.answeredInRound,
    };
  }
}
