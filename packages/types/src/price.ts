/**
 * Price Types
 *
 * Round-based price feeds. A round is one timestamped observation;
 * feeds expose the most recent round and a history keyed by round id.
 *
 * Rules:
 * - All fields are bigint (uint80 / int256 / uint256 on the wire)
 * - roundId 0 means "no round"
 * - answer is scaled by the feed's decimals
 */

import type { Address } from "./chain.js";

/**
 * A single price observation.
 */
export interface PriceRound {
  /** Round identifier (uint80) */
  readonly roundId: bigint;

  /** Price, scaled by the feed's decimals (int256, may be negative) */
  readonly answer: bigint;

  /** Unix seconds at which the round started */
  readonly startedAt: bigint;

  /** Unix seconds at which the answer was last updated */
  readonly updatedAt: bigint;

  /** Round in which the answer was computed (uint80) */
  readonly answeredInRound: bigint;
}

/**
 * A read-only round-based price feed.
 *
 * Implemented by the relayed ValuationOracle, the PriceAggregator and
 * the operator-driven ManualPriceFeed.
 */
export interface RoundDataFeed {
  /** Address the feed is deployed at */
  readonly address: Address;

  /** Number of decimals in `answer` */
  readonly decimals: number;

  readonly description: string;

  readonly version: bigint;

  /** Most recent round. All-zero when the feed has no data. */
  latestRoundData(): PriceRound;

  /** A historical round. Throws when the round does not exist. */
  getRoundData(roundId: bigint): PriceRound;
}

/** The all-zero round returned by feeds that have not received data yet. */
export const EMPTY_ROUND: PriceRound = {
  roundId: 0n,
  answer: 0n,
  startedAt: 0n,
  updatedAt: 0n,
  answeredInRound: 0n,
};
