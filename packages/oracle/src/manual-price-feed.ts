/**
 * @bondline/oracle — Operator-driven price feed.
 *
 * A local round-based feed whose answer is set by hand. Stands in for
 * the source-domain price feed that the relayer reads.
 */

import type { Address, Clock, PriceRound, RoundDataFeed } from "@bondline/types";
import { EMPTY_ROUND, systemClock } from "@bondline/types";
import { OracleError } from "./errors.js";

export interface ManualPriceFeedConfig {
  readonly address: Address;
  readonly decimals: number;
  readonly description?: string;

  /** When set, round 1 is published with this answer at construction */
  readonly initialAnswer?: bigint;

  readonly clock?: Clock;
}

export class ManualPriceFeed implements RoundDataFeed {
  readonly address: Address;
  readonly decimals: number;
  readonly description: string;
  readonly version = 0n;

  private readonly rounds = new Map<bigint, PriceRound>();
  private latestRoundId = 0n;
  private readonly clock: Clock;

  constructor(config: ManualPriceFeedConfig) {
    this.address = config.address;
    this.decimals = config.decimals;
    this.description = config.description ?? "Manual Price Feed";
    this.clock = config.clock ?? systemClock;
    if (config.initialAnswer !== undefined) {
      this.updateAnswer(config.initialAnswer);
    }
  }

  /**
   * Publish a new round with the given answer, timestamped now.
   *
   * @returns the new round id
   */
  updateAnswer(answer: bigint): bigint {
    const roundId = this.latestRoundId + 1n;
    const now = this.clock.now();
    return this.updateRoundData(roundId, answer, now, now);
  }

  /**
   * Publish an arbitrary round and make it the latest.
   */
  updateRoundData(roundId: bigint, answer: bigint, updatedAt: bigint, startedAt: bigint): bigint {
    this.rounds.set(roundId, { roundId, answer, startedAt, updatedAt, answeredInRound: roundId });
    this.latestRoundId = roundId;
    return roundId;
  }

  latestRoundData(): PriceRound {
    return this.rounds.get(this.latestRoundId) ?? EMPTY_ROUND;
  }

  getRoundData(roundId: bigint): PriceRound {
    const round = this.rounds.get(roundId);
    if (round === undefined) {
      throw new OracleError("ROUND_NOT_FOUND", `Round ${roundId.toString()} does not exist`);
    }
    return round;
  }
}
