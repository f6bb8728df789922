import type { Address, Clock, DomainId, PriceRound } from "@bondline/types";

export const SOURCE_DOMAIN: DomainId = `0x${"aa".repeat(32)}`;
export const DEST_DOMAIN: DomainId = `0x${"bb".repeat(32)}`;

export const FEED: Address = "0x1000000000000000000000000000000000000001";
export const RELAYER: Address = "0x1000000000000000000000000000000000000002";
export const ORACLE: Address = "0x2000000000000000000000000000000000000001";
export const STRANGER: Address = "0x3000000000000000000000000000000000000001";
export const FEE_TOKEN: Address = "0x0000000000000000000000000000000000000000";

export const T0 = 1_700_000_000n;

export function round(roundId: bigint, answer: bigint, updatedAt: bigint = T0): PriceRound {
  return { roundId, answer, startedAt: updatedAt, updatedAt, answeredInRound: roundId };
}

/** A clock the test moves by hand. */
export class ManualClock implements Clock {
  constructor(public time: bigint = T0) {}

  now(): bigint {
    return this.time;
  }

  advance(seconds: bigint): void {
    this.time += seconds;
  }
}
