/**
 * @bondline/vault — Valuation.
 *
 * Converts between asset base units and value units using the latest
 * round of a price feed:
 *
 *   assets = value * 10^assetDecimals / price
 *   value  = assets * price / 10^assetDecimals
 *
 * Both directions floor.
 */

import type { Clock, RoundDataFeed } from "@bondline/types";
import { OracleError } from "@bondline/oracle";
import { mulDiv, pow10 } from "@bondline/ledger";

/** Oldest acceptable round, in seconds (25 hours). */
export const MAX_PRICE_AGE = 90_000n;

/**
 * The feed's latest answer, if it is fresh and positive.
 *
 * @throws OracleError STALE_PRICE when the round is older than MAX_PRICE_AGE
 * @throws OracleError INVALID_PRICE_VALUE when the answer is not positive
 */
export function latestPrice(feed: RoundDataFeed, clock: Clock): bigint {
  const round = feed.latestRoundData();
  const age = clock.now() - round.updatedAt;
  if (age > MAX_PRICE_AGE) {
    throw new OracleError(
      "STALE_PRICE",
      `Latest round ${round.roundId.toString()} is ${age.toString()}s old (max ${MAX_PRICE_AGE.toString()}s)`,
    );
  }
  if (round.answer <= 0n) {
    throw new OracleError("INVALID_PRICE_VALUE", `Latest answer is ${round.answer.toString()}`);
  }
  return round.answer;
}

export function assetsForValue(value: bigint, price: bigint, assetDecimals: number): bigint {
  return mulDiv(value, pow10(assetDecimals), price);
}

export function valueOfAssets(assets: bigint, price: bigint, assetDecimals: number): bigint {
  return mulDiv(assets, price, pow10(assetDecimals));
}
