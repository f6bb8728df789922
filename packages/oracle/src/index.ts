/**
 * @bondline/oracle — Price valuation.
 *
 * - ValuationOracle: rounds mirrored from another domain via the relay
 * - PriceRelayer: forwards a local feed's latest round across the relay
 * - PriceAggregator: ratio of two feeds, with a freshness check
 * - ManualPriceFeed: operator-set local feed
 * - Round codec: the ABI wire format of a relayed round
 */

export { ValuationOracle } from "./valuation-oracle.js";
export type { ValuationOracleConfig } from "./valuation-oracle.js";

export { PriceRelayer } from "./price-relayer.js";
export type { PriceRelayerConfig } from "./price-relayer.js";

export { PriceAggregator, MAX_FEED_TIME_DIFFERENCE } from "./price-aggregator.js";
export type { PriceAggregatorConfig } from "./price-aggregator.js";

export { ManualPriceFeed } from "./manual-price-feed.js";
export type { ManualPriceFeedConfig } from "./manual-price-feed.js";

export { encodePriceRound, decodePriceRound } from "./round-codec.js";

export type { OracleErrorCode } from "./errors.js";
export { OracleError } from "./errors.js";
