/**
 * End-to-end valuation: a source-domain feed relayed into a
 * destination ValuationOracle, and a two-feed aggregator, each backing
 * a RepaymentVault.
 *
 * Covers lost and out-of-order relay messages.
 */

import { describe, it, expect, beforeEach } from "vitest";
import type { Address, DomainId } from "@bondline/types";
import { InProcessRelayChannel } from "@bondline/relay";
import { ManualPriceFeed, PriceAggregator, PriceRelayer, ValuationOracle } from "@bondline/oracle";
import { CREDITOR, ManualClock, ONE, T0, errorCode, setupVault } from "./fixtures.js";
import type { VaultFixture } from "./fixtures.js";

const SOURCE_DOMAIN: DomainId = `0x${"aa".repeat(32)}`;
const DEST_DOMAIN: DomainId = `0x${"bb".repeat(32)}`;
const SOURCE_FEED: Address = "0x1300000000000000000000000000000000000001";
const RELAYER: Address = "0x1300000000000000000000000000000000000002";
const ORACLE: Address = "0x1400000000000000000000000000000000000001";
const AGGREGATOR: Address = "0x1500000000000000000000000000000000000001";
const FEE_TOKEN: Address = "0x0000000000000000000000000000000000000000";

describe("vault priced by a relayed oracle", () => {
  let clock: ManualClock;
  let sourceFeed: ManualPriceFeed;
  let channel: InProcessRelayChannel;
  let relayer: PriceRelayer;
  let oracle: ValuationOracle;
  let fx: VaultFixture;

  function relay(): `0x${string}` {
    return relayer.sendLatestRoundData(DEST_DOMAIN, ORACLE, FEE_TOKEN, 0n, 200_000n);
  }

  beforeEach(() => {
    clock = new ManualClock();
    sourceFeed = new ManualPriceFeed({ address: SOURCE_FEED, decimals: 8, initialAnswer: ONE, clock });
    channel = new InProcessRelayChannel();
    channel.addDomain(SOURCE_DOMAIN);
    relayer = new PriceRelayer({ address: RELAYER, domain: SOURCE_DOMAIN, feed: sourceFeed, messenger: channel });
    oracle = new ValuationOracle({ address: ORACLE, allowedSource: { domain: SOURCE_DOMAIN, address: RELAYER } });
    channel.register(DEST_DOMAIN, ORACLE, oracle);
    fx = setupVault({ priceFeed: oracle, clock });
  });

  it("has no usable price until a round arrives", () => {
    relay();
    expect(errorCode(() => fx.vault.deposit(CREDITOR, 100n, 100n, true))).toBe("STALE_PRICE");

    channel.deliverAll();
    expect(fx.vault.deposit(CREDITOR, 100n, 100n, true).shares).toBe(100n);
  });

  it("goes stale when updates stop arriving", () => {
    relay();
    channel.deliverAll();

    clock.advance(26n * 3_600n);
    sourceFeed.updateAnswer(ONE);
    channel.drop(relay());

    expect(oracle.latestRoundData().updatedAt).toBe(T0);
    expect(errorCode(() => fx.vault.quoteDeposit(100n))).toBe("STALE_PRICE");
  });

  it("recovers once a fresh round is delivered", () => {
    relay();
    channel.deliverAll();
    clock.advance(26n * 3_600n);
    sourceFeed.updateAnswer(ONE);
    relay();
    channel.deliverAll();

    expect(fx.vault.quoteDeposit(100n).requiredAssets).toBe(100n);
  });

  it("prices with whichever round arrived last, even an older one", () => {
    const first = relay();
    sourceFeed.updateAnswer(2n * ONE);
    const second = relay();

    channel.deliver(second);
    expect(fx.vault.quoteDeposit(100n).requiredAssets).toBe(50n);

    channel.deliver(first);
    expect(oracle.latestRoundData().roundId).toBe(1n);
    expect(fx.vault.quoteDeposit(100n).requiredAssets).toBe(100n);
  });
});

describe("vault priced by an aggregator", () => {
  let clock: ManualClock;
  let base: ManualPriceFeed;
  let quote: ManualPriceFeed;
  let fx: VaultFixture;

  beforeEach(() => {
    clock = new ManualClock();
    base = new ManualPriceFeed({ address: "0x1600000000000000000000000000000000000001", decimals: 8, initialAnswer: 3n * ONE, clock });
    quote = new ManualPriceFeed({ address: "0x1600000000000000000000000000000000000002", decimals: 8, initialAnswer: 2n * ONE, clock });
    const aggregator = new PriceAggregator({ address: AGGREGATOR, feed1: base, feed2: quote, decimals: 8 });
    fx = setupVault({ priceFeed: aggregator, clock });
  });

  it("prices the asset at the ratio of the two feeds", () => {
    // 3.0 / 2.0 = 1.5; 150 value units need 100 assets
    expect(fx.vault.quoteDeposit(150n)).toEqual({ price: 150_000_000n, requiredAssets: 100n });
  });

  it("fails when the feeds drift more than an hour apart", () => {
    clock.advance(3_601n);
    base.updateAnswer(3n * ONE);

    expect(errorCode(() => fx.vault.quoteDeposit(150n))).toBe("PRICE_FEEDS_TIME_MISMATCH");
  });

  it("fails when the quote feed reports a non-positive price", () => {
    quote.updateAnswer(0n);
    expect(errorCode(() => fx.vault.quoteDeposit(150n))).toBe("INVALID_PRICE_VALUE");
  });
});
