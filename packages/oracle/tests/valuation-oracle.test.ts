/**
 * Tests for ValuationOracle.
 *
 * Covers:
 * - Authenticated delivery (domain and sender)
 * - Round history, overwrite, and latest pointer
 * - Older rounds rolling the latest back, with a warning
 * - Event publication
 */

import { describe, it, expect, beforeEach, vi } from "vitest";
import pino from "pino";
import { EMPTY_ROUND } from "@bondline/types";
import { InMemoryEventStore, createBondCatalog } from "@bondline/event-store";
import { RelayError } from "@bondline/relay";
import { ValuationOracle } from "../src/valuation-oracle.js";
import { OracleError } from "../src/errors.js";
import { encodePriceRound } from "../src/round-codec.js";
import { DEST_DOMAIN, ORACLE, RELAYER, SOURCE_DOMAIN, STRANGER, round } from "./fixtures.js";

function errorCode(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    if (err instanceof OracleError || err instanceof RelayError) return err.code;
    throw err;
  }
  return undefined;
}

describe("ValuationOracle", () => {
  let store: InMemoryEventStore;
  let oracle: ValuationOracle;

  beforeEach(() => {
    store = new InMemoryEventStore({ catalog: createBondCatalog() });
    oracle = new ValuationOracle({
      address: ORACLE,
      allowedSource: { domain: SOURCE_DOMAIN, address: RELAYER },
      eventStore: store,
    });
  });

  it("describes itself like a proxied feed", () => {
    expect(oracle.decimals).toBe(8);
    expect(oracle.description).toBe("Proxied Price Feed");
    expect(oracle.version).toBe(1n);
  });

  it("serves an all-zero latest round before any delivery", () => {
    expect(oracle.latestRoundData()).toEqual(EMPTY_ROUND);
    expect(oracle.roundCount()).toBe(0);
  });

  it("stores a relayed round and makes it the latest", () => {
    const r = round(5n, 100_000_000n);
    oracle.receiveRelayedMessage(SOURCE_DOMAIN, RELAYER, encodePriceRound(r));

    expect(oracle.getRoundData(5n)).toEqual(r);
    expect(oracle.latestRoundData()).toEqual(r);
  });

  it("rejects a message from the wrong sender and stores nothing", () => {
    expect(
      errorCode(() => oracle.receiveRelayedMessage(SOURCE_DOMAIN, STRANGER, encodePriceRound(round(1n, 1n)))),
    ).toBe("INVALID_SOURCE");
    expect(oracle.roundCount()).toBe(0);
    expect(store.globalPosition()).toBe(0);
  });

  it("rejects a message from the wrong domain", () => {
    expect(
      errorCode(() => oracle.receiveRelayedMessage(DEST_DOMAIN, RELAYER, encodePriceRound(round(1n, 1n)))),
    ).toBe("INVALID_SOURCE");
  });

  it("matches the allowed source regardless of casing", () => {
    const upperDomain = `0x${SOURCE_DOMAIN.slice(2).toUpperCase()}` as const;
    oracle.receiveRelayedMessage(upperDomain, RELAYER, encodePriceRound(round(1n, 1n)));
    expect(oracle.roundCount()).toBe(1);
  });

  it("rejects an undecodable payload", () => {
    expect(errorCode(() => oracle.receiveRelayedMessage(SOURCE_DOMAIN, RELAYER, "0x1234"))).toBe(
      "MALFORMED_PAYLOAD",
    );
  });

  it("fails for a round that never arrived", () => {
    expect(errorCode(() => oracle.getRoundData(999n))).toBe("ROUND_NOT_FOUND");
  });

  it("overwrites a round delivered twice", () => {
    oracle.receiveRelayedMessage(SOURCE_DOMAIN, RELAYER, encodePriceRound(round(3n, 100n)));
    oracle.receiveRelayedMessage(SOURCE_DOMAIN, RELAYER, encodePriceRound(round(3n, 200n)));

    expect(oracle.getRoundData(3n).answer).toBe(200n);
    expect(oracle.roundCount()).toBe(1);
  });

  it("accepts an older round as the latest and warns", () => {
    const logger = pino({ level: "silent" });
    const warn = vi.spyOn(logger, "warn");
    oracle = new ValuationOracle({
      address: ORACLE,
      allowedSource: { domain: SOURCE_DOMAIN, address: RELAYER },
      logger,
    });

    oracle.receiveRelayedMessage(SOURCE_DOMAIN, RELAYER, encodePriceRound(round(10n, 500n)));
    oracle.receiveRelayedMessage(SOURCE_DOMAIN, RELAYER, encodePriceRound(round(9n, 400n)));

    expect(oracle.latestRoundData().roundId).toBe(9n);
    expect(oracle.getRoundData(10n).answer).toBe(500n);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith(
      { roundId: "9", latestRoundId: "10" },
      "Relayed round is older than the latest round",
    );
  });

  it("publishes a round update event", () => {
    oracle.receiveRelayedMessage(SOURCE_DOMAIN, RELAYER, encodePriceRound(round(2n, 123n, 1_000n)));

    const [stored] = store.read(`oracle:${ORACLE}`);
    expect(stored?.event.type).toBe("oracle.round.updated");
    expect(stored?.event.metadata.actor).toBe(RELAYER);
    expect(stored?.event.payload).toEqual({
      roundId: "2",
      answer: "123",
      startedAt: "1000",
      updatedAt: "1000",
      answeredInRound: "2",
    });
  });

  it("refuses a zero-address source", () => {
    expect(() =>
      new ValuationOracle({
        address: ORACLE,
        allowedSource: { domain: SOURCE_DOMAIN, address: "0x0000000000000000000000000000000000000000" },
      }),
    ).toThrow(OracleError);
  });
});
