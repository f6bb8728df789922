/**
 * Source price, relay and oracle routes.
 *
 * The test app starts with round 1 (price 1.0) already relayed and
 * delivered, so the channel's next nonce is 2.
 */

import { describe, it, expect, beforeEach } from "vitest";
import {
  ADMIN,
  DESTINATION_DOMAIN,
  ORACLE,
  RELAYER,
  SOURCE_DOMAIN,
  STRANGER,
  T0,
  createTestApp,
  jsonRequest,
  readError,
} from "./setup.js";
import type { TestApp } from "./setup.js";

interface RoundBody {
  data: { roundId: string; answer: string; startedAt: string; updatedAt: string; answeredInRound: string };
}

describe("relay and oracle routes", () => {
  let t: TestApp;

  async function send(): Promise<string> {
    const res = await t.app.request(jsonRequest("/api/v1/relay/send", "POST", undefined, STRANGER));
    expect(res.status).toBe(202);
    return ((await res.json()) as { data: { messageId: string } }).data.messageId;
  }

  async function latest(): Promise<RoundBody["data"]> {
    const res = await t.app.request(jsonRequest("/api/v1/oracle/latest", "GET", undefined, STRANGER));
    return ((await res.json()) as RoundBody).data;
  }

  beforeEach(() => {
    t = createTestApp();
  });

  describe("GET /api/v1/oracle", () => {
    it("serves the latest mirrored round", async () => {
      expect(await latest()).toEqual({
        roundId: "1",
        answer: "100000000",
        startedAt: T0.toString(),
        updatedAt: T0.toString(),
        answeredInRound: "1",
      });
    });

    it("serves a stored round by id", async () => {
      const res = await t.app.request(jsonRequest("/api/v1/oracle/rounds/1", "GET", undefined, STRANGER));

      expect(res.status).toBe(200);
      expect(((await res.json()) as RoundBody).data.answer).toBe("100000000");
    });

    it("returns 404 for a round never received", async () => {
      const res = await t.app.request(jsonRequest("/api/v1/oracle/rounds/99", "GET", undefined, STRANGER));

      expect(res.status).toBe(404);
      expect((await readError(res)).code).toBe("ROUND_NOT_FOUND");
    });

    it("rejects a non-numeric round id", async () => {
      const res = await t.app.request(jsonRequest("/api/v1/oracle/rounds/latest", "GET", undefined, STRANGER));
      expect(res.status).toBe(400);
    });
  });

  describe("PUT /api/v1/relay/source-price", () => {
    it("publishes the next source round without touching the oracle", async () => {
      t.clock.advance(60n);
      const res = await t.app.request(
        jsonRequest("/api/v1/relay/source-price", "PUT", { answer: "200000000" }, ADMIN),
      );

      expect(res.status).toBe(200);
      expect(((await res.json()) as RoundBody).data).toEqual({
        roundId: "2",
        answer: "200000000",
        startedAt: (T0 + 60n).toString(),
        updatedAt: (T0 + 60n).toString(),
        answeredInRound: "2",
      });
      expect((await latest()).roundId).toBe("1");
    });
  });

  describe("send, pending and deliver", () => {
    it("queues a message carrying the source round", async () => {
      const messageId = await send();

      const res = await t.app.request(jsonRequest("/api/v1/relay/pending", "GET", undefined, STRANGER));
      const body = (await res.json()) as { data: Record<string, unknown>[] };
      expect(body.data).toHaveLength(1);
      expect(body.data[0]).toMatchObject({
        messageId,
        nonce: "2",
        sourceDomain: SOURCE_DOMAIN,
        sourceSender: RELAYER,
        destinationDomain: DESTINATION_DOMAIN,
        destinationAddress: ORACLE,
        feeInfo: { feeToken: "0x0000000000000000000000000000000000000000", amount: "0" },
        requiredGasLimit: "200000",
      });
    });

    it("moves a new price into the oracle and the vault's quotes", async () => {
      await t.app.request(jsonRequest("/api/v1/relay/source-price", "PUT", { answer: "200000000" }, ADMIN));
      const messageId = await send();

      const res = await t.app.request(jsonRequest("/api/v1/relay/deliver", "POST", {}, ADMIN));
      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ data: [{ messageId, status: "delivered" }] });

      expect((await latest()).answer).toBe("200000000");
      const quote = await t.app.request(
        jsonRequest("/api/v1/vault/quote?targetValue=100", "GET", undefined, STRANGER),
      );
      expect(((await quote.json()) as { data: { requiredAssets: string } }).data.requiredAssets).toBe("50");
    });

    it("delivers a single message by id", async () => {
      const first = await send();
      await send();

      const res = await t.app.request(jsonRequest("/api/v1/relay/deliver", "POST", { messageId: first }, ADMIN));
      expect(await res.json()).toEqual({ data: [{ messageId: first, status: "delivered" }] });

      const pending = await t.app.request(jsonRequest("/api/v1/relay/pending", "GET", undefined, STRANGER));
      expect(((await pending.json()) as { data: unknown[] }).data).toHaveLength(1);
    });

    it("returns 404 for a message that is not pending", async () => {
      const res = await t.app.request(
        jsonRequest("/api/v1/relay/deliver", "POST", { messageId: `0x${"11".repeat(32)}` }, ADMIN),
      );

      expect(res.status).toBe(404);
      expect((await readError(res)).code).toBe("MESSAGE_NOT_FOUND");
    });

    it("rejects a malformed message id", async () => {
      const res = await t.app.request(jsonRequest("/api/v1/relay/deliver", "POST", { messageId: "0x1234" }, ADMIN));
      expect(res.status).toBe(400);
    });

    it("lets a non-positive relayed price through the oracle but not the vault", async () => {
      await t.app.request(jsonRequest("/api/v1/relay/source-price", "PUT", { answer: "-5" }, ADMIN));
      await send();
      await t.app.request(jsonRequest("/api/v1/relay/deliver", "POST", {}, ADMIN));

      expect((await latest()).answer).toBe("-5");
      const quote = await t.app.request(
        jsonRequest("/api/v1/vault/quote?targetValue=100", "GET", undefined, STRANGER),
      );
      expect(quote.status).toBe(503);
      expect((await readError(quote)).code).toBe("INVALID_PRICE_VALUE");
    });
  });
});
