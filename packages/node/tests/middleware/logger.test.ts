/**
 * Tests for logger and request-id middleware.
 */

import { describe, it, expect } from "vitest";
import type { RequestLogEntry } from "../../src/middleware/logger.js";
import { createTestApp, jsonRequest, STRANGER } from "../setup.js";

describe("loggerMiddleware", () => {
  it("calls logFn with request details", async () => {
    const entries: RequestLogEntry[] = [];
    const { app } = createTestApp({ logFn: (entry) => entries.push(entry) });

    await app.request("/health", { headers: { "X-Request-Id": "req-1" } });

    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({ method: "GET", path: "/health", status: 200, requestId: "req-1" });
    expect(entries[0]?.durationMs).toBeGreaterThanOrEqual(0);
  });

  it("logs the status of failed requests", async () => {
    const entries: RequestLogEntry[] = [];
    const { app } = createTestApp({ logFn: (entry) => entries.push(entry) });

    await app.request(jsonRequest("/api/v1/vault/fees", "PUT", { bips: 5 }, STRANGER));

    expect(entries.map((e) => [e.method, e.path, e.status])).toEqual([["PUT", "/api/v1/vault/fees", 403]]);
  });
});

describe("requestIdMiddleware", () => {
  it("echoes a well-formed incoming id", async () => {
    const { app } = createTestApp();
    const res = await app.request("/health", { headers: { "X-Request-Id": "trace:abc-123" } });

    expect(res.headers.get("X-Request-Id")).toBe("trace:abc-123");
  });

  it("generates a UUID when none is sent", async () => {
    const { app } = createTestApp();
    const res = await app.request("/health");

    expect(res.headers.get("X-Request-Id")).toMatch(
      /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/,
    );
  });

  it("replaces an id with unsafe characters", async () => {
    const { app } = createTestApp();
    const res = await app.request("/health", { headers: { "X-Request-Id": "bad id with spaces" } });

    const id = res.headers.get("X-Request-Id");
    expect(id).not.toBe("bad id with spaces");
    expect(id).toMatch(/^[0-9a-f-]{36}$/);
  });

  it("tags error responses too", async () => {
    const { app } = createTestApp();
    const res = await app.request(
      jsonRequest("/api/v1/oracle/rounds/99", "GET", undefined, STRANGER),
    );

    expect(res.status).toBe(404);
    expect(res.headers.get("X-Request-Id")).not.toBeNull();
  });
});
