/**
 * Tests for authentication middleware.
 *
 * Verifies:
 * - API key auth (valid, invalid, missing) and the bound caller address
 * - Caller-header mode (valid, missing, malformed)
 * - Permission guard (allowed, denied)
 */

import { describe, it, expect } from "vitest";
import { Hono } from "hono";
import type { AppEnv } from "../../src/types/api-contract.js";
import type { ApiKeyRecord, AuthContext } from "../../src/types/auth.js";
import { authMiddleware, callerHeaderMiddleware, requirePermission } from "../../src/middleware/auth.js";
import { CREDITOR, DEBTOR, STRANGER, createTestApp, jsonRequest, readError } from "../setup.js";

function makeApp(apiKeys: ApiKeyRecord[] = []) {
  const keyMap = new Map<string, ApiKeyRecord>();
  for (const k of apiKeys) {
    keyMap.set(k.key, k);
  }

  const app = new Hono<AppEnv>();
  app.use("*", authMiddleware({ apiKeys: keyMap }));
  app.get("/test", (c) => c.json({ auth: c.get("auth") }));
  app.get("/admin-only", requirePermission("admin"), (c) => c.json({ ok: true }));
  app.get("/write-only", requirePermission("write"), (c) => c.json({ ok: true }));
  return app;
}

describe("API key auth", () => {
  const keys: ApiKeyRecord[] = [
    { key: "test-operator", role: "operator", address: "0x6000000000000000000000000000000000000001" },
    { key: "test-viewer", role: "viewer", address: "0x9000000000000000000000000000000000000001" },
  ];

  it("authenticates with a valid API key", async () => {
    const res = await makeApp(keys).request("/test", { headers: { "X-Api-Key": "test-operator" } });

    expect(res.status).toBe(200);
    const body = (await res.json()) as { auth: AuthContext };
    expect(body.auth).toEqual({
      type: "api-key",
      identity: "test-operator",
      role: "operator",
      address: DEBTOR,
    });
  });

  it("rejects a missing API key", async () => {
    const res = await makeApp(keys).request("/test");

    expect(res.status).toBe(401);
    expect(await readError(res)).toEqual({ code: "UNAUTHORIZED", message: "Authentication required" });
  });

  it("rejects an unknown API key", async () => {
    const res = await makeApp(keys).request("/test", { headers: { "X-Api-Key": "test-unknown" } });

    expect(res.status).toBe(401);
    expect((await readError(res)).message).toBe("Invalid API key");
  });

  it("lets an operator write but not administer", async () => {
    const app = makeApp(keys);
    const headers = { "X-Api-Key": "test-operator" };

    expect((await app.request("/write-only", { headers })).status).toBe(200);

    const denied = await app.request("/admin-only", { headers });
    expect(denied.status).toBe(403);
    expect(await readError(denied)).toEqual({
      code: "FORBIDDEN",
      message: "Role 'operator' lacks 'admin' permission",
    });
  });

  it("keeps a viewer read-only", async () => {
    const res = await makeApp(keys).request("/write-only", { headers: { "X-Api-Key": "test-viewer" } });
    expect(res.status).toBe(403);
  });
});

describe("caller header auth", () => {
  function headerApp() {
    const app = new Hono<AppEnv>();
    app.use("*", callerHeaderMiddleware());
    app.get("/test", (c) => c.json({ auth: c.get("auth") }));
    return app;
  }

  it("acts as the named address with the admin role", async () => {
    const res = await headerApp().request("/test", { headers: { "X-Caller-Address": CREDITOR.toLowerCase() } });

    expect(res.status).toBe(200);
    const body = (await res.json()) as { auth: AuthContext };
    expect(body.auth).toEqual({ type: "header", identity: CREDITOR, role: "admin", address: CREDITOR });
  });

  it("requires the header", async () => {
    const res = await headerApp().request("/test");

    expect(res.status).toBe(401);
    expect((await readError(res)).message).toBe("X-Caller-Address header required");
  });

  it("rejects a malformed address", async () => {
    const res = await headerApp().request("/test", { headers: { "X-Caller-Address": "alice" } });

    expect(res.status).toBe(401);
    expect((await readError(res)).message).toBe('Invalid X-Caller-Address: "alice"');
  });
});

describe("secured app", () => {
  it("acts as the key's address on vault operations", async () => {
    const { app } = createTestApp({
      auth: {
        apiKeys: new Map<string, ApiKeyRecord>([
          ["test-stranger", { key: "test-stranger", role: "operator", address: STRANGER }],
        ]),
      },
    });

    // The caller header is ignored once keys are configured
    const res = await app.request(
      new Request("http://localhost/api/v1/vault/deposit", {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          "X-Api-Key": "test-stranger",
          "X-Caller-Address": CREDITOR,
        },
        body: JSON.stringify({ maxAssets: "1000", targetValue: "1000", principal: true }),
      }),
    );

    expect(res.status).toBe(403);
    expect((await readError(res)).code).toBe("ONLY_DEBTOR_OR_CREDITOR");
  });

  it("keeps admin routes from operators", async () => {
    const { app } = createTestApp({
      auth: {
        apiKeys: new Map<string, ApiKeyRecord>([
          ["test-operator", { key: "test-operator", role: "operator", address: STRANGER }],
        ]),
      },
    });

    const req = jsonRequest("/api/v1/vault/fees", "PUT", { bips: 10 });
    req.headers.set("X-Api-Key", "test-operator");
    const res = await app.request(req);

    expect(res.status).toBe(403);
    expect((await readError(res)).code).toBe("FORBIDDEN");
  });
});
