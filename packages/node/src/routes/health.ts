/**
 * Health check routes.
 *
 * GET /health — Liveness probe (always 200 if server is running)
 * GET /ready  — Readiness probe (fresh oracle price + event store integrity)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { BondService } from "../services/bond-service.js";

interface SubsystemStatus {
  readonly status: "ok" | "down";
  readonly detail?: string;
}

export function createHealthRoutes(service: BondService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", (c) => {
    const integrity = service.verifyIntegrity();
    const eventStore: SubsystemStatus = integrity.valid
      ? { status: "ok" }
      : { status: "down", detail: `chainValid=false, errors=${integrity.errors.length}` };

    const oracle: SubsystemStatus = service.hasFreshPrice()
      ? { status: "ok" }
      : { status: "down", detail: "no price round within the staleness window" };

    const ready = eventStore.status === "ok" && oracle.status === "ok";
    const body = {
      status: ready ? "ready" : "not_ready",
      subsystems: { eventStore, oracle },
      timestamp: new Date().toISOString(),
    };

    return ready ? c.json(body, 200) : c.json(body, 503);
  });

  return routes;
}
