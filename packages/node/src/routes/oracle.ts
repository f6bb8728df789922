/**
 * Valuation oracle routes.
 *
 * GET /api/v1/oracle/latest            — Latest mirrored round
 * GET /api/v1/oracle/rounds/:roundId   — A stored round
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { RoundIdParamSchema } from "../types/dto.js";
import { requirePermission } from "../middleware/auth.js";
import { createErrorEnvelope } from "../types/error.js";
import { toRoundView } from "../types/views.js";

export function createOracleRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.use("*", requirePermission("read"));

  routes.get("/latest", (c) => {
    const service = c.get("service");
    return c.json({ data: toRoundView(service.latestRound()) });
  });

  routes.get("/rounds/:roundId", (c) => {
    const service = c.get("service");
    const param = RoundIdParamSchema.safeParse(c.req.param("roundId"));
    if (!param.success) {
      return c.json(createErrorEnvelope("VALIDATION_ERROR", "Invalid round id"), 400);
    }

    return c.json({ data: toRoundView(service.round(param.data)) });
  });

  return routes;
}
