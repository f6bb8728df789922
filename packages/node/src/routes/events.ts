/**
 * Event query routes.
 *
 * GET /api/v1/events?stream=&afterPosition=&limit=  — Events in global order
 *
 * Pages forward by global position: pass the returned `nextPosition`
 * as `afterPosition` to read on.
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { ListEventsQuerySchema } from "../types/dto.js";
import { requirePermission } from "../middleware/auth.js";
import { createErrorEnvelope } from "../types/error.js";

export function createEventRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", requirePermission("read"), (c) => {
    const service = c.get("service");

    const queryResult = ListEventsQuerySchema.safeParse(c.req.query());
    if (!queryResult.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Invalid query parameters"),
        400,
      );
    }

    const query = queryResult.data;
    const events = service.events({
      limit: query.limit,
      ...(query.stream !== undefined ? { owner: query.stream } : {}),
      ...(query.afterPosition !== undefined ? { afterPosition: query.afterPosition } : {}),
    });

    const last = events[events.length - 1];
    return c.json({
      data: events,
      pagination: {
        limit: query.limit,
        nextPosition: last === undefined ? null : last.globalPosition,
      },
    });
  });

  return routes;
}
