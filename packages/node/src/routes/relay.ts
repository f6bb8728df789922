/**
 * Source-domain and relay routes.
 *
 * PUT  /api/v1/relay/source-price  — Publish a new source round (admin)
 * POST /api/v1/relay/send          — Relay the latest source round
 * GET  /api/v1/relay/pending       — Messages awaiting delivery
 * POST /api/v1/relay/deliver       — Deliver one or all pending messages (admin)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { DeliverSchema, SourcePriceSchema } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";
import { requirePermission } from "../middleware/auth.js";
import { toDeliveryReceiptView, toRelayMessageView, toRoundView } from "../types/views.js";

export function createRelayRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.put("/source-price", requirePermission("admin"), validateBody(SourcePriceSchema), (c) => {
    const service = c.get("service");
    const body = c.get("validatedBody");

    const round = service.setSourcePrice(body.answer);
    return c.json({ data: toRoundView(round) });
  });

  routes.post("/send", requirePermission("write"), (c) => {
    const service = c.get("service");
    const messageId = service.relayLatestRound();
    return c.json({ data: { messageId } }, 202);
  });

  routes.get("/pending", requirePermission("read"), (c) => {
    const service = c.get("service");
    return c.json({ data: service.pendingMessages().map(toRelayMessageView) });
  });

  routes.post("/deliver", requirePermission("admin"), validateBody(DeliverSchema), (c) => {
    const service = c.get("service");
    const { messageId } = c.get("validatedBody");

    const receipts = messageId === undefined ? service.deliverAll() : [service.deliver(messageId)];
    return c.json({ data: receipts.map(toDeliveryReceiptView) });
  });

  return routes;
}
