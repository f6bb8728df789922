/**
 * Asset routes.
 *
 * POST /api/v1/asset/approve — Allow the vault to pull the caller's asset
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { ApproveSchema } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";
import { requirePermission } from "../middleware/auth.js";

export function createAssetRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/approve", requirePermission("write"), validateBody(ApproveSchema), (c) => {
    const service = c.get("service");
    const caller = c.get("auth").address;
    const body = c.get("validatedBody");

    service.approveVault(caller, body.amount);
    const { allowance } = service.balances(caller);
    return c.json({ data: { owner: caller, spender: service.vault.address, allowance: allowance.toString() } });
  });

  return routes;
}
