/**
 * Repayment vault routes.
 *
 * GET  /api/v1/vault                     — Vault state
 * GET  /api/v1/vault/quote?targetValue=  — Assets a deposit of that value needs
 * GET  /api/v1/vault/balances/:address   — Shares, assets and vault allowance
 * POST /api/v1/vault/deposit             — Fund, repay principal or pay interest
 * POST /api/v1/vault/withdraw            — Burn shares for an exact asset amount
 * POST /api/v1/vault/redeem              — Burn an exact share amount
 * PUT  /api/v1/vault/fees                — Set the interest fee (admin)
 * PUT  /api/v1/vault/fees-recipient      — Set the fee recipient (admin)
 *
 * Every mutation acts as the authenticated caller's address.
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  AddressSchema,
  DepositSchema,
  QuoteQuerySchema,
  RedeemSchema,
  SetFeesRecipientSchema,
  SetFeesSchema,
  WithdrawSchema,
} from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";
import { requirePermission } from "../middleware/auth.js";
import { createErrorEnvelope } from "../types/error.js";
import { toVaultStateView } from "../types/views.js";

export function createVaultRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // ─── Queries ─────────────────────────────────────────────────────

  routes.get("/", requirePermission("read"), (c) => {
    const service = c.get("service");
    return c.json({ data: toVaultStateView(service.vaultState()) });
  });

  routes.get("/quote", requirePermission("read"), (c) => {
    const service = c.get("service");

    const queryResult = QuoteQuerySchema.safeParse(c.req.query());
    if (!queryResult.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Invalid query parameters"),
        400,
      );
    }

    const quote = service.quote(queryResult.data.targetValue);
    return c.json({
      data: {
        targetValue: queryResult.data.targetValue.toString(),
        price: quote.price.toString(),
        requiredAssets: quote.requiredAssets.toString(),
      },
    });
  });

  routes.get("/balances/:address", requirePermission("read"), (c) => {
    const service = c.get("service");
    const param = AddressSchema.safeParse(c.req.param("address"));
    if (!param.success) {
      return c.json(createErrorEnvelope("VALIDATION_ERROR", "Invalid address"), 400);
    }

    const balances = service.balances(param.data);
    return c.json({
      data: {
        address: param.data,
        shares: balances.shares.toString(),
        assets: balances.assets.toString(),
        allowance: balances.allowance.toString(),
      },
    });
  });

  // ─── Payments ────────────────────────────────────────────────────

  routes.post("/deposit", requirePermission("write"), validateBody(DepositSchema), (c) => {
    const service = c.get("service");
    const caller = c.get("auth").address;
    const body = c.get("validatedBody");

    const result = service.deposit(caller, body.maxAssets, body.targetValue, body.principal);
    return c.json(
      {
        data: {
          shares: result.shares.toString(),
          assetsUsed: result.assetsUsed.toString(),
          vault: toVaultStateView(service.vaultState()),
        },
      },
      201,
    );
  });

  // ─── Redemption ──────────────────────────────────────────────────

  routes.post("/withdraw", requirePermission("write"), validateBody(WithdrawSchema), (c) => {
    const service = c.get("service");
    const caller = c.get("auth").address;
    const body = c.get("validatedBody");

    const shares = service.withdraw(caller, body.assets, body.receiver ?? caller, body.owner ?? caller);
    return c.json({ data: { assets: body.assets.toString(), shares: shares.toString() } });
  });

  routes.post("/redeem", requirePermission("write"), validateBody(RedeemSchema), (c) => {
    const service = c.get("service");
    const caller = c.get("auth").address;
    const body = c.get("validatedBody");

    const assets = service.redeem(caller, body.shares, body.receiver ?? caller, body.owner ?? caller);
    return c.json({ data: { assets: assets.toString(), shares: body.shares.toString() } });
  });

  // ─── Administration ──────────────────────────────────────────────

  routes.put("/fees", requirePermission("admin"), validateBody(SetFeesSchema), (c) => {
    const service = c.get("service");
    const body = c.get("validatedBody");

    service.setFeesBips(c.get("auth").address, body.bips);
    return c.json({ data: toVaultStateView(service.vaultState()) });
  });

  routes.put(
    "/fees-recipient",
    requirePermission("admin"),
    validateBody(SetFeesRecipientSchema),
    (c) => {
      const service = c.get("service");
      const body = c.get("validatedBody");

      service.setFeesRecipient(c.get("auth").address, body.recipient);
      return c.json({ data: toVaultStateView(service.vaultState()) });
    },
  );

  return routes;
}
