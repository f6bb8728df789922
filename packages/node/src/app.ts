/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * Separated from main.ts for testability — tests create the app
 * without starting the HTTP server.
 */

import { Hono } from "hono";
import type { AppEnv } from "./types/api-contract.js";
import type { BondService } from "./services/bond-service.js";
import { handleError } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import { authMiddleware, callerHeaderMiddleware } from "./middleware/auth.js";
import type { AuthConfig } from "./middleware/auth.js";
import {
  createAssetRoutes,
  createEventRoutes,
  createHealthRoutes,
  createOracleRoutes,
  createRelayRoutes,
  createVaultRoutes,
} from "./routes/index.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly service: BondService;
  readonly logFn?: (entry: RequestLogEntry) => void;
  /**
   * Auth configuration. When provided, API keys are required;
   * otherwise callers name themselves with X-Caller-Address.
   */
  readonly auth?: AuthConfig;
}

// =============================================================================
// Factory
// =============================================================================

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): Hono<AppEnv> {
  const { service } = options;
  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  // ─── Error Handler ──────────────────────────────────────────────
  app.onError(handleError);

  // ─── Health Routes (no auth required) ───────────────────────────
  app.route("/", createHealthRoutes(service));

  // ─── API Routes ─────────────────────────────────────────────────
  app.use("/api/*", options.auth !== undefined ? authMiddleware(options.auth) : callerHeaderMiddleware());
  app.use("/api/*", async (c, next) => {
    c.set("service", service);
    await next();
  });

  app.route("/api/v1/vault", createVaultRoutes());
  app.route("/api/v1/asset", createAssetRoutes());
  app.route("/api/v1/oracle", createOracleRoutes());
  app.route("/api/v1/relay", createRelayRoutes());
  app.route("/api/v1/events", createEventRoutes());

  return app;
}
