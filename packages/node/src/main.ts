/**
 * @bondline/node — Entry point.
 *
 * Loads config, builds the deployment, starts the HTTP server and the
 * relay scheduler, and handles graceful shutdown.
 */

import { serve } from "@hono/node-server";
import { loadConfig, parseApiKeys } from "./config.js";
import { createLogger } from "./logger.js";
import { createApp } from "./app.js";
import { BondService } from "./services/bond-service.js";
import { RelayScheduler } from "./services/relay-scheduler.js";
import type { AuthConfig } from "./middleware/auth.js";
import type { ApiKeyRecord } from "./types/auth.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger(config);

  // Build auth config from env vars
  let authConfig: AuthConfig | undefined;
  const parsedKeys = parseApiKeys(config.API_KEYS);
  if (parsedKeys.length > 0) {
    const keyMap = new Map<string, ApiKeyRecord>();
    for (const k of parsedKeys) {
      keyMap.set(k.key, k);
    }
    authConfig = { apiKeys: keyMap };
    logger.info({ apiKeyCount: parsedKeys.length }, "Auth configured");
  } else {
    logger.warn("No API keys configured, callers identify themselves by header");
  }

  const service = BondService.fromConfig(config, { logger });

  // Seed the destination oracle so the vault has a price from the start
  service.relayLatestRound();
  service.deliverAll();

  const app = createApp({
    service,
    logFn: (entry) => {
      logger.info(entry, `${entry.method} ${entry.path} ${entry.status}`);
    },
    ...(authConfig !== undefined ? { auth: authConfig } : {}),
  });

  const scheduler =
    config.RELAY_INTERVAL_MS > 0
      ? new RelayScheduler({
          service,
          intervalMs: config.RELAY_INTERVAL_MS,
          logger: logger.child({ component: "scheduler" }),
        })
      : undefined;
  scheduler?.start();

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info({ port: config.PORT, host: config.HOST }, "Bondline node started");

  // Graceful shutdown
  const shutdown = (signal: string): void => {
    logger.info({ signal }, "Shutdown signal received");
    scheduler?.stop();
    server.close((err) => {
      if (err !== undefined) {
        logger.error({ err }, "HTTP server did not close cleanly");
        process.exit(1);
      }
      logger.info("Shutdown complete");
      process.exit(0);
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
});
