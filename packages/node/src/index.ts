/**
 * @bondline/node — HTTP service for one bond deployment.
 *
 * @packageDocumentation
 */

export { BondService } from "./services/bond-service.js";
export type {
  BondServiceConfig,
  EventQuery,
  AccountBalances,
} from "./services/bond-service.js";
export { RelayScheduler } from "./services/relay-scheduler.js";
export type { RelaySchedulerOptions, TickResult } from "./services/relay-scheduler.js";
export { loadConfig, parseApiKeys, ConfigSchema } from "./config.js";
export type { AppConfig, ParsedApiKey } from "./config.js";
export { createLogger } from "./logger.js";
export { createApp } from "./app.js";
export type { CreateAppOptions } from "./app.js";
export * from "./types/index.js";
