/**
 * Route barrel — re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createVaultRoutes } from "./vault.js";
export { createAssetRoutes } from "./asset.js";
export { createOracleRoutes } from "./oracle.js";
export { createRelayRoutes } from "./relay.js";
export { createEventRoutes } from "./events.js";
