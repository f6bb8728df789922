/**
 * Hono application environment type.
 *
 * Defines the typed context variables available in all route handlers.
 * These are set by middleware and consumed by route handlers.
 */

import type { BondService } from "../services/bond-service.js";
import type { AuthContext } from "./auth.js";

export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** The deployment every route operates on */
    service: BondService;

    /** Authentication context (set by auth middleware) */
    auth: AuthContext;
  };
}
