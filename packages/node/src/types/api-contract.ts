/**
 * Hono application environment type.
 *
 * Defines the typed context variables available in all route handlers.
 * These are set by middleware and consumed by route handlers.
 */

import type { VestingService } from "../services/vesting-service.js";
import type { AuthContext } from "./auth.js";

/**
 * Middleware populates Variables; route handlers read them via c.get().
 */
export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** The vesting service behind every /api route */
    service: VestingService;

    /** Caller of a mutating request (set by auth or caller-header middleware) */
    auth: AuthContext;
  };
}
