/**
 * Hono application environment type.
 *
 * Defines the typed context variables available in all route handlers.
 * These are set by middleware and consumed by route handlers.
 */

import type { AllocationService } from "../services/allocation-service.js";
import type { AuthContext } from "./auth.js";

/**
 * Hono environment type for the allotment app.
 *
 * Middleware populates Variables; route handlers read them via c.get().
 */
export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** The allocation service (set for every /api route) */
    service: AllocationService;

    /** Caller identity (set by auth middleware on mutating requests) */
    auth?: AuthContext;
  };
}
