/**
 * Hono application environment type.
 *
 * Defines the typed context variables available in all route handlers.
 * These are set by middleware and consumed by route handlers.
 */

import type { LaunchpadService } from "../services/launchpad-service.js";
import type { AuthContext } from "./auth.js";

export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** The launchpad behind this app (set for every /api route) */
    service: LaunchpadService;

    /** Resolved caller; absent for anonymous reads */
    auth: AuthContext | undefined;
  };
}
