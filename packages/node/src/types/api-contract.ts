/**
 * Hono application environment type.
 *
 * Defines the typed context variables available in all route handlers.
 * These are set by middleware and consumed by route handlers.
 */

import type { AccountId } from "@strata/types";
import type { StrataService } from "../services/strata-service.js";

/**
 * Hono environment type for the Strata app.
 *
 * Middleware populates Variables; route handlers read them via c.get().
 */
export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** The engines behind the API (set for every /api request) */
    service: StrataService;

    /** Acting account from X-Account-Id (set by caller middleware on mutations) */
    caller: AccountId;
  };
}
