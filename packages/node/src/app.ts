/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * Separated from main.ts so tests create the app without starting
 * the HTTP server.
 */

import { Hono } from "hono";
import type { AppEnv } from "./types/api-contract.js";
import { createErrorEnvelope } from "./types/error.js";
import { StrataService } from "./services/strata-service.js";
import type { StrataServiceConfig } from "./services/strata-service.js";
import { handleError } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import { callerMiddleware } from "./middleware/caller.js";
import { createHealthRoutes } from "./routes/health.js";
import { createLendingRoutes } from "./routes/lending.js";
import { createAmmRoutes } from "./routes/amm.js";
import { createEventRoutes } from "./routes/events.js";
import { createCustodyRoutes } from "./routes/custody.js";
import { createClockRoutes } from "./routes/clock.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly serviceConfig: StrataServiceConfig;
  readonly logFn?: (entry: RequestLogEntry) => void;
  /** Mount POST /api/v1/custody/fund. Default: false */
  readonly faucetEnabled?: boolean;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: StrataService;
}

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const service = new StrataService(options.serviceConfig);
  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  // ─── Error Handling ─────────────────────────────────────────────
  app.onError(handleError);
  app.notFound((c) =>
    c.json(createErrorEnvelope("NOT_FOUND", `No route for ${c.req.method} ${c.req.path}`), 404),
  );

  // ─── Health Routes ──────────────────────────────────────────────
  app.route("/", createHealthRoutes(service));

  // ─── API Routes ─────────────────────────────────────────────────
  app.use("/api/*", async (c, next) => {
    c.set("service", service);
    await next();
  });
  app.use("/api/*", callerMiddleware());

  app.route("/api/v1/lending", createLendingRoutes());
  app.route("/api/v1/amm", createAmmRoutes());
  app.route("/api/v1/events", createEventRoutes());
  app.route("/api/v1/custody", createCustodyRoutes({ faucetEnabled: options.faucetEnabled === true }));
  app.route("/api/v1/clock", createClockRoutes());

  return { app, service };
}
