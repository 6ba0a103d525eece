/**
 * GET /api/v1/clock — Current block height.
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export function createClockRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    return c.json({ data: { height: c.get("service").clock.currentHeight() } });
  });

  return routes;
}
