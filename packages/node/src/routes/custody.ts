/**
 * Custody routes.
 *
 * GET  /api/v1/custody/:account/:asset — Settled balance
 * POST /api/v1/custody/fund            — Credit an account (faucet; only when enabled)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { FundSchema } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";
import { respond } from "../types/json.js";

export interface CustodyRouteOptions {
  readonly faucetEnabled: boolean;
}

export function createCustodyRoutes(options: CustodyRouteOptions): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  if (options.faucetEnabled) {
    routes.post("/fund", validateBody(FundSchema), (c) => {
      const body = c.get("validatedBody");
      const custody = c.get("service").custody;
      custody.fund(body.account, body.asset, body.amount);
      return respond(c, {
        account: body.account,
        asset: body.asset,
        balance: custody.balanceOf(body.account, body.asset),
      });
    });
  }

  routes.get("/:account/:asset", (c) => {
    const account = c.req.param("account");
    const asset = c.req.param("asset");
    return respond(c, {
      account,
      asset,
      balance: c.get("service").custody.balanceOf(account, asset),
    });
  });

  return routes;
}
