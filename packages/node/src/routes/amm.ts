/**
 * AMM routes.
 *
 * POST /api/v1/amm/pools                       — Create a pool
 * POST /api/v1/amm/pools/:id/liquidity         — Add liquidity
 * POST /api/v1/amm/pools/:id/liquidity/remove  — Remove liquidity
 * POST /api/v1/amm/pools/:id/swap              — Swap
 * POST /api/v1/amm/pools/:id/fee               — Set the fee rate (owner)
 * POST /api/v1/amm/pools/:id/farm              — Create a farming pool (owner)
 * GET  /api/v1/amm/pools/:id                   — Pool record
 * GET  /api/v1/amm/pools/:id/quote             — Swap quote (?assetIn=&amountIn=)
 * GET  /api/v1/amm/pools/:id/liquidity/:provider
 * GET  /api/v1/amm/pools/:id/farm
 * GET  /api/v1/amm/pools/:id/farm/:user
 * GET  /api/v1/amm/accounts/:account/pools
 * GET  /api/v1/amm/swaps/:id
 * GET  /api/v1/amm/stats
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  AddLiquiditySchema,
  CreateFarmSchema,
  CreatePoolSchema,
  FeeRateSchema,
  RemoveLiquiditySchema,
  SwapQuoteQuerySchema,
  SwapSchema,
} from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";
import { respond } from "../types/json.js";
import { found, parseId, parseQuery } from "./params.js";

export function createAmmRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // ─── Mutations ──────────────────────────────────────────────────

  routes.post("/pools", validateBody(CreatePoolSchema), (c) => {
    const body = c.get("validatedBody");
    const pool = c
      .get("service")
      .amm.createPool(c.get("caller"), body.assetA, body.assetB, body.amountA, body.amountB);
    return respond(c, pool, 201);
  });

  routes.post("/pools/:id/liquidity", validateBody(AddLiquiditySchema), (c) => {
    const poolId = parseId(c.req.param("id"), "pool id");
    const body = c.get("validatedBody");
    const result = c
      .get("service")
      .amm.addLiquidity(c.get("caller"), poolId, body.amountA, body.amountB, body.minLiquidity);
    return respond(c, result);
  });

  routes.post("/pools/:id/liquidity/remove", validateBody(RemoveLiquiditySchema), (c) => {
    const poolId = parseId(c.req.param("id"), "pool id");
    const body = c.get("validatedBody");
    const result = c
      .get("service")
      .amm.removeLiquidity(c.get("caller"), poolId, body.liquidity, body.minAmountA, body.minAmountB);
    return respond(c, result);
  });

  routes.post("/pools/:id/swap", validateBody(SwapSchema), (c) => {
    const poolId = parseId(c.req.param("id"), "pool id");
    const body = c.get("validatedBody");
    const record = c
      .get("service")
      .amm.swap(c.get("caller"), poolId, body.amountIn, body.minAmountOut, body.assetIn);
    return respond(c, record, 201);
  });

  routes.post("/pools/:id/fee", validateBody(FeeRateSchema), (c) => {
    const poolId = parseId(c.req.param("id"), "pool id");
    const { feeRate } = c.get("validatedBody");
    return respond(c, c.get("service").amm.setPoolFeeRate(c.get("caller"), poolId, feeRate));
  });

  routes.post("/pools/:id/farm", validateBody(CreateFarmSchema), (c) => {
    const poolId = parseId(c.req.param("id"), "pool id");
    const body = c.get("validatedBody");
    const farm = c
      .get("service")
      .amm.createFarmingPool(c.get("caller"), poolId, body.rewardPerBlock, body.startBlock, body.endBlock);
    return respond(c, farm, 201);
  });

  // ─── Queries ────────────────────────────────────────────────────

  routes.get("/pools/:id", (c) => {
    const poolId = parseId(c.req.param("id"), "pool id");
    return respond(c, found(c.get("service").amm.getPool(poolId), `Pool ${poolId}`));
  });

  routes.get("/pools/:id/quote", (c) => {
    const poolId = parseId(c.req.param("id"), "pool id");
    const query = parseQuery(SwapQuoteQuerySchema, c.req.query());
    return respond(c, c.get("service").amm.getSwapQuote(poolId, query.amountIn, query.assetIn));
  });

  routes.get("/pools/:id/liquidity/:provider", (c) => {
    const poolId = parseId(c.req.param("id"), "pool id");
    const provider = c.req.param("provider");
    return respond(c, {
      poolId,
      provider,
      balance: c.get("service").amm.getLiquidityBalance(poolId, provider),
    });
  });

  routes.get("/pools/:id/farm", (c) => {
    const poolId = parseId(c.req.param("id"), "pool id");
    return respond(c, found(c.get("service").amm.getFarmingPool(poolId), `Farming pool ${poolId}`));
  });

  routes.get("/pools/:id/farm/:user", (c) => {
    const poolId = parseId(c.req.param("id"), "pool id");
    return respond(c, c.get("service").amm.getUserFarmingInfo(poolId, c.req.param("user")));
  });

  routes.get("/accounts/:account/pools", (c) => {
    return respond(c, c.get("service").amm.getUserPools(c.req.param("account")));
  });

  routes.get("/swaps/:id", (c) => {
    const swapId = parseId(c.req.param("id"), "swap id");
    return respond(c, found(c.get("service").amm.getSwap(swapId), `Swap ${swapId}`));
  });

  routes.get("/stats", (c) => {
    return respond(c, c.get("service").amm.getProtocolStats());
  });

  return routes;
}
