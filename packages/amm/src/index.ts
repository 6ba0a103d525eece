/**
 * @strata/amm — Constant-product automated market maker.
 *
 * Paired-asset pools with minted LP shares, fee-bearing swaps guarded by
 * a minimum output, an append-only swap history, and owner-registered
 * farming pools.
 */

export { PoolEngine } from "./pool-engine.js";
export { BoundedList } from "./bounded-list.js";

export {
  amountOut,
  swapFee,
  quoteSwap,
  spotPrices,
  initialLiquidity,
  mintedLiquidity,
  redeemedAmount,
} from "./pricing.js";

export {
  PRECISION,
  FEE_DENOMINATOR,
  DEFAULT_FEE_RATE,
  MAX_FEE_RATE,
  MIN_LIQUIDITY,
  MAX_POOLS_PER_USER,
  AMM_STREAM,
} from "./constants.js";

export type {
  PoolEngineConfig,
  Pool,
  LiquidityAdded,
  LiquidityRemoved,
  SwapQuote,
  SwapRecord,
  FarmingPool,
  UserFarmingInfo,
  AmmStats,
  AmmErrorCode,
} from "./types.js";
export { AmmError } from "./types.js";
