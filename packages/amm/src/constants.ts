/**
 * @strata/amm — Protocol constants.
 */

/** Fixed-point scale of recorded prices (6 decimals). */
export const PRECISION = 1_000_000n;

/** Fee rates are expressed against this denominator. */
export const FEE_DENOMINATOR = 10_000n;

/** Fee rate of a new pool: 0.30%. */
export const DEFAULT_FEE_RATE = 30n;

/** Highest fee rate the owner may set: 10%. */
export const MAX_FEE_RATE = 1_000n;

/** Minimum isqrt(amountA * amountB) needed to seed a pool. */
export const MIN_LIQUIDITY = 1_000n;

/** Most pools one account may create. */
export const MAX_POOLS_PER_USER = 20;

/** Event stream the engine appends to. */
export const AMM_STREAM = "amm";
