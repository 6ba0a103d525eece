/**
 * @strata/amm — Constant-product pricing.
 *
 *   amountInNet = amountIn * (FEE_DENOMINATOR - feeRate)
 *   amountOut   = amountInNet * reserveOut / (reserveIn * FEE_DENOMINATOR + amountInNet)
 *
 * All divisions truncate. The fee is retained in the reserves, so
 * reserveA * reserveB never decreases across a swap.
 */

import { basisPoints, fixedPoint, isqrt, minBigInt, mulDiv } from "@strata/math";
import { FEE_DENOMINATOR, PRECISION } from "./constants.js";
import type { SwapQuote } from "./types.js";

export function amountOut(
  amountIn: bigint,
  reserveIn: bigint,
  reserveOut: bigint,
  feeRate: bigint,
): bigint {
  const amountInNet = amountIn * (FEE_DENOMINATOR - feeRate);
  return mulDiv(amountInNet, reserveOut, reserveIn * FEE_DENOMINATOR + amountInNet);
}

export function swapFee(amountIn: bigint, feeRate: bigint): bigint {
  return mulDiv(amountIn, feeRate, FEE_DENOMINATOR);
}

/**
 * Quote a swap against the pre-swap reserves.
 */
export function quoteSwap(
  amountIn: bigint,
  reserveIn: bigint,
  reserveOut: bigint,
  feeRate: bigint,
): SwapQuote {
  const out = amountOut(amountIn, reserveIn, reserveOut, feeRate);
  return {
    amountOut: out,
    fee: swapFee(amountIn, feeRate),
    priceImpact: reserveOut === 0n ? 0n : basisPoints(out, reserveOut),
  };
}

/**
 * Both directional prices at 6-decimal fixed point.
 */
export function spotPrices(
  reserveA: bigint,
  reserveB: bigint,
): { readonly priceA: bigint; readonly priceB: bigint } {
  return {
    priceA: fixedPoint(reserveA, PRECISION, reserveB),
    priceB: fixedPoint(reserveB, PRECISION, reserveA),
  };
}

/**
 * Shares minted when seeding a pool.
 */
export function initialLiquidity(amountA: bigint, amountB: bigint): bigint {
  return isqrt(amountA * amountB);
}

/**
 * Shares minted for a deposit into an existing pool: the smaller of the
 * two proportional contributions.
 */
export function mintedLiquidity(
  amountA: bigint,
  amountB: bigint,
  reserveA: bigint,
  reserveB: bigint,
  totalSupply: bigint,
): bigint {
  return minBigInt(
    mulDiv(amountA, totalSupply, reserveA),
    mulDiv(amountB, totalSupply, reserveB),
  );
}

/**
 * Share of one reserve redeemed by burning `liquidity`.
 */
export function redeemedAmount(
  liquidity: bigint,
  reserve: bigint,
  totalSupply: bigint,
): bigint {
  return mulDiv(liquidity, reserve, totalSupply);
}
