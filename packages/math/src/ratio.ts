/**
 * @strata/math — Ratio helpers.
 *
 * Percent and basis-point ratios over unsigned integers, truncated.
 */

import { mulDiv } from "./integer.js";

/** 100% expressed in basis points. */
export const BASIS_POINTS = 10_000n;

/**
 * `numerator * 100 / denominator`: a whole-number percentage.
 *
 * ratioPercent(1600n, 1000n) → 160n
 */
export function ratioPercent(numerator: bigint, denominator: bigint): bigint {
  return mulDiv(numerator, 100n, denominator);
}

/**
 * `part * 10000 / whole`: a ratio in basis points.
 *
 * basisPoints(996n, 1_000_000n) → 9n
 */
export function basisPoints(part: bigint, whole: bigint): bigint {
  return mulDiv(part, BASIS_POINTS, whole);
}

/**
 * `numerator * precision / denominator`: a fixed-point quotient.
 *
 * fixedPoint(2n, 1_000_000n, 4n) → 500_000n (0.5 at six decimals)
 */
export function fixedPoint(
  numerator: bigint,
  precision: bigint,
  denominator: bigint,
): bigint {
  return mulDiv(numerator, precision, denominator);
}
