/**
 * @strata/math — Deterministic integer arithmetic shared by the engines.
 *
 * A pure TypeScript module with zero runtime dependencies:
 * - Integer square root (Babylonian, rounded down)
 * - Truncating multiply-divide and checked subtraction
 * - Percent, basis-point and fixed-point ratios
 * - Decimal-string amounts for JSON boundaries
 * - Get-or-default balance maps
 */

export { isqrt, mulDiv, checkedSub, minBigInt, maxBigInt } from "./integer.js";
export { ratioPercent, basisPoints, fixedPoint, BASIS_POINTS } from "./ratio.js";
export { parseAmount, formatAmount, isAmountString } from "./amount.js";
export { AmountMap } from "./amount-map.js";
export { MathError } from "./errors.js";
export type { MathErrorCode } from "./errors.js";
