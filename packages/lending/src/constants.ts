/**
 * @strata/lending — Protocol constants.
 */

/** Minimum collateral ratio, in percent, for a new loan and for a healthy one. */
export const MIN_COLLATERAL_RATIO = 150n;

/** Largest principal a single borrow may request. */
export const MAX_LOAN_AMOUNT = 1_000_000_000_000n;

/** Default interest per block, in basis points of principal (0.05%). */
export const DEFAULT_INTEREST_RATE_PER_BLOCK = 5n;

/** Interest rates are expressed against this denominator. */
export const INTEREST_DENOMINATOR = 10_000n;

/** Event stream the ledger appends to. */
export const LENDING_STREAM = "lending";
