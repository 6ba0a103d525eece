/**
 * @strata/lending — Interest and health arithmetic.
 *
 * Simple (non-compounding) interest over elapsed blocks:
 *
 *   interest = principal * ratePerBlock * blocksElapsed / 10000
 *
 * Repayment measures elapsed blocks from the loan's last update;
 * liquidation and health checks measure them from origination.
 */

import type { BlockHeight } from "@strata/types";
import { checkedSub, mulDiv, ratioPercent } from "@strata/math";
import { INTEREST_DENOMINATOR, MIN_COLLATERAL_RATIO } from "./constants.js";
import type { Loan } from "./types.js";

export function blocksElapsed(from: BlockHeight, now: BlockHeight): bigint {
  return checkedSub(BigInt(now), BigInt(from));
}

export function accruedInterest(
  principal: bigint,
  ratePerBlock: bigint,
  blocks: bigint,
): bigint {
  return mulDiv(principal * ratePerBlock, blocks, INTEREST_DENOMINATOR);
}

/**
 * Interest owed at repayment time (since the last principal update).
 */
export function interestSinceUpdate(loan: Loan, now: BlockHeight): bigint {
  return accruedInterest(
    loan.principal,
    loan.interestRate,
    blocksElapsed(loan.lastUpdateBlock, now),
  );
}

/**
 * Interest used for liquidation and health (since origination).
 */
export function interestSinceOrigination(loan: Loan, now: BlockHeight): bigint {
  return accruedInterest(
    loan.principal,
    loan.interestRate,
    blocksElapsed(loan.startBlock, now),
  );
}

export interface LoanHealth {
  readonly interest: bigint;
  readonly totalOwed: bigint;
  /** collateral * 100 / totalOwed */
  readonly collateralRatio: bigint;
  readonly healthy: boolean;
}

/**
 * Health of a loan at a block height, on the origination basis.
 */
export function loanHealth(loan: Loan, now: BlockHeight): LoanHealth {
  const interest = interestSinceOrigination(loan, now);
  const totalOwed = loan.principal + interest;
  const collateralRatio = ratioPercent(loan.collateral, totalOwed);
  return {
    interest,
    totalOwed,
    collateralRatio,
    healthy: collateralRatio >= MIN_COLLATERAL_RATIO,
  };
}
