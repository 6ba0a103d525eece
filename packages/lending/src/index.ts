/**
 * @strata/lending — Collateralized lending ledger.
 *
 * Deposits into a shared pool, collateralized borrowing with per-block
 * simple interest, partial and full repayment, and open liquidation of
 * under-collateralized loans.
 *
 * Design rules:
 * - Unsigned bigint arithmetic only
 * - Fail-closed: every precondition is checked before any transfer
 * - One atomic transfer batch, then one state commit, per operation
 */

export { LendingLedger } from "./lending-ledger.js";

export {
  accruedInterest,
  blocksElapsed,
  interestSinceUpdate,
  interestSinceOrigination,
  loanHealth,
} from "./interest.js";
export type { LoanHealth } from "./interest.js";

export {
  MIN_COLLATERAL_RATIO,
  MAX_LOAN_AMOUNT,
  DEFAULT_INTEREST_RATE_PER_BLOCK,
  INTEREST_DENOMINATOR,
  LENDING_STREAM,
} from "./constants.js";

export type {
  LendingLedgerConfig,
  Loan,
  AccountPosition,
  OraclePrice,
  LendingStats,
  BalanceChange,
  RepayResult,
  LiquidationResult,
  LendingErrorCode,
} from "./types.js";
export { LendingError } from "./types.js";
