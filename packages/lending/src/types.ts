/**
 * @strata/lending — Types for the collateralized lending ledger.
 *
 * Rules:
 * - All records are readonly snapshots; the ledger replaces, never mutates
 * - Amounts are unsigned bigints
 * - Fail-closed: invalid operations throw before any transfer or write
 */

import type {
  AccountId,
  AssetId,
  AssetTransfer,
  BlockClock,
  BlockHeight,
  EventSink,
} from "@strata/types";

// ─── Configuration ───────────────────────────────────────────────────────

export interface LendingLedgerConfig {
  /** Deployment owner; the only identity allowed to write oracle prices */
  readonly owner: AccountId;
  /** Account holding pooled deposits and posted collateral */
  readonly custodian: AccountId;
  /** The settlement asset every balance is denominated in */
  readonly asset: AssetId;
  readonly clock: BlockClock;
  readonly transfers: AssetTransfer;
  readonly events?: EventSink | undefined;
  /** Basis points of principal per block. Defaults to 5. */
  readonly interestRatePerBlock?: bigint | undefined;
}

// ─── Records ─────────────────────────────────────────────────────────────

export interface Loan {
  readonly loanId: number;
  readonly borrower: AccountId;
  /** Outstanding principal; replaced by the remaining debt on partial repayment */
  readonly principal: bigint;
  readonly collateral: bigint;
  /** Basis points of principal per block, fixed at origination */
  readonly interestRate: bigint;
  readonly startBlock: BlockHeight;
  readonly lastUpdateBlock: BlockHeight;
}

export interface AccountPosition {
  readonly account: AccountId;
  readonly deposited: bigint;
  readonly borrowed: bigint;
  readonly collateral: bigint;
}

export interface OraclePrice {
  readonly asset: AssetId;
  readonly price: bigint;
  readonly updatedAt: BlockHeight;
}

export interface LendingStats {
  readonly totalDeposited: bigint;
  readonly totalBorrowed: bigint;
  /** Identifier the next loan will receive */
  readonly nextLoanId: number;
  readonly activeLoans: number;
}

// ─── Results ─────────────────────────────────────────────────────────────

export interface BalanceChange {
  readonly account: AccountId;
  readonly amount: bigint;
  /** The account's deposit balance after the change */
  readonly balance: bigint;
}

export interface RepayResult {
  readonly loanId: number;
  readonly amount: bigint;
  readonly interest: bigint;
  readonly totalOwed: bigint;
  readonly fullyRepaid: boolean;
  /** The loan after a partial repayment; undefined once fully repaid */
  readonly loan: Loan | undefined;
}

export interface LiquidationResult {
  readonly loanId: number;
  readonly borrower: AccountId;
  readonly liquidator: AccountId;
  readonly collateralSeized: bigint;
  readonly principal: bigint;
  readonly interest: bigint;
  readonly collateralRatio: bigint;
}

// ─── Errors ──────────────────────────────────────────────────────────────

export type LendingErrorCode =
  | "UNAUTHORIZED"
  | "INVALID_AMOUNT"
  | "INSUFFICIENT_BALANCE"
  | "LOAN_NOT_FOUND"
  | "INVALID_COLLATERAL_RATIO"
  | "TRANSFER_FAILED";

/**
 * Structured error from the lending ledger.
 * Always thrown before any transfer or state write.
 */
export class LendingError extends Error {
  public readonly code: LendingErrorCode;

  constructor(code: LendingErrorCode, message: string) {
    super(message);
    this.name = "LendingError";
    this.code = code;
  }
}
