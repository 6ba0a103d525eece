/**
 * @strata/lending — Collateralized lending ledger.
 *
 * Accounts deposit the settlement asset into a shared pool, borrow against
 * posted collateral, accrue per-block interest, repay partially or fully,
 * and can be liquidated by anyone once under-collateralized.
 *
 * Every operation follows the same shape:
 * 1. Validate against current state (throw LendingError, nothing written)
 * 2. Compute the new state in closed form
 * 3. Settle all transfer legs as one atomic batch
 * 4. Commit the new state
 * 5. Emit one domain event
 *
 * API surface:
 * - deposit() / withdraw()
 * - borrow() / repay() / liquidate()
 * - setOraclePrice() — owner only
 * - read-only queries: balances, loans, health, stats, utilization
 */

import type {
  AccountId,
  AssetId,
  AssetTransfer,
  BlockClock,
  BlockHeight,
  EventSink,
  TransferLeg,
} from "@strata/types";
import { AmountMap, ratioPercent } from "@strata/math";
import { createDomainEvent } from "@strata/event-store";
import type { EventFields } from "@strata/event-store";
import {
  DEFAULT_INTEREST_RATE_PER_BLOCK,
  LENDING_STREAM,
  MAX_LOAN_AMOUNT,
  MIN_COLLATERAL_RATIO,
} from "./constants.js";
import { interestSinceUpdate, loanHealth } from "./interest.js";
import type {
  AccountPosition,
  BalanceChange,
  LendingLedgerConfig,
  LendingStats,
  LiquidationResult,
  Loan,
  OraclePrice,
  RepayResult,
} from "./types.js";
import { LendingError } from "./types.js";

type LendingStat = "totalDeposited" | "totalBorrowed";

export class LendingLedger {
  private readonly _owner: AccountId;
  private readonly _custodian: AccountId;
  private readonly _asset: AssetId;
  private readonly _clock: BlockClock;
  private readonly _transfers: AssetTransfer;
  private readonly _events: EventSink | undefined;
  private readonly _interestRate: bigint;

  private readonly _deposits = new AmountMap<AccountId>();
  private readonly _borrowed = new AmountMap<AccountId>();
  private readonly _collateral = new AmountMap<AccountId>();
  private readonly _stats = new AmountMap<LendingStat>();
  private readonly _loans = new Map<number, Loan>();
  private readonly _oracle = new Map<AssetId, OraclePrice>();
  private _nextLoanId = 1;

  constructor(config: LendingLedgerConfig) {
    const rate = config.interestRatePerBlock ?? DEFAULT_INTEREST_RATE_PER_BLOCK;
    if (rate < 0n) {
      throw new LendingError(
        "INVALID_AMOUNT",
        `Interest rate must be non-negative, got ${rate.toString()}`,
      );
    }

    this._owner = config.owner;
    this._custodian = config.custodian;
    this._asset = config.asset;
    this._clock = config.clock;
    this._transfers = config.transfers;
    this._events = config.events;
    this._interestRate = rate;
  }

  // ─── Deposit / Withdraw ──────────────────────────────────────────────

  /**
   * Move `amount` from the caller into the pool and credit their deposit.
   */
  deposit(caller: AccountId, amount: bigint): BalanceChange {
    assertPositive(amount, "Deposit amount");
    const height = this._clock.currentHeight();

    this._settle([this._leg(amount, caller, this._custodian)]);

    const balance = this._deposits.credit(caller, amount);
    this._stats.credit("totalDeposited", amount);

    this._emit("lending.deposited", caller, height, { amount, balance });
    return { account: caller, amount, balance };
  }

  /**
   * Return `amount` of the caller's deposit from the pool.
   */
  withdraw(caller: AccountId, amount: bigint): BalanceChange {
    assertPositive(amount, "Withdrawal amount");

    const deposited = this._deposits.get(caller);
    if (amount > deposited) {
      throw new LendingError(
        "INSUFFICIENT_BALANCE",
        `Cannot withdraw ${amount.toString()}: deposit balance is ${deposited.toString()}`,
      );
    }
    const height = this._clock.currentHeight();

    this._settle([this._leg(amount, this._custodian, caller)]);

    const balance = this._deposits.debit(caller, amount);
    this._stats.debit("totalDeposited", amount);

    this._emit("lending.withdrawn", caller, height, { amount, balance });
    return { account: caller, amount, balance };
  }

  // ─── Borrow ──────────────────────────────────────────────────────────

  /**
   * Open a loan of `amount` secured by `collateralAmount`.
   *
   * The collateral ratio is checked on the caller's aggregate position
   * (all loans plus this one), so collateral already posted counts.
   */
  borrow(caller: AccountId, amount: bigint, collateralAmount: bigint): Loan {
    assertPositive(amount, "Loan amount");
    assertPositive(collateralAmount, "Collateral amount");
    if (amount > MAX_LOAN_AMOUNT) {
      throw new LendingError(
        "INVALID_AMOUNT",
        `Loan amount ${amount.toString()} exceeds the maximum of ${MAX_LOAN_AMOUNT.toString()}`,
      );
    }

    const borrowed = this._borrowed.get(caller) + amount;
    const collateral = this._collateral.get(caller) + collateralAmount;
    const ratio = ratioPercent(collateral, borrowed);
    if (ratio < MIN_COLLATERAL_RATIO) {
      throw new LendingError(
        "INVALID_COLLATERAL_RATIO",
        `Collateral ratio ${ratio.toString()}% is below the minimum of ${MIN_COLLATERAL_RATIO.toString()}%`,
      );
    }

    const height = this._clock.currentHeight();
    const loan: Loan = {
      loanId: this._nextLoanId,
      borrower: caller,
      principal: amount,
      collateral: collateralAmount,
      interestRate: this._interestRate,
      startBlock: height,
      lastUpdateBlock: height,
    };

    this._settle([
      this._leg(collateralAmount, caller, this._custodian),
      this._leg(amount, this._custodian, caller),
    ]);

    this._borrowed.set(caller, borrowed);
    this._collateral.set(caller, collateral);
    this._loans.set(loan.loanId, loan);
    this._nextLoanId += 1;
    this._stats.credit("totalBorrowed", amount);

    this._emit("lending.borrowed", caller, height, {
      loanId: loan.loanId,
      amount,
      collateral: collateralAmount,
      interestRate: loan.interestRate,
    });
    return loan;
  }

  // ─── Repay ───────────────────────────────────────────────────────────

  /**
   * Repay part or all of a loan.
   *
   * Interest accrues from the loan's last update. Paying the full amount
   * owed closes the loan and reduces the caller's aggregate borrowed balance
   * by the loan's stored principal. A partial payment only rewrites the
   * loan's principal to the remaining debt; aggregate balances are left as
   * they are.
   */
  repay(caller: AccountId, loanId: number, amount: bigint): RepayResult {
    const loan = this._requireLoan(loanId);
    if (loan.borrower !== caller) {
      throw new LendingError(
        "UNAUTHORIZED",
        `Loan ${loanId} belongs to ${loan.borrower}, not ${caller}`,
      );
    }

    const height = this._clock.currentHeight();
    const interest = interestSinceUpdate(loan, height);
    const totalOwed = loan.principal + interest;
    if (amount <= 0n || amount > totalOwed) {
      throw new LendingError(
        "INVALID_AMOUNT",
        `Repayment must be between 1 and ${totalOwed.toString()}, got ${amount.toString()}`,
      );
    }

    const fullyRepaid = amount >= totalOwed;
    if (fullyRepaid) {
      this._assertCovers(this._borrowed.get(caller), loan.principal, `Borrowed balance of ${caller}`);
      this._assertCovers(this._stats.get("totalBorrowed"), loan.principal, "Total borrowed");
    }

    this._settle([this._leg(amount, caller, this._custodian)]);

    let remaining: Loan | undefined;
    if (fullyRepaid) {
      this._loans.delete(loanId);
      this._borrowed.debit(caller, loan.principal);
      this._stats.debit("totalBorrowed", loan.principal);
    } else {
      remaining = {
        ...loan,
        principal: totalOwed - amount,
        lastUpdateBlock: height,
      };
      this._loans.set(loanId, remaining);
    }

    this._emit("lending.repaid", caller, height, {
      loanId,
      amount,
      interest,
      totalOwed,
      fullyRepaid,
    });
    return { loanId, amount, interest, totalOwed, fullyRepaid, loan: remaining };
  }

  // ─── Liquidation ─────────────────────────────────────────────────────

  /**
   * Liquidate an unhealthy loan. Any caller may do so and receives the
   * loan's full collateral.
   *
   * Interest for the health check accrues from origination.
   */
  liquidate(caller: AccountId, loanId: number): LiquidationResult {
    const loan = this._requireLoan(loanId);
    const height = this._clock.currentHeight();
    const health = loanHealth(loan, height);

    if (health.healthy) {
      throw new LendingError(
        "INVALID_COLLATERAL_RATIO",
        `Loan ${loanId} is healthy: collateral ratio ${health.collateralRatio.toString()}% is at least ${MIN_COLLATERAL_RATIO.toString()}%`,
      );
    }

    const borrower = loan.borrower;
    this._assertCovers(this._collateral.get(borrower), loan.collateral, `Collateral balance of ${borrower}`);
    this._assertCovers(this._borrowed.get(borrower), loan.principal, `Borrowed balance of ${borrower}`);
    this._assertCovers(this._stats.get("totalBorrowed"), loan.principal, "Total borrowed");

    this._settle([this._leg(loan.collateral, this._custodian, caller)]);

    this._loans.delete(loanId);
    this._collateral.debit(borrower, loan.collateral);
    this._borrowed.debit(borrower, loan.principal);
    this._stats.debit("totalBorrowed", loan.principal);

    const result: LiquidationResult = {
      loanId,
      borrower,
      liquidator: caller,
      collateralSeized: loan.collateral,
      principal: loan.principal,
      interest: health.interest,
      collateralRatio: health.collateralRatio,
    };

    this._emit("lending.liquidated", caller, height, {
      loanId,
      borrower,
      collateralSeized: loan.collateral,
      principal: loan.principal,
      interest: health.interest,
      collateralRatio: health.collateralRatio,
    });
    return result;
  }

  // ─── Oracle ──────────────────────────────────────────────────────────

  /**
   * Record a price for an asset. Owner only. No lending transition reads it.
   */
  setOraclePrice(caller: AccountId, asset: AssetId, price: bigint): OraclePrice {
    if (caller !== this._owner) {
      throw new LendingError("UNAUTHORIZED", `Only the owner may update oracle prices`);
    }
    assertPositive(price, "Oracle price");

    const height = this._clock.currentHeight();
    const record: OraclePrice = { asset, price, updatedAt: height };
    this._oracle.set(asset, record);

    this._emit("lending.oracle-updated", caller, height, { asset, price });
    return record;
  }

  getOraclePrice(asset: AssetId): OraclePrice | undefined {
    return this._oracle.get(asset);
  }

  // ─── Queries ─────────────────────────────────────────────────────────

  getDepositBalance(account: AccountId): bigint {
    return this._deposits.get(account);
  }

  getBorrowedBalance(account: AccountId): bigint {
    return this._borrowed.get(account);
  }

  getCollateralBalance(account: AccountId): bigint {
    return this._collateral.get(account);
  }

  getPosition(account: AccountId): AccountPosition {
    return {
      account,
      deposited: this._deposits.get(account),
      borrowed: this._borrowed.get(account),
      collateral: this._collateral.get(account),
    };
  }

  getLoan(loanId: number): Loan | undefined {
    return this._loans.get(loanId);
  }

  getLoansByBorrower(account: AccountId): readonly Loan[] {
    return [...this._loans.values()]
      .filter((loan) => loan.borrower === account)
      .sort((a, b) => a.loanId - b.loanId);
  }

  /**
   * Interest a repayment would owe right now.
   */
  getInterestOwed(loanId: number): bigint {
    return interestSinceUpdate(this._requireLoan(loanId), this._clock.currentHeight());
  }

  /**
   * Principal plus repayment-basis interest.
   */
  getTotalOwed(loanId: number): bigint {
    const loan = this._requireLoan(loanId);
    return loan.principal + interestSinceUpdate(loan, this._clock.currentHeight());
  }

  /**
   * Whether a loan is at or above the minimum collateral ratio
   * (origination-basis interest). Absent loans are not healthy.
   */
  isHealthy(loanId: number): boolean {
    const loan = this._loans.get(loanId);
    if (loan === undefined) {
      return false;
    }
    return loanHealth(loan, this._clock.currentHeight()).healthy;
  }

  getProtocolStats(): LendingStats {
    return {
      totalDeposited: this._stats.get("totalDeposited"),
      totalBorrowed: this._stats.get("totalBorrowed"),
      nextLoanId: this._nextLoanId,
      activeLoans: this._loans.size,
    };
  }

  /**
   * Borrowed share of deposits, in percent. Zero when nothing is deposited.
   */
  getUtilizationRate(): bigint {
    const deposited = this._stats.get("totalDeposited");
    if (deposited === 0n) {
      return 0n;
    }
    return ratioPercent(this._stats.get("totalBorrowed"), deposited);
  }

  // ─── Internal ────────────────────────────────────────────────────────

  private _requireLoan(loanId: number): Loan {
    const loan = this._loans.get(loanId);
    if (loan === undefined) {
      throw new LendingError("LOAN_NOT_FOUND", `Loan ${loanId} not found`);
    }
    return loan;
  }

  private _assertCovers(balance: bigint, amount: bigint, label: string): void {
    if (balance < amount) {
      throw new LendingError(
        "INSUFFICIENT_BALANCE",
        `${label} is ${balance.toString()}, cannot reduce it by ${amount.toString()}`,
      );
    }
  }

  private _leg(amount: bigint, from: AccountId, to: AccountId): TransferLeg {
    return { asset: this._asset, amount, from, to };
  }

  private _settle(legs: readonly TransferLeg[]): void {
    const outcome = this._transfers.transfer(legs);
    if (!outcome.ok) {
      throw new LendingError("TRANSFER_FAILED", `Transfer failed: ${outcome.reason}`);
    }
  }

  private _emit(type: string, actor: AccountId, height: BlockHeight, fields: EventFields): void {
    this._events?.append(LENDING_STREAM, [
      createDomainEvent({
        type,
        source: "lending",
        actor,
        payload: { ...fields, blockHeight: height },
      }),
    ]);
  }
}

function assertPositive(amount: bigint, label: string): void {
  if (amount <= 0n) {
    throw new LendingError(
      "INVALID_AMOUNT",
      `${label} must be positive, got ${amount.toString()}`,
    );
  }
}
