/**
 * @strata/amm — Types for the constant-product pool engine.
 *
 * Rules:
 * - Pool, swap and farm records are readonly snapshots
 * - Reserves, shares and amounts are unsigned bigints
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

export interface PoolEngineConfig {
  /** Identity allowed to change fee rates and create farms */
  readonly owner: AccountId;

  /** Account that holds every pool's reserves */
  readonly custodian: AccountId;

  readonly clock: BlockClock;
  readonly transfers: AssetTransfer;
  readonly events?: EventSink | undefined;
}

// ─── Pools ───────────────────────────────────────────────────────────────

export interface Pool {
  readonly poolId: number;
  readonly assetA: AssetId;
  readonly assetB: AssetId;
  readonly reserveA: bigint;
  readonly reserveB: bigint;
  readonly totalSupply: bigint;
  /** Basis points of the input amount */
  readonly feeRate: bigint;
  /** reserveA * PRECISION / reserveB at the last create or swap */
  readonly lastPriceA: bigint;
  /** reserveB * PRECISION / reserveA at the last create or swap */
  readonly lastPriceB: bigint;
  readonly createdAt: BlockHeight;
  readonly active: boolean;
}

export interface LiquidityAdded {
  readonly poolId: number;
  readonly provider: AccountId;
  readonly amountA: bigint;
  readonly amountB: bigint;
  readonly liquidity: bigint;
  readonly balance: bigint;
}

export interface LiquidityRemoved {
  readonly poolId: number;
  readonly provider: AccountId;
  readonly liquidity: bigint;
  readonly amountA: bigint;
  readonly amountB: bigint;
  readonly balance: bigint;
}

// ─── Swaps ───────────────────────────────────────────────────────────────

export interface SwapQuote {
  readonly amountOut: bigint;
  /** Bookkeeping fee; it stays in the reserves */
  readonly fee: bigint;
  /** amountOut in basis points of the pre-swap output reserve */
  readonly priceImpact: bigint;
}

export interface SwapRecord extends SwapQuote {
  readonly swapId: number;
  readonly poolId: number;
  readonly trader: AccountId;
  readonly assetIn: AssetId;
  readonly assetOut: AssetId;
  readonly amountIn: bigint;
  readonly blockHeight: BlockHeight;
}

// ─── Farming ─────────────────────────────────────────────────────────────

export interface FarmingPool {
  readonly poolId: number;
  readonly rewardPerBlock: bigint;
  readonly startBlock: BlockHeight;
  readonly endBlock: BlockHeight;
  readonly accRewardPerShare: bigint;
  readonly lastRewardBlock: BlockHeight;
  readonly totalStaked: bigint;
}

export interface UserFarmingInfo {
  readonly staked: bigint;
  readonly rewardDebt: bigint;
  readonly pendingRewards: bigint;
}

// ─── Stats ───────────────────────────────────────────────────────────────

export interface AmmStats {
  readonly totalPools: number;
  readonly totalVolume: bigint;
  readonly totalFeesCollected: bigint;
  readonly totalSwaps: number;
}

// ─── Errors ──────────────────────────────────────────────────────────────

export type AmmErrorCode =
  | "UNAUTHORIZED"
  | "INVALID_AMOUNT"
  | "INSUFFICIENT_FUNDS"
  | "POOL_NOT_FOUND"
  | "POOL_INACTIVE"
  | "INVALID_ASSET"
  | "SLIPPAGE_EXCEEDED"
  | "INSUFFICIENT_LIQUIDITY"
  | "ALREADY_EXISTS"
  | "TRANSFER_FAILED";

/**
 * Structured error from the pool engine.
 */
export class AmmError extends Error {
  public readonly code: AmmErrorCode;

  constructor(code: AmmErrorCode, message: string) {
    super(message);
    this.name = "AmmError";
    this.code = code;
  }
}
