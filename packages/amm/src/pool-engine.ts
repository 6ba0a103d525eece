/**
 * @strata/amm — Constant-product pool engine.
 *
 * Accounts create paired-asset pools, add and remove liquidity against
 * minted shares, and swap one asset for the other subject to a fee and a
 * minimum-output guard. The owner may tune fee rates and register
 * farming pools.
 *
 * Every mutating operation validates first, settles all its transfer legs
 * as one batch, then commits and emits one event.
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
import { AmountMap } from "@strata/math";
import { createDomainEvent } from "@strata/event-store";
import type { EventFields } from "@strata/event-store";
import { BoundedList } from "./bounded-list.js";
import {
  AMM_STREAM,
  DEFAULT_FEE_RATE,
  MAX_FEE_RATE,
  MAX_POOLS_PER_USER,
  MIN_LIQUIDITY,
} from "./constants.js";
import {
  initialLiquidity,
  mintedLiquidity,
  quoteSwap,
  redeemedAmount,
  spotPrices,
} from "./pricing.js";
import type {
  AmmStats,
  FarmingPool,
  LiquidityAdded,
  LiquidityRemoved,
  Pool,
  PoolEngineConfig,
  SwapQuote,
  SwapRecord,
  UserFarmingInfo,
} from "./types.js";
import { AmmError } from "./types.js";

type AmmStat = "totalVolume" | "totalFeesCollected";

interface SwapSide {
  readonly assetOut: AssetId;
  readonly reserveIn: bigint;
  readonly reserveOut: bigint;
  readonly aToB: boolean;
}

const EMPTY_FARMING_INFO: UserFarmingInfo = {
  staked: 0n,
  rewardDebt: 0n,
  pendingRewards: 0n,
};

export class PoolEngine {
  private readonly _owner: AccountId;
  private readonly _custodian: AccountId;
  private readonly _clock: BlockClock;
  private readonly _transfers: AssetTransfer;
  private readonly _events: EventSink | undefined;

  private readonly _pools = new Map<number, Pool>();
  /** Keyed by `${poolId}:${provider}` */
  private readonly _shares = new AmountMap<string>();
  private readonly _userPools = new Map<AccountId, BoundedList<number>>();
  private readonly _swaps = new Map<number, SwapRecord>();
  private readonly _farms = new Map<number, FarmingPool>();
  private readonly _farmUsers = new Map<string, UserFarmingInfo>();
  private readonly _stats = new AmountMap<AmmStat>();
  private _totalPools = 0;
  private _totalSwaps = 0;

  constructor(config: PoolEngineConfig) {
    this._owner = config.owner;
    this._custodian = config.custodian;
    this._clock = config.clock;
    this._transfers = config.transfers;
    this._events = config.events;
  }

  // ─── Pool Creation ───────────────────────────────────────────────────

  /**
   * Create a pool seeded with `amountA` and `amountB`. The creator receives
   * isqrt(amountA * amountB) shares.
   */
  createPool(
    caller: AccountId,
    assetA: AssetId,
    assetB: AssetId,
    amountA: bigint,
    amountB: bigint,
  ): Pool {
    assertPositive(amountA, "Initial amount A");
    assertPositive(amountB, "Initial amount B");
    if (assetA === assetB) {
      throw new AmmError("INVALID_ASSET", `Pool assets must differ, got ${assetA} twice`);
    }

    const liquidity = initialLiquidity(amountA, amountB);
    if (liquidity < MIN_LIQUIDITY) {
      throw new AmmError(
        "INSUFFICIENT_LIQUIDITY",
        `Initial liquidity ${liquidity.toString()} is below the minimum of ${MIN_LIQUIDITY.toString()}`,
      );
    }

    const memberships = this._membershipsOf(caller);
    if (memberships.isFull()) {
      throw poolLimitError(memberships.capacity);
    }

    const height = this._clock.currentHeight();
    const { priceA, priceB } = spotPrices(amountA, amountB);
    const pool: Pool = {
      poolId: this._totalPools + 1,
      assetA,
      assetB,
      reserveA: amountA,
      reserveB: amountB,
      totalSupply: liquidity,
      feeRate: DEFAULT_FEE_RATE,
      lastPriceA: priceA,
      lastPriceB: priceB,
      createdAt: height,
      active: true,
    };

    this._settle([
      { asset: assetA, amount: amountA, from: caller, to: this._custodian },
      { asset: assetB, amount: amountB, from: caller, to: this._custodian },
    ]);

    this._pools.set(pool.poolId, pool);
    this._shares.set(shareKey(pool.poolId, caller), liquidity);
    memberships.append(pool.poolId);
    this._userPools.set(caller, memberships);
    this._totalPools = pool.poolId;

    this._emit("amm.pool-created", caller, height, {
      poolId: pool.poolId,
      assetA,
      assetB,
      amountA,
      amountB,
      liquidity,
    });
    return pool;
  }

  // ─── Liquidity ───────────────────────────────────────────────────────

  /**
   * Deposit both assets and mint the smaller of the two proportional share
   * amounts. The deposit need not match the current reserve ratio.
   */
  addLiquidity(
    caller: AccountId,
    poolId: number,
    amountA: bigint,
    amountB: bigint,
    minLiquidity: bigint,
  ): LiquidityAdded {
    const pool = this._requireActivePool(poolId);
    assertPositive(amountA, "Amount A");
    assertPositive(amountB, "Amount B");
    if (pool.totalSupply === 0n) {
      throw new AmmError("INSUFFICIENT_LIQUIDITY", `Pool ${poolId} has no liquidity`);
    }

    const liquidity = mintedLiquidity(
      amountA,
      amountB,
      pool.reserveA,
      pool.reserveB,
      pool.totalSupply,
    );
    if (liquidity === 0n) {
      throw new AmmError("INVALID_AMOUNT", "Deposit is too small to mint any shares");
    }
    if (liquidity < minLiquidity) {
      throw new AmmError(
        "SLIPPAGE_EXCEEDED",
        `Would mint ${liquidity.toString()} shares, below the minimum of ${minLiquidity.toString()}`,
      );
    }

    const height = this._clock.currentHeight();
    this._settle([
      { asset: pool.assetA, amount: amountA, from: caller, to: this._custodian },
      { asset: pool.assetB, amount: amountB, from: caller, to: this._custodian },
    ]);

    this._pools.set(poolId, {
      ...pool,
      reserveA: pool.reserveA + amountA,
      reserveB: pool.reserveB + amountB,
      totalSupply: pool.totalSupply + liquidity,
    });
    const balance = this._shares.credit(shareKey(poolId, caller), liquidity);

    this._emit("amm.liquidity-added", caller, height, {
      poolId,
      amountA,
      amountB,
      liquidity,
    });
    return { poolId, provider: caller, amountA, amountB, liquidity, balance };
  }

  /**
   * Burn `liquidity` shares for a proportional share of both reserves.
   * Allowed on inactive pools.
   */
  removeLiquidity(
    caller: AccountId,
    poolId: number,
    liquidity: bigint,
    minAmountA: bigint,
    minAmountB: bigint,
  ): LiquidityRemoved {
    assertPositive(liquidity, "Liquidity");
    const pool = this._requirePool(poolId);

    const key = shareKey(poolId, caller);
    const held = this._shares.get(key);
    if (held < liquidity) {
      throw new AmmError(
        "INSUFFICIENT_FUNDS",
        `Cannot burn ${liquidity.toString()} shares: balance is ${held.toString()}`,
      );
    }

    const amountA = redeemedAmount(liquidity, pool.reserveA, pool.totalSupply);
    const amountB = redeemedAmount(liquidity, pool.reserveB, pool.totalSupply);
    if (amountA < minAmountA || amountB < minAmountB) {
      throw new AmmError(
        "SLIPPAGE_EXCEEDED",
        `Would return ${amountA.toString()}/${amountB.toString()}, below the minimum of ${minAmountA.toString()}/${minAmountB.toString()}`,
      );
    }

    const height = this._clock.currentHeight();
    const legs: TransferLeg[] = [];
    if (amountA > 0n) {
      legs.push({ asset: pool.assetA, amount: amountA, from: this._custodian, to: caller });
    }
    if (amountB > 0n) {
      legs.push({ asset: pool.assetB, amount: amountB, from: this._custodian, to: caller });
    }
    this._settle(legs);

    this._pools.set(poolId, {
      ...pool,
      reserveA: pool.reserveA - amountA,
      reserveB: pool.reserveB - amountB,
      totalSupply: pool.totalSupply - liquidity,
    });
    const balance = this._shares.debit(key, liquidity);

    this._emit("amm.liquidity-removed", caller, height, {
      poolId,
      liquidity,
      amountA,
      amountB,
    });
    return { poolId, provider: caller, liquidity, amountA, amountB, balance };
  }

  // ─── Swaps ───────────────────────────────────────────────────────────

  /**
   * Swap `amountIn` of `assetIn` for the pool's other asset.
   */
  swap(
    caller: AccountId,
    poolId: number,
    amountIn: bigint,
    minAmountOut: bigint,
    assetIn: AssetId,
  ): SwapRecord {
    const pool = this._requireActivePool(poolId);
    const { side, quote } = this._quote(pool, amountIn, assetIn);
    if (quote.amountOut < minAmountOut) {
      throw new AmmError(
        "SLIPPAGE_EXCEEDED",
        `Output ${quote.amountOut.toString()} is below the minimum of ${minAmountOut.toString()}`,
      );
    }

    const height = this._clock.currentHeight();
    this._settle([
      { asset: assetIn, amount: amountIn, from: caller, to: this._custodian },
      { asset: side.assetOut, amount: quote.amountOut, from: this._custodian, to: caller },
    ]);

    const reserveA = side.aToB ? pool.reserveA + amountIn : pool.reserveA - quote.amountOut;
    const reserveB = side.aToB ? pool.reserveB - quote.amountOut : pool.reserveB + amountIn;
    const { priceA, priceB } = spotPrices(reserveA, reserveB);
    this._pools.set(poolId, {
      ...pool,
      reserveA,
      reserveB,
      lastPriceA: priceA,
      lastPriceB: priceB,
    });

    const record: SwapRecord = {
      swapId: this._totalSwaps + 1,
      poolId,
      trader: caller,
      assetIn,
      assetOut: side.assetOut,
      amountIn,
      amountOut: quote.amountOut,
      fee: quote.fee,
      priceImpact: quote.priceImpact,
      blockHeight: height,
    };
    this._swaps.set(record.swapId, record);
    this._totalSwaps = record.swapId;
    this._stats.credit("totalVolume", amountIn);
    this._stats.credit("totalFeesCollected", quote.fee);

    this._emit("amm.swapped", caller, height, {
      swapId: record.swapId,
      poolId,
      assetIn,
      assetOut: side.assetOut,
      amountIn,
      amountOut: quote.amountOut,
      fee: quote.fee,
      priceImpact: quote.priceImpact,
    });
    return record;
  }

  /**
   * What `swap` would return right now, without the minimum-output guard.
   */
  getSwapQuote(poolId: number, amountIn: bigint, assetIn: AssetId): SwapQuote {
    return this._quote(this._requireActivePool(poolId), amountIn, assetIn).quote;
  }

  // ─── Owner Operations ────────────────────────────────────────────────

  setPoolFeeRate(caller: AccountId, poolId: number, feeRate: bigint): Pool {
    this._requireOwner(caller, "update fee rates");
    const pool = this._requirePool(poolId);
    if (feeRate < 0n || feeRate > MAX_FEE_RATE) {
      throw new AmmError(
        "INVALID_AMOUNT",
        `Fee rate must be between 0 and ${MAX_FEE_RATE.toString()}, got ${feeRate.toString()}`,
      );
    }

    const height = this._clock.currentHeight();
    const updated: Pool = { ...pool, feeRate };
    this._pools.set(poolId, updated);

    this._emit("amm.fee-updated", caller, height, {
      poolId,
      previousFeeRate: pool.feeRate,
      feeRate,
    });
    return updated;
  }

  /**
   * Register a farming pool for an existing pool. Storage only: no rewards
   * accrue until staking and claiming exist.
   */
  createFarmingPool(
    caller: AccountId,
    poolId: number,
    rewardPerBlock: bigint,
    startBlock: BlockHeight,
    endBlock: BlockHeight,
  ): FarmingPool {
    this._requireOwner(caller, "create farming pools");
    this._requirePool(poolId);
    if (this._farms.has(poolId)) {
      throw new AmmError("ALREADY_EXISTS", `Pool ${poolId} already has a farming pool`);
    }
    assertPositive(rewardPerBlock, "Reward per block");
    if (endBlock <= startBlock) {
      throw new AmmError(
        "INVALID_AMOUNT",
        `End block ${endBlock} must be after start block ${startBlock}`,
      );
    }

    const height = this._clock.currentHeight();
    const farm: FarmingPool = {
      poolId,
      rewardPerBlock,
      startBlock,
      endBlock,
      accRewardPerShare: 0n,
      lastRewardBlock: startBlock,
      totalStaked: 0n,
    };
    this._farms.set(poolId, farm);

    this._emit("amm.farm-created", caller, height, {
      poolId,
      rewardPerBlock,
      startBlock,
      endBlock,
    });
    return farm;
  }

  // ─── Queries ─────────────────────────────────────────────────────────

  getPool(poolId: number): Pool | undefined {
    return this._pools.get(poolId);
  }

  getLiquidityBalance(poolId: number, provider: AccountId): bigint {
    return this._shares.get(shareKey(poolId, provider));
  }

  getUserPools(account: AccountId): readonly number[] {
    return this._userPools.get(account)?.toArray() ?? [];
  }

  getSwap(swapId: number): SwapRecord | undefined {
    return this._swaps.get(swapId);
  }

  getFarmingPool(poolId: number): FarmingPool | undefined {
    return this._farms.get(poolId);
  }

  getUserFarmingInfo(poolId: number, user: AccountId): UserFarmingInfo {
    return this._farmUsers.get(shareKey(poolId, user)) ?? EMPTY_FARMING_INFO;
  }

  getProtocolStats(): AmmStats {
    return {
      totalPools: this._totalPools,
      totalVolume: this._stats.get("totalVolume"),
      totalFeesCollected: this._stats.get("totalFeesCollected"),
      totalSwaps: this._totalSwaps,
    };
  }

  // ─── Internal ────────────────────────────────────────────────────────

  private _quote(
    pool: Pool,
    amountIn: bigint,
    assetIn: AssetId,
  ): { readonly side: SwapSide; readonly quote: SwapQuote } {
    assertPositive(amountIn, "Swap amount");
    const side = swapSide(pool, assetIn);
    const quote = quoteSwap(amountIn, side.reserveIn, side.reserveOut, pool.feeRate);
    if (quote.amountOut === 0n) {
      throw new AmmError(
        "INSUFFICIENT_LIQUIDITY",
        `Swapping ${amountIn.toString()} ${assetIn} in pool ${pool.poolId} returns nothing`,
      );
    }
    return { side, quote };
  }

  private _membershipsOf(account: AccountId): BoundedList<number> {
    return this._userPools.get(account) ?? new BoundedList<number>(MAX_POOLS_PER_USER, poolLimitError);
  }

  private _requirePool(poolId: number): Pool {
    const pool = this._pools.get(poolId);
    if (pool === undefined) {
      throw new AmmError("POOL_NOT_FOUND", `Pool ${poolId} not found`);
    }
    return pool;
  }

  private _requireActivePool(poolId: number): Pool {
    const pool = this._requirePool(poolId);
    if (!pool.active) {
      throw new AmmError("POOL_INACTIVE", `Pool ${poolId} is inactive`);
    }
    return pool;
  }

  private _requireOwner(caller: AccountId, action: string): void {
    if (caller !== this._owner) {
      throw new AmmError("UNAUTHORIZED", `Only the owner may ${action}`);
    }
  }

  private _settle(legs: readonly TransferLeg[]): void {
    if (legs.length === 0) {
      return;
    }
    const outcome = this._transfers.transfer(legs);
    if (!outcome.ok) {
      throw new AmmError("TRANSFER_FAILED", `Transfer failed: ${outcome.reason}`);
    }
  }

  private _emit(type: string, actor: AccountId, height: BlockHeight, fields: EventFields): void {
    this._events?.append(AMM_STREAM, [
      createDomainEvent({
        type,
        source: "amm",
        actor,
        payload: { ...fields, blockHeight: height },
      }),
    ]);
  }
}

function swapSide(pool: Pool, assetIn: AssetId): SwapSide {
  if (assetIn === pool.assetA) {
    return { assetOut: pool.assetB, reserveIn: pool.reserveA, reserveOut: pool.reserveB, aToB: true };
  }
  if (assetIn === pool.assetB) {
    return { assetOut: pool.assetA, reserveIn: pool.reserveB, reserveOut: pool.reserveA, aToB: false };
  }
  throw new AmmError(
    "INVALID_ASSET",
    `Asset ${assetIn} is not part of pool ${pool.poolId} (${pool.assetA}/${pool.assetB})`,
  );
}

function shareKey(poolId: number, account: AccountId): string {
  return `${poolId}:${account}`;
}

function poolLimitError(capacity: number): AmmError {
  return new AmmError("INVALID_AMOUNT", `Cannot create more than ${capacity} pools per account`);
}

function assertPositive(amount: bigint, label: string): void {
  if (amount <= 0n) {
    throw new AmmError("INVALID_AMOUNT", `${label} must be positive, got ${amount.toString()}`);
  }
}
