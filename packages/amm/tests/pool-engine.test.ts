/**
 * Tests for the PoolEngine.
 *
 * Covers:
 * - Pool creation, seeding and the per-account pool cap
 * - Adding and removing liquidity with minimum-output guards
 * - Swaps in both directions, quotes and the swap history
 * - Owner-gated fee updates and farming pools
 * - Fail-closed behaviour when a transfer is refused
 */

import { describe, it, expect, beforeEach } from "vitest";
import { AmmError } from "../src/types.js";
import type { AmmErrorCode } from "../src/types.js";
import { MAX_POOLS_PER_USER } from "../src/constants.js";
import { CUSTODIAN, FUNDING, OWNER, createAmmFixture } from "./fixtures.js";
import type { AmmFixture } from "./fixtures.js";

function expectAmmError(fn: () => unknown, code: AmmErrorCode): void {
  let caught: unknown;
  try {
    fn();
  } catch (e) {
    caught = e;
  }
  expect(caught).toBeInstanceOf(AmmError);
  expect(caught instanceof AmmError ? caught.code : undefined).toBe(code);
}

describe("PoolEngine", () => {
  let f: AmmFixture;

  beforeEach(() => {
    f = createAmmFixture();
  });

  // ─── Pool Creation ───────────────────────────────────────────────────

  describe("createPool", () => {
    it("seeds a balanced pool", () => {
      f.clock.height = 4;
      const pool = f.engine.createPool("alice", "A", "B", 1_000_000n, 1_000_000n);

      expect(pool).toEqual({
        poolId: 1,
        assetA: "A",
        assetB: "B",
        reserveA: 1_000_000n,
        reserveB: 1_000_000n,
        totalSupply: 1_000_000n,
        feeRate: 30n,
        lastPriceA: 1_000_000n,
        lastPriceB: 1_000_000n,
        createdAt: 4,
        active: true,
      });
      expect(f.engine.getPool(1)).toEqual(pool);
      expect(f.engine.getLiquidityBalance(1, "alice")).toBe(1_000_000n);
      expect(f.engine.getUserPools("alice")).toEqual([1]);
      expect(f.engine.getProtocolStats().totalPools).toBe(1);
      expect(f.custody.balanceOf(CUSTODIAN, "A")).toBe(1_000_000n);
      expect(f.custody.balanceOf("alice", "B")).toBe(FUNDING - 1_000_000n);
    });

    it("prices an unbalanced pool", () => {
      const pool = f.engine.createPool("alice", "A", "B", 4_000_000n, 1_000_000n);
      expect(pool.totalSupply).toBe(2_000_000n);
      expect(pool.lastPriceA).toBe(4_000_000n);
      expect(pool.lastPriceB).toBe(250_000n);
    });

    it("numbers pools from 1", () => {
      f.engine.createPool("alice", "A", "B", 1000n, 1000n);
      expect(f.engine.createPool("bob", "B", "A", 1000n, 1000n).poolId).toBe(2);
      expect(f.engine.getUserPools("bob")).toEqual([2]);
    });

    it("rejects identical assets and non-positive amounts", () => {
      expectAmmError(() => f.engine.createPool("alice", "A", "A", 1000n, 1000n), "INVALID_ASSET");
      expectAmmError(() => f.engine.createPool("alice", "A", "B", 0n, 1000n), "INVALID_AMOUNT");
      expectAmmError(() => f.engine.createPool("alice", "A", "B", 1000n, -1n), "INVALID_AMOUNT");
    });

    it("requires a seed of at least 1000 shares", () => {
      // isqrt(999000) = 999
      expectAmmError(
        () => f.engine.createPool("alice", "A", "B", 999n, 1000n),
        "INSUFFICIENT_LIQUIDITY",
      );
      expect(f.engine.createPool("alice", "A", "B", 1000n, 1000n).totalSupply).toBe(1000n);
    });

    it("caps an account at 20 pools", () => {
      for (let i = 0; i < MAX_POOLS_PER_USER; i++) {
        f.engine.createPool("alice", "A", "B", 1000n, 1000n);
      }

      expectAmmError(() => f.engine.createPool("alice", "A", "B", 1000n, 1000n), "INVALID_AMOUNT");
      expect(f.engine.getUserPools("alice")).toHaveLength(20);
      expect(f.engine.getProtocolStats().totalPools).toBe(20);
      expect(f.custody.balanceOf("alice", "A")).toBe(FUNDING - 20_000n);
    });

    it("writes nothing when the seed cannot be transferred", () => {
      expectAmmError(
        () => f.engine.createPool("carol", "A", "B", 1000n, 1000n),
        "TRANSFER_FAILED",
      );
      expect(f.engine.getPool(1)).toBeUndefined();
      expect(f.engine.getUserPools("carol")).toEqual([]);
      expect(f.engine.getProtocolStats().totalPools).toBe(0);
      expect(f.events.globalPosition()).toBe(0);
    });

    it("emits a pool-created event", () => {
      f.engine.createPool("alice", "A", "B", 1_000_000n, 1_000_000n);

      const [stored] = f.events.read("amm");
      expect(stored?.event.type).toBe("amm.pool-created");
      expect(stored?.event.metadata.source).toBe("amm");
      expect(stored?.event.payload).toEqual({
        poolId: 1,
        assetA: "A",
        assetB: "B",
        amountA: "1000000",
        amountB: "1000000",
        liquidity: "1000000",
        blockHeight: 0,
      });
    });
  });

  // ─── Liquidity ───────────────────────────────────────────────────────

  describe("addLiquidity", () => {
    beforeEach(() => {
      f.engine.createPool("alice", "A", "B", 1_000_000n, 1_000_000n);
    });

    it("mints the smaller proportional share for an uneven deposit", () => {
      const result = f.engine.addLiquidity("bob", 1, 1000n, 2000n, 0n);

      expect(result).toEqual({
        poolId: 1,
        provider: "bob",
        amountA: 1000n,
        amountB: 2000n,
        liquidity: 1000n,
        balance: 1000n,
      });
      const pool = f.engine.getPool(1);
      expect(pool?.reserveA).toBe(1_001_000n);
      expect(pool?.reserveB).toBe(1_002_000n);
      expect(pool?.totalSupply).toBe(1_001_000n);
      // liquidity changes leave the recorded prices alone
      expect(pool?.lastPriceA).toBe(1_000_000n);
      expect(pool?.lastPriceB).toBe(1_000_000n);
    });

    it("enforces the minimum share guard", () => {
      expectAmmError(() => f.engine.addLiquidity("bob", 1, 1000n, 2000n, 1001n), "SLIPPAGE_EXCEEDED");
      expect(f.engine.getLiquidityBalance(1, "bob")).toBe(0n);
    });

    it("rejects a deposit too small to mint", () => {
      f.engine.createPool("alice", "A", "B", 4_000_000n, 1_000_000n);
      // min(1 * 2e6 / 4e6, 1 * 2e6 / 1e6) = 0
      expectAmmError(() => f.engine.addLiquidity("bob", 2, 1n, 1n, 0n), "INVALID_AMOUNT");
    });

    it("rejects unknown pools and non-positive amounts", () => {
      expectAmmError(() => f.engine.addLiquidity("bob", 99, 1000n, 1000n, 0n), "POOL_NOT_FOUND");
      expectAmmError(() => f.engine.addLiquidity("bob", 1, 0n, 1000n, 0n), "INVALID_AMOUNT");
    });

    it("refuses a drained pool", () => {
      f.engine.removeLiquidity("alice", 1, 1_000_000n, 0n, 0n);
      expectAmmError(() => f.engine.addLiquidity("bob", 1, 1000n, 1000n, 0n), "INSUFFICIENT_LIQUIDITY");
    });
  });

  describe("removeLiquidity", () => {
    beforeEach(() => {
      f.engine.createPool("alice", "A", "B", 1_000_000n, 1_000_000n);
    });

    it("returns a proportional share of both reserves", () => {
      const result = f.engine.removeLiquidity("alice", 1, 500_000n, 0n, 0n);

      expect(result).toEqual({
        poolId: 1,
        provider: "alice",
        liquidity: 500_000n,
        amountA: 500_000n,
        amountB: 500_000n,
        balance: 500_000n,
      });
      expect(f.engine.getPool(1)?.totalSupply).toBe(500_000n);
      expect(f.custody.balanceOf("alice", "A")).toBe(FUNDING - 500_000n);
      expect(f.custody.balanceOf(CUSTODIAN, "B")).toBe(500_000n);
    });

    it("enforces both minimum outputs", () => {
      expectAmmError(
        () => f.engine.removeLiquidity("alice", 1, 500_000n, 500_001n, 0n),
        "SLIPPAGE_EXCEEDED",
      );
      expectAmmError(
        () => f.engine.removeLiquidity("alice", 1, 500_000n, 0n, 500_001n),
        "SLIPPAGE_EXCEEDED",
      );
      expect(f.engine.getLiquidityBalance(1, "alice")).toBe(1_000_000n);
    });

    it("rejects burning more shares than held", () => {
      expectAmmError(() => f.engine.removeLiquidity("bob", 1, 1n, 0n, 0n), "INSUFFICIENT_FUNDS");
      expectAmmError(
        () => f.engine.removeLiquidity("alice", 1, 1_000_001n, 0n, 0n),
        "INSUFFICIENT_FUNDS",
      );
    });

    it("rejects zero shares and unknown pools", () => {
      expectAmmError(() => f.engine.removeLiquidity("alice", 1, 0n, 0n, 0n), "INVALID_AMOUNT");
      expectAmmError(() => f.engine.removeLiquidity("alice", 7, 1n, 0n, 0n), "POOL_NOT_FOUND");
    });

    it("can drain a pool completely", () => {
      f.engine.removeLiquidity("alice", 1, 1_000_000n, 0n, 0n);
      const pool = f.engine.getPool(1);
      expect(pool?.reserveA).toBe(0n);
      expect(pool?.reserveB).toBe(0n);
      expect(pool?.totalSupply).toBe(0n);
      expect(f.custody.balanceOf("alice", "A")).toBe(FUNDING);
    });
  });

  // ─── Swaps ───────────────────────────────────────────────────────────

  describe("swap", () => {
    beforeEach(() => {
      f.engine.createPool("alice", "A", "B", 1_000_000n, 1_000_000n);
    });

    it("swaps A for B and records the trade", () => {
      f.clock.height = 9;
      const record = f.engine.swap("bob", 1, 1000n, 990n, "A");

      expect(record).toEqual({
        swapId: 1,
        poolId: 1,
        trader: "bob",
        assetIn: "A",
        assetOut: "B",
        amountIn: 1000n,
        amountOut: 996n,
        fee: 3n,
        priceImpact: 9n,
        blockHeight: 9,
      });
      expect(f.engine.getSwap(1)).toEqual(record);

      const pool = f.engine.getPool(1);
      expect(pool?.reserveA).toBe(1_001_000n);
      expect(pool?.reserveB).toBe(999_004n);
      expect(pool?.lastPriceA).toBe(1_001_997n);
      expect(pool?.lastPriceB).toBe(998_005n);

      expect(f.custody.balanceOf("bob", "A")).toBe(FUNDING - 1000n);
      expect(f.custody.balanceOf("bob", "B")).toBe(FUNDING + 996n);
      expect(f.engine.getProtocolStats()).toEqual({
        totalPools: 1,
        totalVolume: 1000n,
        totalFeesCollected: 3n,
        totalSwaps: 1,
      });
    });

    it("swaps B for A", () => {
      const record = f.engine.swap("bob", 1, 1000n, 0n, "B");

      expect(record.assetOut).toBe("A");
      expect(record.amountOut).toBe(996n);
      const pool = f.engine.getPool(1);
      expect(pool?.reserveA).toBe(999_004n);
      expect(pool?.reserveB).toBe(1_001_000n);
      expect(pool?.lastPriceA).toBe(998_005n);
      expect(pool?.lastPriceB).toBe(1_001_997n);
    });

    it("numbers swaps from the running total", () => {
      f.engine.swap("bob", 1, 1000n, 0n, "A");
      expect(f.engine.swap("bob", 1, 1000n, 0n, "B").swapId).toBe(2);
      expect(f.engine.getProtocolStats().totalSwaps).toBe(2);
    });

    it("keeps the fee in the reserves", () => {
      const before = 1_000_000n * 1_000_000n;
      f.engine.swap("bob", 1, 50_000n, 0n, "A");
      const pool = f.engine.getPool(1);
      expect((pool?.reserveA ?? 0n) * (pool?.reserveB ?? 0n)).toBeGreaterThanOrEqual(before);
    });

    it("enforces the minimum output", () => {
      expectAmmError(() => f.engine.swap("bob", 1, 1000n, 997n, "A"), "SLIPPAGE_EXCEEDED");
      expect(f.engine.getPool(1)?.reserveA).toBe(1_000_000n);
      expect(f.engine.getProtocolStats().totalSwaps).toBe(0);
    });

    it("rejects foreign assets, zero input and dust", () => {
      expectAmmError(() => f.engine.swap("bob", 1, 1000n, 0n, "C"), "INVALID_ASSET");
      expectAmmError(() => f.engine.swap("bob", 1, 0n, 0n, "A"), "INVALID_AMOUNT");
      expectAmmError(() => f.engine.swap("bob", 1, 1n, 0n, "A"), "INSUFFICIENT_LIQUIDITY");
      expectAmmError(() => f.engine.swap("bob", 2, 1000n, 0n, "A"), "POOL_NOT_FOUND");
    });

    it("returns nothing from a drained pool", () => {
      f.engine.removeLiquidity("alice", 1, 1_000_000n, 0n, 0n);
      expectAmmError(() => f.engine.swap("bob", 1, 1000n, 0n, "A"), "INSUFFICIENT_LIQUIDITY");
    });

    it("writes nothing when the trader cannot pay", () => {
      expectAmmError(() => f.engine.swap("carol", 1, 1000n, 0n, "A"), "TRANSFER_FAILED");
      expect(f.engine.getPool(1)?.reserveA).toBe(1_000_000n);
      expect(f.engine.getSwap(1)).toBeUndefined();
      expect(f.engine.getProtocolStats().totalVolume).toBe(0n);
    });

    it("emits a swapped event", () => {
      f.engine.swap("bob", 1, 1000n, 0n, "A");
      const events = f.events.read("amm");
      expect(events[1]?.event.type).toBe("amm.swapped");
      expect(events[1]?.event.payload).toEqual({
        swapId: 1,
        poolId: 1,
        assetIn: "A",
        assetOut: "B",
        amountIn: "1000",
        amountOut: "996",
        fee: "3",
        priceImpact: "9",
        blockHeight: 0,
      });
    });
  });

  describe("getSwapQuote", () => {
    beforeEach(() => {
      f.engine.createPool("alice", "A", "B", 1_000_000n, 1_000_000n);
    });

    it("matches the swap without changing state", () => {
      const quote = f.engine.getSwapQuote(1, 1000n, "A");
      expect(quote).toEqual({ amountOut: 996n, fee: 3n, priceImpact: 9n });
      expect(f.engine.getSwapQuote(1, 1000n, "A")).toEqual(quote);
      expect(f.engine.getPool(1)?.reserveA).toBe(1_000_000n);
      expect(f.engine.swap("bob", 1, 1000n, quote.amountOut, "A").amountOut).toBe(quote.amountOut);
    });

    it("validates like a swap", () => {
      expectAmmError(() => f.engine.getSwapQuote(1, 1000n, "C"), "INVALID_ASSET");
      expectAmmError(() => f.engine.getSwapQuote(3, 1000n, "A"), "POOL_NOT_FOUND");
    });
  });

  // ─── Owner Operations ────────────────────────────────────────────────

  describe("setPoolFeeRate", () => {
    beforeEach(() => {
      f.engine.createPool("alice", "A", "B", 1_000_000n, 1_000_000n);
    });

    it("changes the fee charged on later swaps", () => {
      expect(f.engine.setPoolFeeRate(OWNER, 1, 100n).feeRate).toBe(100n);
      const record = f.engine.swap("bob", 1, 1000n, 0n, "A");
      expect(record.amountOut).toBe(989n);
      expect(record.fee).toBe(10n);
    });

    it("allows a zero fee", () => {
      f.engine.setPoolFeeRate(OWNER, 1, 0n);
      expect(f.engine.getSwapQuote(1, 1000n, "A")).toEqual({
        amountOut: 999n,
        fee: 0n,
        priceImpact: 9n,
      });
    });

    it("is owner only and bounded by 10%", () => {
      expectAmmError(() => f.engine.setPoolFeeRate("alice", 1, 50n), "UNAUTHORIZED");
      expectAmmError(() => f.engine.setPoolFeeRate(OWNER, 1, 1001n), "INVALID_AMOUNT");
      expectAmmError(() => f.engine.setPoolFeeRate(OWNER, 1, -1n), "INVALID_AMOUNT");
      expectAmmError(() => f.engine.setPoolFeeRate(OWNER, 5, 10n), "POOL_NOT_FOUND");
      expect(f.engine.setPoolFeeRate(OWNER, 1, 1000n).feeRate).toBe(1000n);
    });
  });

  describe("farming", () => {
    beforeEach(() => {
      f.engine.createPool("alice", "A", "B", 1_000_000n, 1_000_000n);
    });

    it("stores an owner-created farm", () => {
      const farm = f.engine.createFarmingPool(OWNER, 1, 10n, 5, 100);

      expect(farm).toEqual({
        poolId: 1,
        rewardPerBlock: 10n,
        startBlock: 5,
        endBlock: 100,
        accRewardPerShare: 0n,
        lastRewardBlock: 5,
        totalStaked: 0n,
      });
      expect(f.engine.getFarmingPool(1)).toEqual(farm);
      expect(f.engine.getFarmingPool(2)).toBeUndefined();
    });

    it("reports zeroed user info", () => {
      f.engine.createFarmingPool(OWNER, 1, 10n, 5, 100);
      expect(f.engine.getUserFarmingInfo(1, "alice")).toEqual({
        staked: 0n,
        rewardDebt: 0n,
        pendingRewards: 0n,
      });
    });

    it("validates owner, pool, duplicates and schedule", () => {
      expectAmmError(() => f.engine.createFarmingPool("alice", 1, 10n, 5, 100), "UNAUTHORIZED");
      expectAmmError(() => f.engine.createFarmingPool(OWNER, 9, 10n, 5, 100), "POOL_NOT_FOUND");
      expectAmmError(() => f.engine.createFarmingPool(OWNER, 1, 0n, 5, 100), "INVALID_AMOUNT");
      expectAmmError(() => f.engine.createFarmingPool(OWNER, 1, 10n, 100, 100), "INVALID_AMOUNT");

      f.engine.createFarmingPool(OWNER, 1, 10n, 5, 100);
      expectAmmError(() => f.engine.createFarmingPool(OWNER, 1, 10n, 5, 100), "ALREADY_EXISTS");
    });
  });

  // ─── Queries ─────────────────────────────────────────────────────────

  describe("queries", () => {
    it("never mutate state", () => {
      f.engine.createPool("alice", "A", "B", 1_000_000n, 1_000_000n);
      f.engine.swap("bob", 1, 1000n, 0n, "A");
      const pool = f.engine.getPool(1);
      const stats = f.engine.getProtocolStats();

      for (let i = 0; i < 3; i++) {
        f.engine.getPool(1);
        f.engine.getSwapQuote(1, 5000n, "B");
        f.engine.getProtocolStats();
        f.engine.getLiquidityBalance(1, "alice");
      }

      expect(f.engine.getPool(1)).toEqual(pool);
      expect(f.engine.getProtocolStats()).toEqual(stats);
      expect(f.events.globalPosition()).toBe(2);
    });

    it("defaults absent balances to zero", () => {
      expect(f.engine.getLiquidityBalance(1, "nobody")).toBe(0n);
      expect(f.engine.getUserPools("nobody")).toEqual([]);
      expect(f.engine.getSwap(1)).toBeUndefined();
    });
  });
});
