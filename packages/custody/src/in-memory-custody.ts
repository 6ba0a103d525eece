/**
 * @strata/custody — In-memory asset custody.
 *
 * Holds per-asset balances for every account (including the engines'
 * custodian) and settles transfer batches all-or-nothing.
 *
 * Rules:
 * - Legs apply in order against a scratch copy; the batch commits only if
 *   no balance goes below zero along the way
 * - A rejected batch leaves every balance untouched
 * - Balances are created by `fund` only; transfers conserve supply
 */

import type {
  AccountId,
  AssetId,
  AssetTransfer,
  TransferLeg,
  TransferOutcome,
} from "@strata/types";
import { isAccountId, isAssetId, isTransferLeg } from "@strata/types";
import { AmountMap } from "@strata/math";
import type { HolderBalance } from "./types.js";
import { CustodyError } from "./types.js";

export class InMemoryCustody implements AssetTransfer {
  private readonly _assets = new Map<AssetId, AmountMap<AccountId>>();
  private readonly _settled: TransferLeg[] = [];

  /**
   * Credit an account out of thin air. Used to seed balances.
   */
  fund(account: AccountId, asset: AssetId, amount: bigint): bigint {
    if (!isAccountId(account) || !isAssetId(asset)) {
      throw new CustodyError(
        "INVALID_IDENTITY",
        `Cannot fund account "${account}" in asset "${asset}"`,
      );
    }
    if (amount <= 0n) {
      throw new CustodyError(
        "INVALID_AMOUNT",
        `Funding amount must be positive, got ${amount.toString()}`,
      );
    }
    return this._ledger(asset).credit(account, amount);
  }

  balanceOf(account: AccountId, asset: AssetId): bigint {
    return this._assets.get(asset)?.get(account) ?? 0n;
  }

  /**
   * Every non-zero balance of an asset.
   */
  holders(asset: AssetId): readonly HolderBalance[] {
    const ledger = this._assets.get(asset);
    if (ledger === undefined) return [];
    return ledger
      .entries()
      .filter(([, balance]) => balance > 0n)
      .map(([account, balance]) => ({ account, asset, balance }));
  }

  /**
   * Legs settled so far, in order.
   */
  settled(): readonly TransferLeg[] {
    return [...this._settled];
  }

  // ─── AssetTransfer ──────────────────────────────────────────────────

  transfer(legs: readonly TransferLeg[]): TransferOutcome {
    const scratch = new Map<string, bigint>();
    const key = (asset: AssetId, account: AccountId): string => `${asset}\u0000${account}`;
    const read = (asset: AssetId, account: AccountId): bigint =>
      scratch.get(key(asset, account)) ?? this.balanceOf(account, asset);

    for (const leg of legs) {
      if (leg.amount <= 0n) {
        return { ok: false, reason: `Transfer amount must be positive, got ${leg.amount.toString()}` };
      }
      if (!isTransferLeg(leg)) {
        return { ok: false, reason: `Malformed ${leg.asset} leg from "${leg.from}" to "${leg.to}"` };
      }
      if (leg.from === leg.to) {
        return { ok: false, reason: `Cannot transfer ${leg.asset} from ${leg.from} to itself` };
      }

      const available = read(leg.asset, leg.from);
      if (available < leg.amount) {
        return {
          ok: false,
          reason: `Insufficient ${leg.asset} balance for ${leg.from}: has ${available.toString()}, needs ${leg.amount.toString()}`,
        };
      }

      scratch.set(key(leg.asset, leg.from), available - leg.amount);
      scratch.set(key(leg.asset, leg.to), read(leg.asset, leg.to) + leg.amount);
    }

    // Commit
    for (const leg of legs) {
      this._ledger(leg.asset).debit(leg.from, leg.amount);
      this._ledger(leg.asset).credit(leg.to, leg.amount);
      this._settled.push(leg);
    }

    return { ok: true };
  }

  private _ledger(asset: AssetId): AmountMap<AccountId> {
    let ledger = this._assets.get(asset);
    if (ledger === undefined) {
      ledger = new AmountMap<AccountId>();
      this._assets.set(asset, ledger);
    }
    return ledger;
  }
}
