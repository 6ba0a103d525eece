/**
 * Transfer Types
 *
 * The settlement capability the engines consume. Moving assets between an
 * account and the custodian is outside the engines; they only request it.
 *
 * Rules:
 * - A batch of legs settles completely or not at all
 * - Failure is reported, never thrown, so the engine decides the error
 * - Amounts are positive bigints
 */

import type { AccountId, AssetId } from "./identity.js";

/**
 * One movement of an asset from one account to another.
 */
export interface TransferLeg {
  readonly asset: AssetId;
  readonly amount: bigint;
  readonly from: AccountId;
  readonly to: AccountId;
}

/**
 * Outcome of a transfer batch.
 */
export type TransferOutcome =
  | { readonly ok: true }
  | { readonly ok: false; readonly reason: string };

/**
 * Atomic, all-or-nothing asset transfer.
 */
export interface AssetTransfer {
  transfer(legs: readonly TransferLeg[]): TransferOutcome;
}
