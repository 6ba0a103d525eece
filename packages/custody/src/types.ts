/**
 * @strata/custody — Types.
 */

import type { AccountId, AssetId } from "@strata/types";

/** Error codes for custody operations. */
export type CustodyErrorCode = "INVALID_AMOUNT" | "INVALID_IDENTITY";

export class CustodyError extends Error {
  public readonly code: CustodyErrorCode;

  constructor(code: CustodyErrorCode, message: string) {
    super(message);
    this.name = "CustodyError";
    this.code = code;
  }
}

/**
 * A holder's balance of one asset.
 */
export interface HolderBalance {
  readonly account: AccountId;
  readonly asset: AssetId;
  readonly balance: bigint;
}
