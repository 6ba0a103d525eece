/**
 * Identity Types
 *
 * Opaque identities used as map keys by both engines.
 *
 * Rules:
 * - Identities are compared by strict equality only
 * - No structure is inferred from an identity string
 * - The acting identity is supplied by the caller and trusted
 */

/**
 * The acting party of an operation (a depositor, borrower, liquidity
 * provider, trader, the deployment owner or the pool custodian).
 */
export type AccountId = string;

/**
 * An asset identity (e.g., "STX", "token-a"). The lending ledger works in a
 * single settlement asset; AMM pools pair two distinct assets.
 */
export type AssetId = string;

/**
 * Block height. Monotonically non-decreasing, supplied by a {@link BlockClock}.
 */
export type BlockHeight = number;
