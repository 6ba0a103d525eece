/**
 * @strata/types — Shared domain types for the Strata engines.
 *
 * These types are used across all Strata packages:
 * - Account and asset identities
 * - The injected block clock
 * - The atomic transfer capability
 * - Domain events
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No semantic interpretation in types; meaning lives in consuming code
 */

// Identity types
export type { AccountId, AssetId, BlockHeight } from "./identity.js";

// Clock
export type { BlockClock } from "./clock.js";

// Transfers
export type { TransferLeg, TransferOutcome, AssetTransfer } from "./transfer.js";

// Event types
export type {
  DomainEvent,
  EventMetadata,
  EventPayloadValue,
  EventSink,
  EventSource,
} from "./event.js";

// Runtime type guards
export {
  isAccountId,
  isAssetId,
  isBlockHeight,
  isTransferLeg,
  isDomainEvent,
} from "./guards.js";
