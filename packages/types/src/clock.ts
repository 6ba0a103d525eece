/**
 * Clock Types
 *
 * The engines never read wall-clock time for their arithmetic. They read a
 * block height from an injected clock, once per operation.
 */

import type { BlockHeight } from "./identity.js";

/**
 * Source of the current block height.
 *
 * Implementations must be monotonically non-decreasing and stable for the
 * duration of a single operation.
 */
export interface BlockClock {
  currentHeight(): BlockHeight;
}
