/**
 * @strata/custody — In-process asset custody.
 *
 * Implements the atomic, all-or-nothing transfer capability the lending
 * and AMM engines settle through.
 */

export { InMemoryCustody } from "./in-memory-custody.js";
export { CustodyError } from "./types.js";
export type { CustodyErrorCode, HolderBalance } from "./types.js";
