/**
 * @strata/math — Amount strings.
 *
 * Amounts are base-unit integers. They cross JSON boundaries (HTTP bodies,
 * event payloads) as decimal strings because JSON has no bigint.
 *
 * "1000000" → 1000000n
 * 1000000n → "1000000"
 */

import { MathError } from "./errors.js";

const UNSIGNED_INTEGER = /^\d+$/;

/**
 * Parse an unsigned decimal integer string into a bigint.
 */
export function parseAmount(amount: string): bigint {
  if (typeof amount !== "string" || amount.trim() === "") {
    throw new MathError("INVALID_FORMAT", `Invalid amount: "${String(amount)}"`);
  }

  const trimmed = amount.trim();

  if (!UNSIGNED_INTEGER.test(trimmed)) {
    throw new MathError("INVALID_FORMAT", `Invalid amount format: "${trimmed}"`);
  }

  return BigInt(trimmed);
}

/**
 * Render a bigint amount as a decimal string.
 */
export function formatAmount(amount: bigint): string {
  return amount.toString();
}

/**
 * Check a string is a parseable unsigned amount without throwing.
 */
export function isAmountString(value: unknown): value is string {
  return typeof value === "string" && UNSIGNED_INTEGER.test(value.trim());
}
