/**
 * @strata/math — Unsigned integer arithmetic.
 *
 * All arithmetic uses bigint. Division truncates toward zero, matching the
 * unsigned integer semantics both engines are specified against.
 *
 * Rules:
 * - No floating-point operations
 * - A result below zero is an error, never a wrap-around
 * - Division by zero is an error, never Infinity
 */

import { MathError } from "./errors.js";

/**
 * Integer square root, rounded down.
 *
 * Babylonian iteration seeded at `x / 2`. Iteration stops as soon as the
 * next guess is no longer strictly below the current one, i.e. successive
 * guesses differ by less than one unit. The seed and stopping rule fix the
 * rounding of minted pool shares.
 */
export function isqrt(x: bigint): bigint {
  if (x < 0n) {
    throw new MathError("NEGATIVE_INPUT", `Cannot take the square root of ${x.toString()}`);
  }
  if (x < 2n) {
    return x;
  }

  let guess = x / 2n;
  for (;;) {
    const next = (guess + x / guess) / 2n;
    if (next >= guess) {
      return guess;
    }
    guess = next;
  }
}

/**
 * `a * b / denominator`, truncating.
 */
export function mulDiv(a: bigint, b: bigint, denominator: bigint): bigint {
  if (denominator === 0n) {
    throw new MathError("DIVISION_BY_ZERO", "Division by zero");
  }
  return (a * b) / denominator;
}

/**
 * `a - b`, rejecting a negative result.
 */
export function checkedSub(a: bigint, b: bigint): bigint {
  if (b > a) {
    throw new MathError(
      "UNDERFLOW",
      `Subtraction underflow: ${a.toString()} - ${b.toString()}`,
    );
  }
  return a - b;
}

export function minBigInt(a: bigint, b: bigint): bigint {
  return a < b ? a : b;
}

export function maxBigInt(a: bigint, b: bigint): bigint {
  return a > b ? a : b;
}
