/**
 * @strata/math — Get-or-default balance map.
 *
 * Absent keys read as zero rather than signalling absence. Entries are
 * created on first write and never removed; a balance may return to zero and
 * stay as an entry.
 */

import { MathError } from "./errors.js";
import { checkedSub } from "./integer.js";

export class AmountMap<K> {
  private readonly _values = new Map<K, bigint>();

  /**
   * Balance for a key, zero when the key has never been written.
   */
  get(key: K): bigint {
    return this._values.get(key) ?? 0n;
  }

  set(key: K, value: bigint): void {
    if (value < 0n) {
      throw new MathError("UNDERFLOW", `Balance cannot be negative: ${value.toString()}`);
    }
    this._values.set(key, value);
  }

  /**
   * Add to a balance. Returns the new balance.
   */
  credit(key: K, amount: bigint): bigint {
    const next = this.get(key) + amount;
    this.set(key, next);
    return next;
  }

  /**
   * Subtract from a balance. Throws on underflow. Returns the new balance.
   */
  debit(key: K, amount: bigint): bigint {
    const next = checkedSub(this.get(key), amount);
    this._values.set(key, next);
    return next;
  }

  /**
   * Whether the key has ever been written.
   */
  has(key: K): boolean {
    return this._values.has(key);
  }

  entries(): readonly (readonly [K, bigint])[] {
    return [...this._values.entries()];
  }

  get size(): number {
    return this._values.size;
  }
}
