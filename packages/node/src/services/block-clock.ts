/**
 * Block clocks for the service.
 *
 * The engines only read a height; these decide where it comes from.
 */

import type { BlockClock, BlockHeight } from "@strata/types";
import { isBlockHeight } from "@strata/types";

/**
 * A clock moved by hand. Used by tests and local tooling.
 */
export class ManualBlockClock implements BlockClock {
  private _height: BlockHeight;

  constructor(height: BlockHeight = 0) {
    if (!isBlockHeight(height)) {
      throw new RangeError(`Invalid starting height ${height}`);
    }
    this._height = height;
  }

  currentHeight(): BlockHeight {
    return this._height;
  }

  advance(blocks: number): BlockHeight {
    if (!Number.isInteger(blocks) || blocks < 0) {
      throw new RangeError(`Cannot advance the clock by ${blocks} blocks`);
    }
    this._height += blocks;
    return this._height;
  }
}

/**
 * Derives the height from elapsed wall-clock time: one block every
 * `blockTimeMs` since the clock was created.
 */
export class WallBlockClock implements BlockClock {
  private readonly _genesis: number;
  private _last: BlockHeight = 0;

  constructor(
    private readonly _blockTimeMs: number,
    private readonly _now: () => number = Date.now,
  ) {
    if (!Number.isInteger(_blockTimeMs) || _blockTimeMs < 1) {
      throw new RangeError(`Block time must be a positive integer, got ${_blockTimeMs}`);
    }
    this._genesis = _now();
  }

  currentHeight(): BlockHeight {
    const height = Math.floor((this._now() - this._genesis) / this._blockTimeMs);
    // never step backwards if the system clock does
    this._last = Math.max(this._last, height);
    return this._last;
  }
}
