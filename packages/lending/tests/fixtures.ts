/**
 * Shared fixtures for lending tests.
 */

import type { BlockClock } from "@strata/types";
import { InMemoryCustody } from "@strata/custody";
import { InMemoryEventStore } from "@strata/event-store";
import { LendingLedger } from "../src/lending-ledger.js";

export const ASSET = "STX";
export const OWNER = "owner";
export const CUSTODIAN = "custodian";
export const STARTING_BALANCE = 1_000_000n;

export class ManualClock implements BlockClock {
  constructor(public height = 0) {}

  currentHeight(): number {
    return this.height;
  }

  advance(blocks: number): void {
    this.height += blocks;
  }
}

export interface LendingFixture {
  readonly clock: ManualClock;
  readonly custody: InMemoryCustody;
  readonly events: InMemoryEventStore;
  readonly ledger: LendingLedger;
}

/**
 * A ledger at height 0 with alice and bob funded; carol starts empty.
 */
export function createLendingFixture(): LendingFixture {
  const clock = new ManualClock();
  const custody = new InMemoryCustody();
  const events = new InMemoryEventStore(() => "2024-01-15T10:00:00.000Z");
  custody.fund("alice", ASSET, STARTING_BALANCE);
  custody.fund("bob", ASSET, STARTING_BALANCE);

  const ledger = new LendingLedger({
    owner: OWNER,
    custodian: CUSTODIAN,
    asset: ASSET,
    clock,
    transfers: custody,
    events,
  });

  return { clock, custody, events, ledger };
}
