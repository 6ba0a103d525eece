/**
 * Shared fixtures for pool engine tests.
 */

import type { BlockClock } from "@strata/types";
import { InMemoryCustody } from "@strata/custody";
import { InMemoryEventStore } from "@strata/event-store";
import { PoolEngine } from "../src/pool-engine.js";

export const OWNER = "owner";
export const CUSTODIAN = "custodian";
export const FUNDING = 10_000_000n;

export class ManualClock implements BlockClock {
  constructor(public height = 0) {}

  currentHeight(): number {
    return this.height;
  }
}

export interface AmmFixture {
  readonly clock: ManualClock;
  readonly custody: InMemoryCustody;
  readonly events: InMemoryEventStore;
  readonly engine: PoolEngine;
}

/**
 * An engine at height 0; alice and bob each hold FUNDING of assets A and B.
 */
export function createAmmFixture(): AmmFixture {
  const clock = new ManualClock();
  const custody = new InMemoryCustody();
  const events = new InMemoryEventStore(() => "2024-01-15T10:00:00.000Z");
  for (const account of ["alice", "bob"]) {
    custody.fund(account, "A", FUNDING);
    custody.fund(account, "B", FUNDING);
  }

  const engine = new PoolEngine({
    owner: OWNER,
    custodian: CUSTODIAN,
    clock,
    transfers: custody,
    events,
  });

  return { clock, custody, events, engine };
}
