/**
 * StrataService — Composition root for the engines.
 *
 * Route handlers delegate to this service. One instance owns the
 * custody, the event store and both engines, all sharing one clock.
 * Each engine holds its funds under its own custodian account.
 */

import type { AccountId, AssetId, BlockClock } from "@strata/types";
import { InMemoryCustody } from "@strata/custody";
import { InMemoryEventStore } from "@strata/event-store";
import type {
  EventStoreIntegrityResult,
  ReadAllOptions,
  ReadOptions,
  StoredEvent,
} from "@strata/event-store";
import { LendingLedger } from "@strata/lending";
import { PoolEngine } from "@strata/amm";

// =============================================================================
// Configuration
// =============================================================================

export interface StrataServiceConfig {
  readonly ownerId: AccountId;
  readonly lendingCustodianId: AccountId;
  readonly ammCustodianId: AccountId;
  readonly settlementAsset: AssetId;
  readonly interestRatePerBlock?: bigint | undefined;
  readonly clock: BlockClock;
}

// =============================================================================
// Service
// =============================================================================

export class StrataService {
  readonly clock: BlockClock;
  readonly custody: InMemoryCustody;
  readonly eventStore: InMemoryEventStore;
  readonly lending: LendingLedger;
  readonly amm: PoolEngine;
  readonly settlementAsset: AssetId;

  constructor(config: StrataServiceConfig) {
    if (config.lendingCustodianId === config.ammCustodianId) {
      throw new Error(
        `The lending and AMM custodians must differ, got ${config.ammCustodianId} for both`,
      );
    }
    this.clock = config.clock;
    this.custody = new InMemoryCustody();
    this.eventStore = new InMemoryEventStore();
    this.settlementAsset = config.settlementAsset;

    this.lending = new LendingLedger({
      owner: config.ownerId,
      custodian: config.lendingCustodianId,
      asset: config.settlementAsset,
      clock: config.clock,
      transfers: this.custody,
      events: this.eventStore,
      interestRatePerBlock: config.interestRatePerBlock,
    });

    this.amm = new PoolEngine({
      owner: config.ownerId,
      custodian: config.ammCustodianId,
      clock: config.clock,
      transfers: this.custody,
      events: this.eventStore,
    });
  }

  // ─── Events ─────────────────────────────────────────────────────────

  readAllEvents(options?: ReadAllOptions): readonly StoredEvent[] {
    return this.eventStore.readAll(options);
  }

  readStreamEvents(streamId: string, options?: ReadOptions): readonly StoredEvent[] {
    return this.eventStore.read(streamId, options);
  }

  verifyEventIntegrity(): EventStoreIntegrityResult {
    return this.eventStore.verifyIntegrity();
  }
}
