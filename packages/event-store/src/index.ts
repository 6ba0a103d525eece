/**
 * @strata/event-store — Append-only event persistence.
 *
 * Provides:
 * - EventStore interface for append-only event streams
 * - InMemoryEventStore for the service process and tests
 * - SHA-256 hash chain over RFC 8785 canonical events
 *
 * @packageDocumentation
 */

export type {
  StoredEvent,
  UnhashedEvent,
  AppendResult,
  ReadOptions,
  ReadAllOptions,
  EventStore,
  EventStoreErrorCode,
  IntegrityError,
  EventStoreIntegrityResult,
} from "./types.js";
export { EventStoreError } from "./types.js";

export { computeEventHash, verifyHashChain, GENESIS_HASH } from "./hash-chain.js";

export { InMemoryEventStore } from "./in-memory-store.js";

export { createDomainEvent } from "./domain-event.js";
export type { CreateDomainEventInput, EventFields } from "./domain-event.js";
