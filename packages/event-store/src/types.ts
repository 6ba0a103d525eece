/**
 * @strata/event-store — Core types.
 *
 * Defines the interfaces and types for append-only event persistence.
 *
 * Design principles:
 * - Events are immutable after creation
 * - Streams are append-only (no UPDATE, no DELETE)
 * - Every event has a monotonically increasing version within its stream
 * - Every event is linked to its predecessor by hash
 */

import type { DomainEvent, EventSink } from "@strata/types";

// =============================================================================
// Stored Event
// =============================================================================

/**
 * An event as persisted in the store.
 *
 * Wraps a DomainEvent with store-level metadata:
 * - streamId: which stream this event belongs to
 * - version: monotonically increasing position within the stream
 * - globalPosition: monotonically increasing position across all streams
 * - hash / previousHash: the tamper-evident chain link
 */
export interface StoredEvent {
  /** The domain event */
  readonly event: DomainEvent;

  /** Stream this event belongs to */
  readonly streamId: string;

  /** Position within this stream (1-based, monotonically increasing) */
  readonly version: number;

  /** Position across all streams (1-based, monotonically increasing) */
  readonly globalPosition: number;

  /** When this event was persisted (store-level, not domain-level) */
  readonly appendedAt: string;

  /** SHA-256 over this event's canonical form and `previousHash` */
  readonly hash: string;

  /** Hash of the preceding event, or the genesis marker */
  readonly previousHash: string;
}

/**
 * The hashed fields of a StoredEvent, before the link is computed.
 */
export type UnhashedEvent = Omit<StoredEvent, "hash" | "previousHash">;

// =============================================================================
// Append / Read
// =============================================================================

export interface AppendResult {
  /** Stream ID the events were appended to */
  readonly streamId: string;

  /** Version of the first event appended */
  readonly fromVersion: number;

  /** Version of the last event appended (current stream head) */
  readonly toVersion: number;

  /** Number of events appended */
  readonly count: number;
}

export interface ReadOptions {
  /** Start reading from this version (inclusive, 1-based). Default: 1 */
  readonly fromVersion?: number;
}

export interface ReadAllOptions {
  /** Start reading from this global position (inclusive). Default: 1 */
  readonly fromPosition?: number;
}

// =============================================================================
// Integrity
// =============================================================================

export interface IntegrityError {
  readonly position: number;
  readonly reason: string;
}

export interface EventStoreIntegrityResult {
  readonly valid: boolean;
  /** Global position of the last event whose link verified */
  readonly lastVerifiedPosition: number;
  readonly errors: readonly IntegrityError[];
}

// =============================================================================
// Event Store Interface
// =============================================================================

/**
 * Append-only event store.
 *
 * Invariants:
 * - Events are immutable once appended
 * - Stream versions are contiguous (1, 2, 3, ...) with no gaps
 * - Global positions are monotonically increasing with no gaps
 */
export interface EventStore extends EventSink {
  append(streamId: string, events: readonly DomainEvent[]): AppendResult;

  read(streamId: string, options?: ReadOptions): readonly StoredEvent[];

  readAll(options?: ReadAllOptions): readonly StoredEvent[];

  /** Current global position, or 0 if the store is empty */
  globalPosition(): number;

  verifyIntegrity(): EventStoreIntegrityResult;
}

// =============================================================================
// Errors
// =============================================================================

export type EventStoreErrorCode = "INVALID_STREAM_ID" | "EMPTY_APPEND" | "INVALID_EVENT";

export class EventStoreError extends Error {
  constructor(
    public readonly code: EventStoreErrorCode,
    message: string,
    public readonly streamId?: string,
  ) {
    super(message);
    this.name = "EventStoreError";
  }
}
