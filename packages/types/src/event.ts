/**
 * Event Types
 *
 * Every mutating engine operation emits a DomainEvent for external indexing.
 *
 * Rules:
 * - Events are immutable after creation
 * - Every event has metadata (who, when, which engine)
 * - Payload values are JSON-safe: amounts travel as decimal strings
 * - Emission has no return-path semantics for the operation that emits
 */

/**
 * The engine that emitted an event.
 */
export type EventSource = "lending" | "amm";

/**
 * Metadata common to all domain events.
 */
export interface EventMetadata {
  /** Unique event ID */
  readonly eventId: string;

  /** ISO 8601 timestamp */
  readonly timestamp: string;

  /** Acting identity that caused this event */
  readonly actor: string;

  /** ID of the event that caused this event (causal chain) */
  readonly causationId?: string;

  /** ID for grouping related events across systems */
  readonly correlationId: string;

  /** Which engine emitted this event */
  readonly source: EventSource;
}

/**
 * JSON-safe payload value.
 */
export type EventPayloadValue = string | number | boolean | null;

/**
 * A domain event. Discriminated by `type` field.
 */
export interface DomainEvent {
  /** Event type identifier (e.g., "lending.borrowed", "amm.swapped") */
  readonly type: string;

  /** Event metadata */
  readonly metadata: EventMetadata;

  /** Event-specific payload */
  readonly payload: Readonly<Record<string, EventPayloadValue>>;
}

/**
 * Anything that accepts appended domain events on a named stream.
 * The event store satisfies this; engines depend on nothing more.
 */
export interface EventSink {
  append(streamId: string, events: readonly DomainEvent[]): unknown;
}
