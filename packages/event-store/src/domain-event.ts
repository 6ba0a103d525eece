/**
 * @strata/event-store — Domain event construction.
 *
 * Engines describe what happened with bigint amounts; the event record
 * carries them as decimal strings so it stays JSON-safe and hashable.
 */

import { randomUUID } from "node:crypto";
import type { DomainEvent, EventPayloadValue, EventSource } from "@strata/types";

/**
 * Payload fields accepted by {@link createDomainEvent}. Bigints are rendered
 * as decimal strings.
 */
export type EventFields = Readonly<Record<string, EventPayloadValue | bigint>>;

export interface CreateDomainEventInput {
  readonly type: string;
  readonly source: EventSource;
  readonly actor: string;
  readonly payload: EventFields;
  /** ISO 8601 timestamp. Defaults to now. */
  readonly timestamp?: string;
  readonly eventId?: string;
}

export function createDomainEvent(input: CreateDomainEventInput): DomainEvent {
  const eventId = input.eventId ?? randomUUID();
  const payload: Record<string, EventPayloadValue> = {};
  for (const [key, value] of Object.entries(input.payload)) {
    payload[key] = typeof value === "bigint" ? value.toString() : value;
  }

  return {
    type: input.type,
    metadata: {
      eventId,
      timestamp: input.timestamp ?? new Date().toISOString(),
      actor: input.actor,
      correlationId: eventId,
      source: input.source,
    },
    payload,
  };
}
