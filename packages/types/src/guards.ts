/**
 * Runtime Type Guards
 *
 * Narrowing functions for shared domain types.
 * These enable safe runtime validation at system boundaries
 * (HTTP inputs, deserialized events, external integrations).
 */

import type { TransferLeg } from "./transfer.js";
import type { DomainEvent, EventMetadata, EventSource } from "./event.js";

// =============================================================================
// Identity guards
// =============================================================================

/**
 * An identity is any non-empty string without surrounding whitespace.
 */
export function isAccountId(value: unknown): value is string {
  return typeof value === "string" && value.length > 0 && value.trim() === value;
}

export function isAssetId(value: unknown): value is string {
  return isAccountId(value);
}

export function isBlockHeight(value: unknown): value is number {
  return typeof value === "number" && Number.isSafeInteger(value) && value >= 0;
}

// =============================================================================
// Transfer guards
// =============================================================================

export function isTransferLeg(value: unknown): value is TransferLeg {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    isAssetId(v.asset) &&
    typeof v.amount === "bigint" &&
    v.amount > 0n &&
    isAccountId(v.from) &&
    isAccountId(v.to)
  );
}

// =============================================================================
// Event guards
// =============================================================================

const EVENT_SOURCES = new Set<string>(["lending", "amm"]);

export function isEventSource(value: unknown): value is EventSource {
  return typeof value === "string" && EVENT_SOURCES.has(value);
}

export function isEventMetadata(value: unknown): value is EventMetadata {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.eventId === "string" &&
    typeof v.timestamp === "string" &&
    typeof v.actor === "string" &&
    typeof v.correlationId === "string" &&
    isEventSource(v.source)
  );
}

export function isDomainEvent(value: unknown): value is DomainEvent {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  if (typeof v.type !== "string" || !isEventMetadata(v.metadata)) return false;
  if (v.payload === null || typeof v.payload !== "object") return false;
  return Object.values(v.payload).every(
    (field) =>
      field === null ||
      typeof field === "string" ||
      typeof field === "number" ||
      typeof field === "boolean",
  );
}
