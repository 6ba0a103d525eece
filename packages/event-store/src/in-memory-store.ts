/**
 * @strata/event-store — In-memory EventStore implementation.
 *
 * Each stream and the global log are plain arrays of the same stored
 * records. Nothing survives the process.
 */

import type { DomainEvent } from "@strata/types";
import { isDomainEvent } from "@strata/types";
import type {
  AppendResult,
  EventStore,
  EventStoreIntegrityResult,
  ReadAllOptions,
  ReadOptions,
  StoredEvent,
  UnhashedEvent,
} from "./types.js";
import { EventStoreError } from "./types.js";
import { computeEventHash, GENESIS_HASH, verifyHashChain } from "./hash-chain.js";

export class InMemoryEventStore implements EventStore {
  private readonly _streams = new Map<string, StoredEvent[]>();

  /** Every stream, in append order */
  private readonly _log: StoredEvent[] = [];

  /** Chain head; the next append links to it */
  private _head: string = GENESIS_HASH;

  /**
   * @param now - Source of `appendedAt` timestamps. Defaults to wall-clock ISO time.
   */
  constructor(private readonly _now: () => string = () => new Date().toISOString()) {}

  append(streamId: string, events: readonly DomainEvent[]): AppendResult {
    if (streamId.length === 0) {
      throw new EventStoreError("INVALID_STREAM_ID", "Stream ID must be a non-empty string");
    }
    if (events.length === 0) {
      throw new EventStoreError("EMPTY_APPEND", "Cannot append zero events", streamId);
    }
    const malformed = events.findIndex((e) => !isDomainEvent(e));
    if (malformed !== -1) {
      throw new EventStoreError(
        "INVALID_EVENT",
        `Event ${malformed} of the batch is not a well-formed domain event`,
        streamId,
      );
    }

    const stream = this._streams.get(streamId) ?? [];
    this._streams.set(streamId, stream);

    const fromVersion = stream.length + 1;
    const appendedAt = this._now();

    for (const event of events) {
      const unhashed: UnhashedEvent = {
        event,
        streamId,
        version: stream.length + 1,
        globalPosition: this._log.length + 1,
        appendedAt,
      };
      const stored: StoredEvent = {
        ...unhashed,
        hash: computeEventHash(unhashed, this._head),
        previousHash: this._head,
      };
      this._head = stored.hash;
      stream.push(stored);
      this._log.push(stored);
    }

    return { streamId, fromVersion, toVersion: stream.length, count: events.length };
  }

  /** Events of one stream from `fromVersion` on; empty for an unknown stream. */
  read(streamId: string, options?: ReadOptions): readonly StoredEvent[] {
    const from = options?.fromVersion ?? 1;
    return (this._streams.get(streamId) ?? []).filter((e) => e.version >= from);
  }

  readAll(options?: ReadAllOptions): readonly StoredEvent[] {
    const from = options?.fromPosition ?? 1;
    return this._log.filter((e) => e.globalPosition >= from);
  }

  globalPosition(): number {
    return this._log.length;
  }

  verifyIntegrity(): EventStoreIntegrityResult {
    return verifyHashChain(this._log);
  }
}
