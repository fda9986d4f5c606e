/**
 * @allotment/event-store — In-memory EventStore implementation.
 *
 * Stores events in plain arrays. All state is lost on process exit;
 * durable indexers consume the log through subscriptions.
 *
 * Properties:
 * - O(1) append (amortized)
 * - O(n) read (where n = number of events returned)
 * - Synchronous subscription dispatch; a throwing subscriber is reported
 *   to `onHandlerError` and does not affect the append or other subscribers
 */

import type { DomainEvent } from "@allotment/types";
import type {
  AppendResult,
  EventHandler,
  EventStore,
  EventStoreIntegrityResult,
  HandlerErrorListener,
  ReadAllOptions,
  ReadOptions,
  StoredEvent,
  Subscription,
  UnhashedStoredEvent,
} from "./types.js";
import { EventStoreError } from "./types.js";
import { computeEventHash, GENESIS_HASH, verifyHashChain } from "./hash-chain.js";

export interface InMemoryEventStoreOptions {
  /** Default: emit a process warning */
  readonly onHandlerError?: HandlerErrorListener;
}

export class InMemoryEventStore implements EventStore {
  /** Per-stream event storage */
  private readonly _streams = new Map<string, StoredEvent[]>();

  /** Global event log (all streams, in append order) */
  private readonly _globalLog: StoredEvent[] = [];

  private readonly _subscribers = new Set<EventHandler>();
  private readonly _onHandlerError: HandlerErrorListener;

  private _nextGlobalPosition = 1;

  /** Hash of the last appended event (for chain linking) */
  private _lastHash: string = GENESIS_HASH;

  constructor(options: InMemoryEventStoreOptions = {}) {
    this._onHandlerError = options.onHandlerError ?? emitHandlerWarning;
  }

  // ─── Append ─────────────────────────────────────────────────────────

  append(streamId: string, events: readonly DomainEvent[]): AppendResult {
    this._validateStreamId(streamId);

    if (events.length === 0) {
      throw new EventStoreError(
        "EMPTY_APPEND",
        "Cannot append zero events",
        streamId,
      );
    }

    let stream = this._streams.get(streamId);
    const currentVersion = stream !== undefined ? stream.length : 0;

    if (stream === undefined) {
      stream = [];
      this._streams.set(streamId, stream);
    }

    const fromVersion = currentVersion + 1;
    const storedEvents: StoredEvent[] = [];
    const appendedAt = new Date().toISOString();

    events.forEach((event, i) => {
      const base: UnhashedStoredEvent = {
        event: {
          type: event.type,
          metadata: event.metadata,
          payload: event.payload,
        },
        streamId,
        version: fromVersion + i,
        globalPosition: this._nextGlobalPosition++,
        appendedAt,
      };

      const previousHash = this._lastHash;
      const stored: StoredEvent = {
        ...base,
        hash: computeEventHash(base, previousHash),
        previousHash,
      };
      this._lastHash = stored.hash;

      storedEvents.push(stored);
    });

    stream.push(...storedEvents);
    this._globalLog.push(...storedEvents);

    this._dispatch(storedEvents);

    return {
      streamId,
      fromVersion,
      toVersion: fromVersion + events.length - 1,
      count: events.length,
    };
  }

  // ─── Read ───────────────────────────────────────────────────────────

  read(streamId: string, options?: ReadOptions): readonly StoredEvent[] {
    this._validateStreamId(streamId);

    const stream = this._streams.get(streamId);
    if (stream === undefined) {
      return [];
    }

    const fromVersion = options?.fromVersion ?? 1;
    if (fromVersion < 1) {
      throw new EventStoreError(
        "INVALID_VERSION",
        `fromVersion must be >= 1, got ${fromVersion}`,
        streamId,
      );
    }

    const result = stream.filter((e) => e.version >= fromVersion);
    return limit(result, options?.maxCount);
  }

  readAll(options?: ReadAllOptions): readonly StoredEvent[] {
    const fromPosition = options?.fromPosition ?? 1;
    const types = options?.types !== undefined ? new Set(options.types) : undefined;

    const result = this._globalLog.filter(
      (e) =>
        e.globalPosition >= fromPosition &&
        (types === undefined || types.has(e.event.type)),
    );
    return limit(result, options?.maxCount);
  }

  // ─── Subscriptions ──────────────────────────────────────────────────

  subscribeAll(handler: EventHandler): Subscription {
    this._subscribers.add(handler);

    return {
      unsubscribe: () => {
        this._subscribers.delete(handler);
      },
    };
  }

  // ─── Query ──────────────────────────────────────────────────────────

  streamVersion(streamId: string): number {
    return this._streams.get(streamId)?.length ?? 0;
  }

  globalPosition(): number {
    return this._nextGlobalPosition - 1;
  }

  verifyIntegrity(): EventStoreIntegrityResult {
    return verifyHashChain(this._globalLog);
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _validateStreamId(streamId: string): void {
    if (streamId.length === 0) {
      throw new EventStoreError(
        "INVALID_STREAM_ID",
        "Stream ID must be a non-empty string",
      );
    }
  }

  private _dispatch(events: readonly StoredEvent[]): void {
    for (const handler of this._subscribers) {
      for (const event of events) {
        try {
          handler(event);
        } catch (err) {
          this._onHandlerError(err, event);
        }
      }
    }
  }
}

function emitHandlerWarning(error: unknown, event: StoredEvent): void {
  process.emitWarning(
    `Event subscriber failed on ${event.event.type} at position ${event.globalPosition}`,
    { type: "EventHandlerWarning", detail: String(error) },
  );
}

function limit(
  events: readonly StoredEvent[],
  maxCount: number | undefined,
): readonly StoredEvent[] {
  return maxCount !== undefined && maxCount >= 0
    ? events.slice(0, maxCount)
    : events;
}
