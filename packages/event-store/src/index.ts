/**
 * @allotment/event-store — Append-only event persistence.
 *
 * Provides:
 * - EventStore interface for append-only event streams
 * - InMemoryEventStore with a SHA-256 hash chain over every event
 *
 * @packageDocumentation
 */

export type {
  StoredEvent,
  UnhashedStoredEvent,
  AppendResult,
  ReadOptions,
  ReadAllOptions,
  EventHandler,
  HandlerErrorListener,
  Subscription,
  EventStore,
  EventStoreErrorCode,
  IntegrityError,
  EventStoreIntegrityResult,
} from "./types.js";
export { EventStoreError } from "./types.js";

export { computeEventHash, verifyHashChain, GENESIS_HASH } from "./hash-chain.js";

export { InMemoryEventStore } from "./in-memory-store.js";
export type { InMemoryEventStoreOptions } from "./in-memory-store.js";
