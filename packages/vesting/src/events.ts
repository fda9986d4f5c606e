/**
 * Domain events emitted at commit.
 *
 * Each operation collects its events in an EventBatch. Completed batches
 * wait in the store's EventOutbox until the outermost operation returns,
 * so a nested call's events are appended with its caller's and dropped
 * with them on failure. Nothing is appended while state can still roll
 * back.
 */

import { randomUUID } from "node:crypto";
import type { EventStore } from "@allotment/event-store";
import type {
  Address,
  DomainEvent,
  EventSource,
  Timestamp,
} from "@allotment/types";

export const VESTING_EVENTS = {
  PLAN_CREATED: "vesting.plan.created",
  TRIGGER_TIME_SET: "vesting.trigger-time.set",
  GRANT_CREATED: "vesting.grant.created",
  CLAIMED: "vesting.claimed",
  REVOKED: "vesting.revoked",
  DEBT_WRITTEN_OFF: "vesting.debt.written-off",
  PLAN_DEBT_WRITTEN_OFF: "vesting.debt.written-off.plan",
} as const;

export const DISTRIBUTION_EVENTS = {
  DISBURSED: "distribution.disbursed",
  SWAPPED: "distribution.swapped",
  LIQUIDITY_REALLOCATED: "distribution.liquidity.reallocated",
} as const;

export type VestingEventType = (typeof VESTING_EVENTS)[keyof typeof VESTING_EVENTS];
export type DistributionEventType =
  (typeof DISTRIBUTION_EVENTS)[keyof typeof DISTRIBUTION_EVENTS];
export type AllocationEventType = VestingEventType | DistributionEventType;

/** JSON-safe payload: amounts are recorded as decimal strings of base units. */
export type EventPayload = Readonly<Record<string, string | number | boolean>>;

export class EventBatch {
  private readonly events: DomainEvent[] = [];
  private readonly correlationId = randomUUID();
  private readonly timestamp: string;

  constructor(
    private readonly source: EventSource,
    private readonly actor: Address,
    at: Timestamp,
  ) {
    this.timestamp = new Date(at * 1000).toISOString();
  }

  record(type: AllocationEventType, payload: EventPayload): void {
    this.events.push({
      type,
      metadata: {
        eventId: randomUUID(),
        timestamp: this.timestamp,
        actor: this.actor,
        correlationId: this.correlationId,
        source: this.source,
      },
      payload,
    });
  }

  /** Append the batch to the source's stream. No-op when empty. */
  commit(store: EventStore): void {
    if (this.events.length > 0) {
      store.append(this.source, this.events);
    }
  }
}

/**
 * Pending batches for one event store, shared by every component that
 * appends to it.
 */
export class EventOutbox {
  private static readonly outboxes = new WeakMap<EventStore, EventOutbox>();

  private readonly pending: EventBatch[] = [];
  private depth = 0;

  private constructor(private readonly store: EventStore) {}

  static for(store: EventStore): EventOutbox {
    let outbox = EventOutbox.outboxes.get(store);
    if (outbox === undefined) {
      outbox = new EventOutbox(store);
      EventOutbox.outboxes.set(store, outbox);
    }
    return outbox;
  }

  /**
   * Run an operation that records into `batch`. The batch is queued when
   * `fn` returns and discarded, along with any batch queued by a nested
   * call, when it throws. The queue is flushed once the outermost
   * operation has returned.
   */
  run<T>(batch: EventBatch, fn: () => T): T {
    const result = this.track(batch, fn);
    if (this.depth === 0) {
      for (const committed of this.pending.splice(0)) {
        committed.commit(this.store);
      }
    }
    return result;
  }

  private track<T>(batch: EventBatch, fn: () => T): T {
    const mark = this.pending.length;
    this.depth += 1;
    try {
      const result = fn();
      this.pending.push(batch);
      return result;
    } catch (err) {
      this.pending.splice(mark);
      throw err;
    } finally {
      this.depth -= 1;
    }
  }
}
