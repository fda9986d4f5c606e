/**
 * Event Types
 *
 * Append-only event architecture.
 * Every committed state change is captured as a DomainEvent, consumed
 * by off-chain indexers for audit trails.
 *
 * Rules:
 * - Events are immutable after creation
 * - Events are appended only when the operation commits
 * - Payloads are JSON-safe: amounts travel as decimal strings of base units
 */

/**
 * Which component emitted an event.
 */
export type EventSource = "vesting" | "distribution";

/**
 * Metadata common to all domain events.
 */
export interface EventMetadata {
  /** Unique event ID */
  readonly eventId: string;

  /** ISO 8601 timestamp taken from the component's clock */
  readonly timestamp: string;

  /** Address that invoked the operation */
  readonly actor: string;

  /** Groups all events committed by one operation */
  readonly correlationId: string;

  readonly source: EventSource;
}

/**
 * A domain event. Discriminated by `type`
 * (e.g. "vesting.claimed", "distribution.disbursed").
 */
export interface DomainEvent {
  readonly type: string;
  readonly metadata: EventMetadata;
  readonly payload: Readonly<Record<string, unknown>>;
}
