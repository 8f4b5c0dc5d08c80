/**
 * Event Types
 *
 * Every state change in Mintgate is captured as a DomainEvent and
 * appended to the launchpad event log.
 *
 * Rules:
 * - Events are immutable after creation
 * - Every event has metadata (who, when, which component)
 * - Payloads are JSON-safe (bigints travel as decimal strings)
 */

/**
 * Components that emit events.
 */
export type EventSource = "factory" | "coordinator" | "liquidity" | "attestation";

/**
 * Metadata common to all domain events.
 */
export interface EventMetadata {
  /** Unique event ID */
  readonly eventId: string;

  /** ISO 8601 timestamp */
  readonly timestamp: string;

  /** Identity that caused this event */
  readonly actor: string;

  /** ID of the event that caused this event (causal chain) */
  readonly causationId?: string;

  /** Groups related events, e.g. everything about one request */
  readonly correlationId: string;

  readonly source: EventSource;
}

/**
 * A domain event. Discriminated by `type`.
 */
export interface DomainEvent {
  /** Event type identifier (e.g. "factory.request.queued") */
  readonly type: string;

  readonly metadata: EventMetadata;

  /** Event-specific payload (opaque to the store, typed by consumers) */
  readonly payload: Readonly<Record<string, unknown>>;
}
