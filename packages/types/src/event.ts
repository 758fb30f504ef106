/**
 * Event Types
 *
 * Every state change of a vesting ledger is captured as a DomainEvent.
 *
 * Rules:
 * - Events are immutable after creation
 * - Every event has metadata (who, when, why)
 * - No UPDATE, no DELETE: only new events
 */

/** Subsystems that emit domain events. */
export type EventSource = "vesting" | "authority" | "custody";

/**
 * Metadata common to all domain events.
 */
export interface EventMetadata {
  readonly eventId: string;

  /** ISO 8601 timestamp */
  readonly timestamp: string;

  /** Identity of the caller that caused this event */
  readonly actor: string;

  /** ID of the event that caused this event (causal chain) */
  readonly causationId?: string;

  /** Groups the events written by one operation */
  readonly correlationId: string;

  readonly source: EventSource;
}

/**
 * A domain event, discriminated by `type`
 * (e.g., "vesting.schedule.created", "authority.ownership.transferred").
 */
export interface DomainEvent {
  readonly type: string;
  readonly metadata: EventMetadata;

  /** Event-specific payload. Amounts are decimal strings. */
  readonly payload: Readonly<Record<string, unknown>>;
}
