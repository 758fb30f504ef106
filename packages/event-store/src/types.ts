/**
 * @tranche/event-store — Core types.
 *
 * - Events are immutable after creation
 * - Streams are append-only
 * - Versions are contiguous within a stream, positions across the store
 * - Optimistic concurrency through an expected version
 * - Every stored event is linked into one SHA-256 hash chain
 */

import type { DomainEvent } from "@tranche/types";

// =============================================================================
// Stored Event
// =============================================================================

/**
 * Store-level record before it is hashed into the chain.
 */
export interface UnhashedStoredEvent {
  readonly event: DomainEvent;

  readonly streamId: string;

  /** Position within the stream (1-based) */
  readonly version: number;

  /** Position across all streams (1-based) */
  readonly globalPosition: number;

  /** When this event was persisted (store-level, not domain-level) */
  readonly appendedAt: string;
}

export interface StoredEvent extends UnhashedStoredEvent {
  /** SHA-256 over the canonical record plus `previousHash` */
  readonly hash: string;

  /** Hash of the event at the previous global position, or "genesis" */
  readonly previousHash: string;
}

// =============================================================================
// Append / Read
// =============================================================================

/**
 * - A number: the stream must be at exactly this version
 * - "no_stream": the stream must not exist
 * - "any": no check
 */
export type ExpectedVersion = number | "no_stream" | "any";

export interface AppendOptions {
  readonly expectedVersion?: ExpectedVersion;
}

export interface AppendResult {
  readonly streamId: string;
  readonly fromVersion: number;
  readonly toVersion: number;
  readonly count: number;
}

export type ReadDirection = "forward" | "backward";

export interface ReadOptions {
  /** Inclusive, 1-based. Default: 1 forward, stream head backward */
  readonly fromVersion?: number;
  readonly maxCount?: number;
  readonly direction?: ReadDirection;
}

export interface ReadAllOptions {
  /** Inclusive. Default: 1 forward, last position backward */
  readonly fromPosition?: number;
  readonly maxCount?: number;
  readonly direction?: ReadDirection;
}

// =============================================================================
// Subscription
// =============================================================================

export type EventHandler = (event: StoredEvent) => void;

export interface Subscription {
  unsubscribe(): void;
}

// =============================================================================
// Integrity
// =============================================================================

export interface IntegrityError {
  readonly position: number;
  readonly reason: string;
}

export interface EventStoreIntegrityResult {
  readonly valid: boolean;
  /** Global position of the last event checked, 0 for an empty store */
  readonly lastVerifiedPosition: number;
  readonly errors: readonly IntegrityError[];
}

// =============================================================================
// Event Store Interface
// =============================================================================

export interface EventStore {
  /**
   * Append events to a stream in order.
   *
   * @throws EventStoreError on an empty batch, an empty stream ID or a
   *   failed concurrency check
   */
  append(streamId: string, events: readonly DomainEvent[], options?: AppendOptions): AppendResult;

  /** Events of one stream. Empty when the stream does not exist. */
  read(streamId: string, options?: ReadOptions): readonly StoredEvent[];

  /** Events of every stream in global order. */
  readAll(options?: ReadAllOptions): readonly StoredEvent[];

  subscribe(streamId: string, handler: EventHandler): Subscription;

  subscribeAll(handler: EventHandler): Subscription;

  streamExists(streamId: string): boolean;

  /** Version of the last event in the stream, 0 if none. */
  streamVersion(streamId: string): number;

  /** Position of the last event in the store, 0 if empty. */
  globalPosition(): number;

  verifyIntegrity(): EventStoreIntegrityResult;
}

// =============================================================================
// Errors
// =============================================================================

export type EventStoreErrorCode =
  | "CONCURRENCY_CONFLICT"
  | "INVALID_STREAM_ID"
  | "EMPTY_APPEND"
  | "INVALID_VERSION";

export class EventStoreError extends Error {
  constructor(
    public readonly code: EventStoreErrorCode,
    message: string,
    public readonly streamId?: string,
  ) {
    super(message);
    this.name = "EventStoreError";
  }
}
