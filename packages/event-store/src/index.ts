/**
 * @tranche/event-store — Append-only, hash-chained event persistence.
 *
 * - EventStore interface with streams, global positions and
 *   optimistic concurrency
 * - InMemoryEventStore
 * - SHA-256 hash chain over RFC 8785 canonical JSON
 * - Vesting and authority event definitions
 *
 * @packageDocumentation
 */

export type {
  StoredEvent,
  UnhashedStoredEvent,
  ExpectedVersion,
  AppendOptions,
  AppendResult,
  ReadDirection,
  ReadOptions,
  ReadAllOptions,
  EventHandler,
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

export { VESTING_EVENTS, AUTHORITY_STREAM, scheduleStreamId } from "./vesting-events.js";
export type {
  VestingEventType,
  ScheduleCreatedPayload,
  TokensReleasedPayload,
  ScheduleRevokedPayload,
  OwnershipTransferredPayload,
  TokenAddressUpdatedPayload,
  RoleChangedPayload,
} from "./vesting-events.js";
