/**
 * @tranche/event-store — In-memory EventStore.
 *
 * Per-stream arrays for stream reads plus one global log for readAll and
 * the hash chain. Subscribers are called synchronously after the batch
 * is committed; a throwing handler propagates to the appender.
 */

import type { DomainEvent } from "@tranche/types";
import type {
  AppendOptions,
  AppendResult,
  EventHandler,
  EventStore,
  EventStoreIntegrityResult,
  ExpectedVersion,
  ReadAllOptions,
  ReadOptions,
  StoredEvent,
  Subscription,
} from "./types.js";
import { EventStoreError } from "./types.js";
import { computeEventHash, GENESIS_HASH, verifyHashChain } from "./hash-chain.js";

export interface InMemoryEventStoreOptions {
  /** Source of `appendedAt`. Defaults to wall-clock time. */
  readonly timestamp?: (() => string) | undefined;
  /**
   * Called when a subscriber throws. Appends are already committed by then,
   * so a failing handler never fails the append or starves later handlers.
   */
  readonly onSubscriberError?: ((error: unknown, event: StoredEvent) => void) | undefined;
}

export class InMemoryEventStore implements EventStore {
  private readonly _streams = new Map<string, StoredEvent[]>();
  private readonly _globalLog: StoredEvent[] = [];
  private readonly _streamSubscribers = new Map<string, Set<EventHandler>>();
  private readonly _globalSubscribers = new Set<EventHandler>();
  private readonly _timestamp: () => string;
  private readonly _onSubscriberError: (error: unknown, event: StoredEvent) => void;
  private _lastHash: string = GENESIS_HASH;

  constructor(options?: InMemoryEventStoreOptions) {
    this._timestamp = options?.timestamp ?? (() => new Date().toISOString());
    this._onSubscriberError = options?.onSubscriberError ?? reportSubscriberError;
  }

  // ─── Append ─────────────────────────────────────────────────────────

  append(streamId: string, events: readonly DomainEvent[], options?: AppendOptions): AppendResult {
    this._validateStreamId(streamId);

    if (events.length === 0) {
      throw new EventStoreError("EMPTY_APPEND", "Cannot append zero events", streamId);
    }

    const currentVersion = this.streamVersion(streamId);
    this._checkExpectedVersion(streamId, currentVersion, options?.expectedVersion);

    let stream = this._streams.get(streamId);
    if (stream === undefined) {
      stream = [];
      this._streams.set(streamId, stream);
    }

    const fromVersion = currentVersion + 1;
    const appendedAt = this._timestamp();
    const stored: StoredEvent[] = [];

    events.forEach((event, i) => {
      const base = {
        event: { type: event.type, metadata: event.metadata, payload: event.payload },
        streamId,
        version: fromVersion + i,
        globalPosition: this._globalLog.length + 1,
        appendedAt,
      };
      const previousHash = this._lastHash;
      const record: StoredEvent = { ...base, hash: computeEventHash(base, previousHash), previousHash };

      this._lastHash = record.hash;
      stream.push(record);
      this._globalLog.push(record);
      stored.push(record);
    });

    this._dispatch(streamId, stored);

    return {
      streamId,
      fromVersion,
      toVersion: fromVersion + events.length - 1,
      count: events.length,
    };
  }

  private _checkExpectedVersion(
    streamId: string,
    currentVersion: number,
    expected: ExpectedVersion | undefined,
  ): void {
    if (expected === undefined || expected === "any") return;

    if (expected === "no_stream") {
      if (currentVersion !== 0) {
        throw new EventStoreError(
          "CONCURRENCY_CONFLICT",
          `Stream "${streamId}" already exists (version ${String(currentVersion)}), expected no_stream`,
          streamId,
        );
      }
      return;
    }

    if (currentVersion !== expected) {
      throw new EventStoreError(
        "CONCURRENCY_CONFLICT",
        `Stream "${streamId}" is at version ${String(currentVersion)}, expected ${String(expected)}`,
        streamId,
      );
    }
  }

  // ─── Read ───────────────────────────────────────────────────────────

  read(streamId: string, options?: ReadOptions): readonly StoredEvent[] {
    this._validateStreamId(streamId);

    const stream = this._streams.get(streamId);
    if (stream === undefined) {
      return [];
    }

    const backward = options?.direction === "backward";
    const from = options?.fromVersion ?? (backward ? stream.length : 1);
    if (from < 1) {
      throw new EventStoreError("INVALID_VERSION", `fromVersion must be >= 1, got ${String(from)}`, streamId);
    }

    const selected = backward
      ? stream.filter((e) => e.version <= from).reverse()
      : stream.filter((e) => e.version >= from);
    return limit(selected, options?.maxCount);
  }

  readAll(options?: ReadAllOptions): readonly StoredEvent[] {
    const backward = options?.direction === "backward";
    const from = options?.fromPosition ?? (backward ? this._globalLog.length : 1);

    const selected = backward
      ? this._globalLog.filter((e) => e.globalPosition <= from).reverse()
      : this._globalLog.filter((e) => e.globalPosition >= from);
    return limit(selected, options?.maxCount);
  }

  // ─── Subscriptions ──────────────────────────────────────────────────

  subscribe(streamId: string, handler: EventHandler): Subscription {
    this._validateStreamId(streamId);

    let subscribers = this._streamSubscribers.get(streamId);
    if (subscribers === undefined) {
      subscribers = new Set();
      this._streamSubscribers.set(streamId, subscribers);
    }
    const set = subscribers;
    set.add(handler);

    return {
      unsubscribe: () => {
        set.delete(handler);
        if (set.size === 0) {
          this._streamSubscribers.delete(streamId);
        }
      },
    };
  }

  subscribeAll(handler: EventHandler): Subscription {
    this._globalSubscribers.add(handler);
    return {
      unsubscribe: () => {
        this._globalSubscribers.delete(handler);
      },
    };
  }

  // ─── Query ──────────────────────────────────────────────────────────

  streamExists(streamId: string): boolean {
    return this.streamVersion(streamId) > 0;
  }

  streamVersion(streamId: string): number {
    return this._streams.get(streamId)?.length ?? 0;
  }

  globalPosition(): number {
    return this._globalLog.length;
  }

  /** Stream IDs in order of first append. */
  streamIds(): readonly string[] {
    return [...this._streams.keys()];
  }

  verifyIntegrity(): EventStoreIntegrityResult {
    return verifyHashChain(this._globalLog);
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _validateStreamId(streamId: string): void {
    if (streamId.length === 0) {
      throw new EventStoreError("INVALID_STREAM_ID", "Stream ID must be a non-empty string");
    }
  }

  private _dispatch(streamId: string, events: readonly StoredEvent[]): void {
    const handlers = [...(this._streamSubscribers.get(streamId) ?? []), ...this._globalSubscribers];
    for (const handler of handlers) {
      for (const event of events) {
        try {
          handler(event);
        } catch (error) {
          this._onSubscriberError(error, event);
        }
      }
    }
  }
}

function reportSubscriberError(error: unknown, event: StoredEvent): void {
  console.error(`Event subscriber failed on ${event.streamId}#${String(event.version)}:`, error);
}

function limit(events: StoredEvent[], maxCount: number | undefined): StoredEvent[] {
  return maxCount !== undefined && maxCount >= 0 ? events.slice(0, maxCount) : events;
}
