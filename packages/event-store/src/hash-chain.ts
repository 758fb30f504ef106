/**
 * @tranche/event-store — Hash chain for a tamper-evident event log.
 *
 * Each event is hashed with RFC 8785 (JCS) canonicalization + SHA-256,
 * including the previous event's hash:
 *
 *   event[1].hash = sha256(canonicalize(event[1]) + "genesis")
 *   event[n].hash = sha256(canonicalize(event[n]) + event[n-1].hash)
 *
 * Changing any event breaks the chain from that point forward.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type {
  EventStoreIntegrityResult,
  IntegrityError,
  StoredEvent,
  UnhashedStoredEvent,
} from "./types.js";

export const GENESIS_HASH = "genesis";

/**
 * Hex SHA-256 of an event's canonical record given its predecessor's hash.
 */
export function computeEventHash(event: UnhashedStoredEvent, previousHash: string): string {
  const content = canonicalize({
    event: {
      type: event.event.type,
      metadata: event.event.metadata,
      payload: event.event.payload,
    },
    streamId: event.streamId,
    version: event.version,
    globalPosition: event.globalPosition,
    appendedAt: event.appendedAt,
  });
  return createHash("sha256").update(content + previousHash).digest("hex");
}

/**
 * Verify a sequence of events in global position order.
 * Every broken link and every hash mismatch is reported.
 */
export function verifyHashChain(events: readonly StoredEvent[]): EventStoreIntegrityResult {
  const errors: IntegrityError[] = [];
  let expectedPrevious = GENESIS_HASH;
  let lastVerifiedPosition = 0;

  for (const event of events) {
    const position = event.globalPosition;

    if (event.previousHash !== expectedPrevious) {
      errors.push({
        position,
        reason: `previousHash mismatch at position ${String(position)}: expected "${expectedPrevious}", got "${event.previousHash}"`,
      });
    }

    const expectedHash = computeEventHash(event, event.previousHash);
    if (event.hash !== expectedHash) {
      errors.push({
        position,
        reason: `Hash mismatch at position ${String(position)}: expected "${expectedHash}", got "${event.hash}"`,
      });
    }

    expectedPrevious = event.hash;
    lastVerifiedPosition = position;
  }

  return { valid: errors.length === 0, lastVerifiedPosition, errors };
}
