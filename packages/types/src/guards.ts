/**
 * Runtime Type Guards
 *
 * Narrowing functions for Tranche domain types.
 * These enable safe runtime validation at system boundaries
 * (API inputs, deserialized snapshots, collaborator results).
 */

import type { Money, AccountRef, LedgerEntry, LedgerEntryType } from "./financial.js";
import type { DomainEvent, EventMetadata, EventSource } from "./event.js";
import type { AuthorityRole, Identity, TransferResult } from "./vesting.js";

// =============================================================================
// Financial guards
// =============================================================================

const ACCOUNT_TYPES = new Set(["asset", "liability", "income", "expense", "equity"]);
const ENTRY_TYPES = new Set<string>(["debit", "credit"]);

export function isMoney(value: unknown): value is Money {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.amount === "string" &&
    typeof v.currency === "string" &&
    typeof v.decimals === "number" &&
    Number.isInteger(v.decimals) &&
    v.decimals >= 0
  );
}

export function isAccountRef(value: unknown): value is AccountRef {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.id === "string" &&
    v.id.length > 0 &&
    typeof v.type === "string" &&
    ACCOUNT_TYPES.has(v.type) &&
    typeof v.name === "string"
  );
}

export function isLedgerEntryType(value: unknown): value is LedgerEntryType {
  return typeof value === "string" && ENTRY_TYPES.has(value);
}

export function isLedgerEntry(value: unknown): value is LedgerEntry {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.id === "string" &&
    typeof v.accountId === "string" &&
    isLedgerEntryType(v.type) &&
    isMoney(v.money) &&
    typeof v.timestamp === "string" &&
    typeof v.correlationId === "string"
  );
}

// =============================================================================
// Vesting guards
// =============================================================================

const MAX_IDENTITY_LENGTH = 128;
const ZERO_ADDRESS = /^0x0+$/i;
const AUTHORITY_ROLES = new Set<string>(["owner", "authorized-creator"]);

/**
 * A usable identity: non-empty, no whitespace, at most 128 characters,
 * and not a zero address ("0x000…0").
 */
export function isIdentity(value: unknown): value is Identity {
  return (
    typeof value === "string" &&
    value.length > 0 &&
    value.length <= MAX_IDENTITY_LENGTH &&
    /^\S+$/.test(value) &&
    !ZERO_ADDRESS.test(value)
  );
}

export function isAuthorityRole(value: unknown): value is AuthorityRole {
  return typeof value === "string" && AUTHORITY_ROLES.has(value);
}

export function isTransferResult(value: unknown): value is TransferResult {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  if (v.ok === true) {
    return v.reference === undefined || typeof v.reference === "string";
  }
  return v.ok === false && typeof v.reason === "string";
}

// =============================================================================
// Event guards
// =============================================================================

const EVENT_SOURCES = new Set<string>(["vesting", "authority", "custody"]);

function isEventSource(value: unknown): value is EventSource {
  return typeof value === "string" && EVENT_SOURCES.has(value);
}

export function isEventMetadata(value: unknown): value is EventMetadata {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.eventId === "string" &&
    typeof v.timestamp === "string" &&
    typeof v.actor === "string" &&
    typeof v.correlationId === "string" &&
    isEventSource(v.source)
  );
}

export function isDomainEvent(value: unknown): value is DomainEvent {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.type === "string" &&
    isEventMetadata(v.metadata) &&
    v.payload !== null &&
    typeof v.payload === "object"
  );
}
