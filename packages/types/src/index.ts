/**
 * @tranche/types — Shared domain types for the Tranche stack.
 *
 * - Vesting schedules, stats and authority roles
 * - Collaborator contracts (TokenLedger, Clock)
 * - Financial primitives for the custody ledger (Money, entries, accounts)
 * - Event architecture
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No methods that mutate state
 */

// Vesting types
export type {
  Identity,
  VestingSchedule,
  VestingStats,
  AuthorityRole,
  TransferResult,
  TokenLedger,
  Clock,
} from "./vesting.js";
export { SECONDS_PER_DAY } from "./vesting.js";

// Financial types
export type {
  Money,
  Currency,
  LedgerEntry,
  LedgerEntryType,
  AccountRef,
} from "./financial.js";

// Event types
export type {
  DomainEvent,
  EventMetadata,
  EventSource,
} from "./event.js";

// Runtime type guards
export {
  isMoney,
  isAccountRef,
  isLedgerEntryType,
  isLedgerEntry,
  isIdentity,
  isAuthorityRole,
  isTransferResult,
  isEventMetadata,
  isDomainEvent,
} from "./guards.js";
