/**
 * @tranche/vesting — Vesting schedule state machine.
 *
 * - VestingLedger: create, release, revoke, authority changes, snapshots
 * - Linear-with-cliff schedule math in bigint
 * - Role table behind the AuthorityLookup interface
 * - Per-beneficiary mutation serializer
 */

export { VestingLedger } from "./vesting-ledger.js";
export { AuthorityTable } from "./authority.js";
export type { AuthorityLookup, AuthoritySnapshot } from "./authority.js";
export { VestingError } from "./errors.js";
export type { VestingErrorCode } from "./errors.js";
export { SystemClock, ManualClock } from "./clock.js";
export { vestedAt, releasableAt, areValidDurations } from "./schedule-math.js";
export type { ScheduleTerms } from "./schedule-math.js";
export { KeyedSerializer } from "./serializer.js";
export type {
  VestingLedgerDeps,
  VestingLedgerOptions,
  RevocationResult,
  ScheduleSnapshot,
  VestingSnapshot,
} from "./types.js";
