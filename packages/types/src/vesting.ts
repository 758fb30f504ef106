/**
 * Vesting Types
 *
 * Schedules, authority roles and the two collaborators the vesting core
 * depends on: a token ledger that moves tokens, and a clock.
 *
 * Times are unix seconds. Token amounts are bigint base units.
 */

/**
 * An account identity: a beneficiary, an administrator or the owner.
 * Usually an address, but any non-blank token without whitespace is accepted.
 */
export type Identity = string;

/** Seconds in one day. Boundary operations take durations in days. */
export const SECONDS_PER_DAY = 86_400;

// =============================================================================
// Schedule
// =============================================================================

/**
 * One beneficiary's vesting schedule.
 *
 * Only `releasedAmount`, `isActive` and `revokedAt` ever change.
 */
export interface VestingSchedule {
  readonly beneficiary: Identity;
  readonly totalAmount: bigint;
  readonly startTime: number;
  readonly cliffDuration: number;
  readonly vestingDuration: number;
  readonly releasedAmount: bigint;
  readonly isActive: boolean;
  readonly revokedAt?: number | undefined;
}

/**
 * Aggregate counters over all schedules ever created.
 */
export interface VestingStats {
  /** Length of the append-only beneficiary registry */
  readonly beneficiaryCount: number;
  /** Schedules currently active */
  readonly activeCount: number;
  readonly totalVesting: bigint;
  readonly totalReleased: bigint;
  readonly totalForfeited: bigint;
}

// =============================================================================
// Authority
// =============================================================================

export type AuthorityRole = "owner" | "authorized-creator";

// =============================================================================
// Collaborators
// =============================================================================

export type TransferResult =
  | { readonly ok: true; readonly reference?: string | undefined }
  | { readonly ok: false; readonly reason: string };

/**
 * External capability that moves tokens out of custody.
 *
 * The vesting core treats anything but `{ ok: true }` (including a
 * rejected promise) as a failed transfer and applies no accounting.
 */
export interface TokenLedger {
  transfer(to: Identity, amount: bigint): Promise<TransferResult>;
}

/**
 * Source of the current time, in unix seconds.
 */
export interface Clock {
  now(): number;
}
