/**
 * Vesting ledger options, results and snapshots.
 */

import type { Clock, Identity, TokenLedger } from "@tranche/types";
import type { EventStore } from "@tranche/event-store";
import type { AuthoritySnapshot } from "./authority.js";

/**
 * Collaborators of a VestingLedger.
 */
export interface VestingLedgerDeps {
  readonly tokenLedger: TokenLedger;
  readonly clock: Clock;
  /** Receives every vesting and authority event. Defaults to an in-memory store. */
  readonly eventStore?: EventStore | undefined;
  /** Source of event and correlation IDs. Defaults to randomUUID. */
  readonly idGenerator?: (() => string) | undefined;
}

export interface VestingLedgerOptions extends VestingLedgerDeps {
  readonly owner: Identity;
  readonly tokenAddress: string;
  readonly authorizedCreators?: readonly Identity[] | undefined;
}

export interface RevocationResult {
  readonly beneficiary: Identity;
  /** Tokens paid out by the settlement step, 0n when nothing was releasable */
  readonly settledAmount: bigint;
  /** Unvested remainder that will never be released */
  readonly forfeitedAmount: bigint;
  readonly revokedAt: number;
}

// ─── Snapshot ────────────────────────────────────────────────────────────

export interface ScheduleSnapshot {
  readonly beneficiary: Identity;
  readonly totalAmount: string;
  readonly startTime: number;
  readonly cliffDuration: number;
  readonly vestingDuration: number;
  readonly releasedAmount: string;
  readonly isActive: boolean;
  readonly revokedAt?: number | undefined;
}

/**
 * Serializable ledger state. Amounts are decimal strings of base units.
 */
export interface VestingSnapshot {
  readonly version: 1;
  readonly authority: AuthoritySnapshot;
  readonly tokenAddress: string;
  readonly schedules: readonly ScheduleSnapshot[];
  readonly registry: readonly Identity[];
  readonly totals: {
    readonly vesting: string;
    readonly released: string;
    readonly forfeited: string;
  };
}
