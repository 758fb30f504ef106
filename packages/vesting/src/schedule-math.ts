/**
 * Linear vesting with a cliff.
 *
 *   now <  start + cliff     → 0
 *   now >= start + duration  → total
 *   otherwise                → floor(total * (now - start) / duration)
 *
 * The cliff only gates the start of vesting. The curve's origin stays at
 * `startTime`, so the first release after the cliff includes the whole
 * cliff period.
 */

import type { VestingSchedule } from "@tranche/types";

export type ScheduleTerms = Pick<
  VestingSchedule,
  "totalAmount" | "startTime" | "cliffDuration" | "vestingDuration"
>;

export function vestedAt(terms: ScheduleTerms, now: number): bigint {
  if (now < terms.startTime + terms.cliffDuration) {
    return 0n;
  }
  if (now >= terms.startTime + terms.vestingDuration) {
    return terms.totalAmount;
  }
  return (terms.totalAmount * BigInt(now - terms.startTime)) / BigInt(terms.vestingDuration);
}

/**
 * Vested minus already released, never negative. A `now` earlier than
 * a previous release yields 0.
 */
export function releasableAt(schedule: ScheduleTerms & Pick<VestingSchedule, "releasedAmount">, now: number): bigint {
  const releasable = vestedAt(schedule, now) - schedule.releasedAmount;
  return releasable > 0n ? releasable : 0n;
}

/**
 * Durations must be non-negative safe integers, the vesting duration
 * positive and the cliff no longer than the vesting duration.
 */
export function areValidDurations(cliffDuration: number, vestingDuration: number): boolean {
  return (
    Number.isSafeInteger(cliffDuration) &&
    Number.isSafeInteger(vestingDuration) &&
    cliffDuration >= 0 &&
    vestingDuration > 0 &&
    cliffDuration <= vestingDuration
  );
}
