/**
 * Clocks in unix seconds.
 */

import type { Clock } from "@tranche/types";
import { SECONDS_PER_DAY } from "@tranche/types";

export class SystemClock implements Clock {
  now(): number {
    return Math.floor(Date.now() / 1000);
  }
}

/**
 * A clock that only moves when told to. Used by tests and the demo.
 */
export class ManualClock implements Clock {
  private _now: number;

  constructor(start = 0) {
    this._now = start;
  }

  now(): number {
    return this._now;
  }

  set(seconds: number): void {
    this._now = seconds;
  }

  advance(seconds: number): void {
    this._now += seconds;
  }

  advanceDays(days: number): void {
    this._now += days * SECONDS_PER_DAY;
  }
}
