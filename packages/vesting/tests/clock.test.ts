/**
 * Tests for clocks.
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import { ManualClock, SystemClock } from "../src/clock.js";

describe("SystemClock", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("returns whole unix seconds", () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2025-01-01T00:00:00.750Z"));

    expect(new SystemClock().now()).toBe(1_735_689_600);
  });
});

describe("ManualClock", () => {
  it("moves only when told to", () => {
    const clock = new ManualClock(100);
    expect(clock.now()).toBe(100);

    clock.advance(20);
    expect(clock.now()).toBe(120);

    clock.advanceDays(2);
    expect(clock.now()).toBe(120 + 2 * 86_400);

    clock.set(5);
    expect(clock.now()).toBe(5);
  });

  it("starts at zero by default", () => {
    expect(new ManualClock().now()).toBe(0);
  });
});
