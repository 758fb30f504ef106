/**
 * Tests for VestingService composition and logging.
 */

import { describe, it, expect } from "vitest";
import pino from "pino";
import { ManualClock, VestingError } from "@tranche/vesting";
import { VestingService } from "../src/services/vesting-service.js";
import { START, OWNER } from "./setup.js";

interface LogLine {
  level: number;
  msg: string;
  [key: string]: unknown;
}

function makeService(initialCustodyBalance: bigint) {
  const lines: LogLine[] = [];
  const logger = pino(
    { level: "debug" },
    {
      write(msg: string) {
        lines.push(JSON.parse(msg) as LogLine);
      },
    },
  );
  const clock = new ManualClock(START);
  const service = new VestingService({
    owner: OWNER,
    tokenAddress: "token-1",
    tokenSymbol: "TRN",
    tokenDecimals: 0,
    initialCustodyBalance,
    clock,
    logger,
  });
  return { service, clock, lines };
}

const schedule = {
  beneficiary: "alice",
  totalAmount: 1200n,
  cliffDurationDays: 30,
  vestingDurationDays: 365,
};

describe("VestingService", () => {
  it("converts durations from days to seconds", async () => {
    const { service } = makeService(10_000n);
    const created = await service.createSchedule(OWNER, schedule);

    expect(created.cliffDuration).toBe(2_592_000);
    expect(created.vestingDuration).toBe(31_536_000);
  });

  it("funds custody at startup", () => {
    const { service } = makeService(500n);
    expect(service.getCustody()).toEqual({
      currency: "TRN",
      decimals: 0,
      balance: "500",
      balanced: true,
    });
  });

  it("logs creations, releases and appended events", async () => {
    const { service, clock, lines } = makeService(10_000n);
    await service.createSchedule(OWNER, schedule);
    clock.advanceDays(30);
    await service.release("alice", "alice");

    expect(lines.map((l) => l.msg)).toEqual([
      "Event appended",
      "Schedule created",
      "Event appended",
      "Tokens released",
    ]);
    expect(lines[3]).toMatchObject({ level: 30, beneficiary: "alice", amount: "98" });
  });

  it("logs a failed settlement as a warning and rethrows", async () => {
    const { service, clock, lines } = makeService(10n);
    await service.createSchedule(OWNER, schedule);
    clock.advanceDays(30);

    await expect(service.release("alice", "alice")).rejects.toBeInstanceOf(VestingError);

    const warning = lines.find((l) => l.level === 40);
    expect(warning).toMatchObject({
      msg: "Settlement transfer failed",
      beneficiary: "alice",
      operation: "release",
      details: { amount: "98", reason: "INSUFFICIENT_CUSTODY_BALANCE" },
    });
  });

  it("reports releasable amounts at an explicit time", async () => {
    const { service } = makeService(10_000n);
    await service.createSchedule(OWNER, schedule);

    expect(service.getReleasable("alice", START + 182 * 86_400)).toEqual({
      vested: 598n,
      releasable: 598n,
      at: START + 182 * 86_400,
    });
  });

  it("is not ready after stop", () => {
    const { service } = makeService(0n);
    expect(service.checkReadiness().ready).toBe(true);

    service.stop();
    expect(service.checkReadiness().ready).toBe(false);
  });
});
