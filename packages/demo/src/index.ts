#!/usr/bin/env node
/**
 * @tranche/demo — Interactive CLI walkthrough.
 *
 * Runs one vesting schedule through its life in your terminal:
 * fund custody -> create -> cliff -> release -> release -> revoke ->
 * custody check -> event log
 *
 * Uses the domain packages directly (no HTTP server) on a manual clock,
 * so a year of vesting plays out in seconds.
 */

import chalk from "chalk";
import { SECONDS_PER_DAY } from "@tranche/types";
import { InMemoryEventStore } from "@tranche/event-store";
import { CustodyTokenLedger, formatAmount } from "@tranche/ledger";
import { ManualClock, VestingError, VestingLedger } from "@tranche/vesting";

// =============================================================================
// Helpers
// =============================================================================

const DELAY_MS = 600;

/** 2025-01-01T00:00:00.000Z */
const START = 1_735_689_600;

const OWNER = "treasury-admin";
const CREATOR = "hr";
const BENEFICIARY = "alice";
const SYMBOL = "TRN";
const DECIMALS = 0;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function banner(): void {
  console.log();
  console.log(chalk.cyan.bold("  ╔══════════════════════════════════════════════════════════╗"));
  console.log(chalk.cyan.bold("  ║") + chalk.white.bold("                      TRANCHE DEMO                        ") + chalk.cyan.bold("║"));
  console.log(chalk.cyan.bold("  ║") + chalk.gray("           Linear token vesting with a cliff              ") + chalk.cyan.bold("║"));
  console.log(chalk.cyan.bold("  ╚══════════════════════════════════════════════════════════╝"));
  console.log();
}

function stepHeader(step: number, total: number, title: string): void {
  const prefix = chalk.cyan.bold(`  Step ${step}/${total}`);
  const line = chalk.gray("─".repeat(Math.max(2, 50 - title.length)));
  console.log(`\n${prefix}  ${chalk.white.bold(title)}  ${line}`);
}

function ok(msg: string): void {
  console.log(chalk.green("    ✓ ") + chalk.white(msg));
}

function info(label: string, value: string): void {
  console.log(chalk.gray("    → ") + chalk.gray(label.padEnd(16)) + chalk.white(value));
}

function hashLine(label: string, hash: string): void {
  const short = hash.length > 16 ? `${hash.slice(0, 16)}...${hash.slice(-8)}` : hash;
  console.log(chalk.gray("    → ") + chalk.gray(label.padEnd(16)) + chalk.yellow(short));
}

function warn(msg: string): void {
  console.log(chalk.yellow("    ! ") + chalk.yellow(msg));
}

function tokens(units: bigint): string {
  return `${formatAmount(units, DECIMALS)} ${SYMBOL}`;
}

function day(clock: ManualClock): string {
  const elapsed = Math.floor((clock.now() - START) / SECONDS_PER_DAY);
  return `day ${String(elapsed)} (${new Date(clock.now() * 1000).toISOString().slice(0, 10)})`;
}

const TOTAL_STEPS = 9;

// =============================================================================
// Demo
// =============================================================================

async function run(): Promise<void> {
  banner();
  console.log(chalk.gray("  1200 tokens, 30-day cliff, 365-day linear vesting."));
  console.log(chalk.gray("  Every step uses the real domain packages on a manual clock.\n"));

  await sleep(DELAY_MS);

  // ─── Step 1: Boot ───────────────────────────────────────────────────

  stepHeader(1, TOTAL_STEPS, "Boot");

  const clock = new ManualClock(START);
  const custody = new CustodyTokenLedger({
    currency: SYMBOL,
    decimals: DECIMALS,
    timestamp: () => new Date(clock.now() * 1000).toISOString(),
  });
  custody.fund(2000n);
  ok(`Custody funded with ${tokens(custody.custodyBalance())}`);

  const eventStore = new InMemoryEventStore();
  ok("EventStore initialized (InMemory, hash-chained)");

  const vesting = new VestingLedger({
    owner: OWNER,
    authorizedCreators: [CREATOR],
    tokenAddress: "trn-token",
    tokenLedger: custody,
    clock,
    eventStore,
  });
  info("owner", OWNER);
  info("creators", vesting.creators.join(", "));
  ok("Vesting ledger initialized");

  await sleep(DELAY_MS);

  // ─── Step 2: Create Schedule ────────────────────────────────────────

  stepHeader(2, TOTAL_STEPS, "Create Schedule");

  const schedule = await vesting.createSchedule(
    CREATOR,
    BENEFICIARY,
    1200n,
    30 * SECONDS_PER_DAY,
    365 * SECONDS_PER_DAY,
  );
  info("beneficiary", schedule.beneficiary);
  info("total", tokens(schedule.totalAmount));
  info("cliff", "30 days");
  info("vesting", "365 days");
  info("start", day(clock));
  ok(`Created by ${CREATOR}`);

  await sleep(DELAY_MS);

  // ─── Step 3: Before the Cliff ───────────────────────────────────────

  stepHeader(3, TOTAL_STEPS, "Before the Cliff");

  clock.advanceDays(29);
  info("now", day(clock));
  info("vested", tokens(vesting.vestedAmount(BENEFICIARY)));
  try {
    await vesting.release(BENEFICIARY, BENEFICIARY);
    warn("Release went through before the cliff (unexpected)");
  } catch (err) {
    if (!(err instanceof VestingError)) throw err;
    ok(`Release refused: ${chalk.bold(err.code)}`);
  }

  await sleep(DELAY_MS);

  // ─── Step 4: Cliff Reached ──────────────────────────────────────────

  stepHeader(4, TOTAL_STEPS, "Cliff Reached");

  clock.advanceDays(1);
  info("now", day(clock));
  info("vested", tokens(vesting.vestedAmount(BENEFICIARY)));
  const first = await vesting.release(BENEFICIARY, BENEFICIARY);
  ok(`Released ${tokens(first)} to ${BENEFICIARY}`);

  await sleep(DELAY_MS);

  // ─── Step 5: Second Release ─────────────────────────────────────────

  stepHeader(5, TOTAL_STEPS, "Second Release");

  clock.advanceDays(70);
  info("now", day(clock));
  info("vested", tokens(vesting.vestedAmount(BENEFICIARY)));
  info("releasable", tokens(vesting.getReleasableAmount(BENEFICIARY)));
  const second = await vesting.release(OWNER, BENEFICIARY);
  ok(`Released ${tokens(second)} (requested by ${OWNER})`);

  await sleep(DELAY_MS);

  // ─── Step 6: Revoke ─────────────────────────────────────────────────

  stepHeader(6, TOTAL_STEPS, "Revoke");

  clock.advanceDays(82);
  info("now", day(clock));
  const revocation = await vesting.revoke(OWNER, BENEFICIARY);
  info("settled", tokens(revocation.settledAmount));
  info("forfeited", tokens(revocation.forfeitedAmount));
  ok("Schedule stopped; vested tokens paid out first");

  await sleep(DELAY_MS);

  // ─── Step 7: Custody ────────────────────────────────────────────────

  stepHeader(7, TOTAL_STEPS, "Custody Books");

  info("in custody", tokens(custody.custodyBalance()));
  info(`paid to ${BENEFICIARY}`, tokens(custody.paidTo(BENEFICIARY)));
  if (custody.isBalanced()) {
    ok("Trial balance: debits equal credits");
  } else {
    warn("Trial balance does not balance");
  }

  await sleep(DELAY_MS);

  // ─── Step 8: Event Log ──────────────────────────────────────────────

  stepHeader(8, TOTAL_STEPS, "Event Log");

  const allEvents = eventStore.readAll();
  info("events", `${allEvents.length} total`);
  console.log();
  for (const se of allEvents) {
    const line = JSON.stringify({
      position: se.globalPosition,
      type: se.event.type,
      stream: se.streamId,
      hash: se.hash.slice(0, 12) + "...",
    });
    console.log(chalk.gray("    ") + chalk.dim(line));
  }
  console.log();

  const integrity = eventStore.verifyIntegrity();
  const last = allEvents[allEvents.length - 1];
  if (last !== undefined) {
    hashLine("chain head", last.hash);
  }
  if (integrity.valid) {
    ok(`Hash chain verified through position ${String(integrity.lastVerifiedPosition)}`);
  } else {
    warn(`Hash chain broken: ${integrity.errors.length} error(s)`);
  }

  await sleep(DELAY_MS);

  // ─── Step 9: Summary ────────────────────────────────────────────────

  stepHeader(9, TOTAL_STEPS, "Summary");

  const stats = vesting.getStats();
  console.log();
  console.log(chalk.white("    Schedules:           ") + chalk.cyan.bold(`${stats.beneficiaryCount} (${stats.activeCount} active)`));
  console.log(chalk.white("    Committed:           ") + chalk.cyan.bold(tokens(stats.totalVesting)));
  console.log(chalk.white("    Released:            ") + chalk.cyan.bold(tokens(stats.totalReleased)));
  console.log(chalk.white("    Forfeited:           ") + chalk.cyan.bold(tokens(stats.totalForfeited)));
  console.log(chalk.white("    Events recorded:     ") + chalk.cyan.bold(String(allEvents.length)));
  console.log();
}

run().catch((err: unknown) => {
  console.error(chalk.red("\n  Demo failed:"), err);
  process.exit(1);
});
