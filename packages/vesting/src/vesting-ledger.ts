/**
 * VestingLedger — linear token vesting with a cliff.
 *
 * Owns every schedule, the beneficiary registry, the aggregate counters
 * and the role table. Mutations are serialized per beneficiary
 * (authority mutations on their own key) and commit synchronously after
 * the only suspension point, the token transfer. A transfer that does not
 * report success aborts the mutation with no accounting change.
 *
 * Schedule events go to stream `schedule:<beneficiary>`, authority events
 * to stream `authority`.
 */

import { randomUUID } from "node:crypto";
import type {
  Clock,
  DomainEvent,
  EventSource,
  Identity,
  TokenLedger,
  VestingSchedule,
  VestingStats,
} from "@tranche/types";
import { isIdentity, isTransferResult } from "@tranche/types";
import type {
  EventStore,
  OwnershipTransferredPayload,
  RoleChangedPayload,
  ScheduleCreatedPayload,
  ScheduleRevokedPayload,
  TokenAddressUpdatedPayload,
  TokensReleasedPayload,
} from "@tranche/event-store";
import {
  AUTHORITY_STREAM,
  InMemoryEventStore,
  VESTING_EVENTS,
  scheduleStreamId,
} from "@tranche/event-store";
import type { AuthorityLookup } from "./authority.js";
import { AuthorityTable } from "./authority.js";
import { VestingError } from "./errors.js";
import { areValidDurations, releasableAt, vestedAt } from "./schedule-math.js";
import { KeyedSerializer } from "./serializer.js";
import type {
  RevocationResult,
  ScheduleSnapshot,
  VestingLedgerDeps,
  VestingLedgerOptions,
  VestingSnapshot,
} from "./types.js";

/** Serializer key for role and token-address changes. */
const AUTHORITY_KEY = "\u0000authority";

interface ScheduleRecord {
  readonly beneficiary: Identity;
  readonly totalAmount: bigint;
  readonly startTime: number;
  readonly cliffDuration: number;
  readonly vestingDuration: number;
  releasedAmount: bigint;
  isActive: boolean;
  revokedAt?: number | undefined;
}

/** Events of one operation, written together once it commits. */
interface PendingEvent {
  readonly type: string;
  readonly payload: object;
}

export class VestingLedger {
  private readonly _authority: AuthorityTable;
  private readonly _tokenLedger: TokenLedger;
  private readonly _clock: Clock;
  private readonly _eventStore: EventStore;
  private readonly _newId: () => string;
  private readonly _serializer = new KeyedSerializer();

  private _tokenAddress: string;
  private readonly _schedules = new Map<Identity, ScheduleRecord>();
  private readonly _registry: Identity[] = [];
  private _activeCount = 0;
  private _totalVesting = 0n;
  private _totalReleased = 0n;
  private _totalForfeited = 0n;

  constructor(options: VestingLedgerOptions) {
    if (!isIdentity(options.tokenAddress)) {
      throw new VestingError("INVALID_ADDRESS", `Invalid token address: "${options.tokenAddress}"`);
    }
    this._authority = new AuthorityTable(options.owner, options.authorizedCreators);
    this._tokenAddress = options.tokenAddress;
    this._tokenLedger = options.tokenLedger;
    this._clock = options.clock;
    this._eventStore = options.eventStore ?? new InMemoryEventStore();
    this._newId = options.idGenerator ?? randomUUID;
  }

  get authority(): AuthorityLookup {
    return this._authority;
  }

  get creators(): readonly Identity[] {
    return this._authority.creators;
  }

  get tokenAddress(): string {
    return this._tokenAddress;
  }

  get eventStore(): EventStore {
    return this._eventStore;
  }

  // ─── Schedules ───────────────────────────────────────────────────────

  /**
   * Create a schedule starting now. Checks run in this order:
   * UNAUTHORIZED, INVALID_BENEFICIARY, INVALID_AMOUNT, INVALID_DURATION,
   * SCHEDULE_ALREADY_ACTIVE.
   *
   * @param cliffDuration - seconds
   * @param vestingDuration - seconds
   */
  createSchedule(
    caller: Identity,
    beneficiary: Identity,
    totalAmount: bigint,
    cliffDuration: number,
    vestingDuration: number,
  ): Promise<VestingSchedule> {
    return this._serializer.run(beneficiary, async () => {
      this._requireAdministrator(caller, "create schedules");
      if (!isIdentity(beneficiary)) {
        throw new VestingError("INVALID_BENEFICIARY", `Invalid beneficiary: "${beneficiary}"`);
      }
      if (totalAmount <= 0n) {
        throw new VestingError("INVALID_AMOUNT", `Total amount must be positive, got ${totalAmount.toString()}`);
      }
      if (!areValidDurations(cliffDuration, vestingDuration)) {
        throw new VestingError(
          "INVALID_DURATION",
          `Invalid durations: cliff ${String(cliffDuration)}s, vesting ${String(vestingDuration)}s`,
          { cliffDuration, vestingDuration },
        );
      }
      if (this._schedules.get(beneficiary)?.isActive === true) {
        throw new VestingError("SCHEDULE_ALREADY_ACTIVE", `Beneficiary "${beneficiary}" already has an active schedule`);
      }

      const record: ScheduleRecord = {
        beneficiary,
        totalAmount,
        startTime: this._time(undefined),
        cliffDuration,
        vestingDuration,
        releasedAmount: 0n,
        isActive: true,
      };

      this._schedules.set(beneficiary, record);
      this._registry.push(beneficiary);
      this._activeCount += 1;
      this._totalVesting += totalAmount;

      const payload: ScheduleCreatedPayload = {
        beneficiary,
        totalAmount: totalAmount.toString(),
        startTime: record.startTime,
        cliffDuration,
        vestingDuration,
      };
      this._emit(scheduleStreamId(beneficiary), "vesting", caller, [
        { type: VESTING_EVENTS.SCHEDULE_CREATED, payload },
      ]);

      return toSchedule(record);
    });
  }

  /**
   * Tokens vested at `now` (default: the clock). 0 without an active schedule.
   */
  vestedAmount(beneficiary: Identity, now?: number): bigint {
    const record = this._schedules.get(beneficiary);
    if (record === undefined || !record.isActive) return 0n;
    return vestedAt(record, this._time(now));
  }

  getReleasableAmount(beneficiary: Identity, now?: number): bigint {
    const record = this._schedules.get(beneficiary);
    if (record === undefined || !record.isActive) return 0n;
    return releasableAt(record, this._time(now));
  }

  /**
   * Pay out everything vested and not yet released.
   * Callable by the beneficiary or an administrator.
   *
   * @returns the amount released
   */
  release(caller: Identity, beneficiary: Identity, now?: number): Promise<bigint> {
    return this._serializer.run(beneficiary, async () => {
      if (caller !== beneficiary && !this._authority.isAdministrator(caller)) {
        throw new VestingError("UNAUTHORIZED", `"${caller}" may not release for "${beneficiary}"`);
      }
      const record = this._requireActive(beneficiary);
      const amount = releasableAt(record, this._time(now));
      if (amount <= 0n) {
        throw new VestingError("NOTHING_TO_RELEASE", `Nothing to release for "${beneficiary}"`);
      }

      const reference = await this._transfer(beneficiary, amount);

      const event = this._applyRelease(record, amount, reference);
      this._emit(scheduleStreamId(beneficiary), "vesting", caller, [event]);
      return amount;
    });
  }

  /**
   * Settle anything releasable, then stop the schedule for good.
   * A failed settlement transfer leaves the schedule active.
   */
  revoke(caller: Identity, beneficiary: Identity, now?: number): Promise<RevocationResult> {
    return this._serializer.run(beneficiary, async () => {
      this._requireAdministrator(caller, "revoke schedules");
      const record = this._requireActive(beneficiary);
      const at = this._time(now);
      const settledAmount = releasableAt(record, at);

      const events: PendingEvent[] = [];
      if (settledAmount > 0n) {
        const reference = await this._transfer(beneficiary, settledAmount);
        events.push(this._applyRelease(record, settledAmount, reference));
      }

      const forfeitedAmount = record.totalAmount - record.releasedAmount;
      record.isActive = false;
      record.revokedAt = at;
      this._activeCount -= 1;
      this._totalForfeited += forfeitedAmount;

      const payload: ScheduleRevokedPayload = {
        beneficiary,
        settledAmount: settledAmount.toString(),
        forfeitedAmount: forfeitedAmount.toString(),
        revokedAt: at,
      };
      events.push({ type: VESTING_EVENTS.SCHEDULE_REVOKED, payload });
      this._emit(scheduleStreamId(beneficiary), "vesting", caller, events);

      return { beneficiary, settledAmount, forfeitedAmount, revokedAt: at };
    });
  }

  getSchedule(beneficiary: Identity): VestingSchedule | undefined {
    const record = this._schedules.get(beneficiary);
    return record === undefined ? undefined : toSchedule(record);
  }

  getStats(): VestingStats {
    return {
      beneficiaryCount: this._registry.length,
      activeCount: this._activeCount,
      totalVesting: this._totalVesting,
      totalReleased: this._totalReleased,
      totalForfeited: this._totalForfeited,
    };
  }

  /** Every beneficiary ever given a schedule, in creation order. */
  listBeneficiaries(): readonly Identity[] {
    return [...this._registry];
  }

  // ─── Authority ───────────────────────────────────────────────────────

  transferOwnership(caller: Identity, newOwner: Identity): Promise<void> {
    return this._serializer.run(AUTHORITY_KEY, async () => {
      this._requireOwner(caller, "transfer ownership");
      const previousOwner = this._authority.transferOwnership(newOwner);

      const payload: OwnershipTransferredPayload = { previousOwner, newOwner };
      this._emit(AUTHORITY_STREAM, "authority", caller, [
        { type: VESTING_EVENTS.OWNERSHIP_TRANSFERRED, payload },
      ]);
    });
  }

  updateTokenAddress(caller: Identity, newAddress: string): Promise<void> {
    return this._serializer.run(AUTHORITY_KEY, async () => {
      this._requireOwner(caller, "update the token address");
      if (!isIdentity(newAddress)) {
        throw new VestingError("INVALID_ADDRESS", `Invalid token address: "${newAddress}"`);
      }
      const previousAddress = this._tokenAddress;
      this._tokenAddress = newAddress;

      const payload: TokenAddressUpdatedPayload = { previousAddress, newAddress };
      this._emit(AUTHORITY_STREAM, "authority", caller, [
        { type: VESTING_EVENTS.TOKEN_UPDATED, payload },
      ]);
    });
  }

  /**
   * Grant the authorized-creator role.
   * @returns false when the identity already held it (no event)
   */
  grantCreator(caller: Identity, identity: Identity): Promise<boolean> {
    return this._serializer.run(AUTHORITY_KEY, async () => {
      this._requireOwner(caller, "grant roles");
      if (!this._authority.grantCreator(identity)) return false;

      const payload: RoleChangedPayload = { identity, role: "authorized-creator" };
      this._emit(AUTHORITY_STREAM, "authority", caller, [{ type: VESTING_EVENTS.ROLE_GRANTED, payload }]);
      return true;
    });
  }

  /**
   * Revoke the authorized-creator role.
   * @returns false when the identity did not hold it (no event)
   */
  revokeCreator(caller: Identity, identity: Identity): Promise<boolean> {
    return this._serializer.run(AUTHORITY_KEY, async () => {
      this._requireOwner(caller, "revoke roles");
      if (!this._authority.revokeCreator(identity)) return false;

      const payload: RoleChangedPayload = { identity, role: "authorized-creator" };
      this._emit(AUTHORITY_STREAM, "authority", caller, [{ type: VESTING_EVENTS.ROLE_REVOKED, payload }]);
      return true;
    });
  }

  // ─── Snapshot ────────────────────────────────────────────────────────

  snapshot(): VestingSnapshot {
    return {
      version: 1,
      authority: this._authority.snapshot(),
      tokenAddress: this._tokenAddress,
      schedules: [...this._schedules.values()].map(toScheduleSnapshot),
      registry: [...this._registry],
      totals: {
        vesting: this._totalVesting.toString(),
        released: this._totalReleased.toString(),
        forfeited: this._totalForfeited.toString(),
      },
    };
  }

  /**
   * Rebuild a ledger from `snapshot()` output. The snapshot is checked
   * against the ledger's own invariants first; anything a live ledger
   * could not have produced throws INVALID_SNAPSHOT.
   */
  static fromSnapshot(snapshot: VestingSnapshot, deps: VestingLedgerDeps): VestingLedger {
    validateSnapshot(snapshot);
    const ledger = new VestingLedger({
      ...deps,
      owner: snapshot.authority.owner,
      authorizedCreators: snapshot.authority.creators,
      tokenAddress: snapshot.tokenAddress,
    });

    for (const s of snapshot.schedules) {
      ledger._schedules.set(s.beneficiary, {
        beneficiary: s.beneficiary,
        totalAmount: BigInt(s.totalAmount),
        startTime: s.startTime,
        cliffDuration: s.cliffDuration,
        vestingDuration: s.vestingDuration,
        releasedAmount: BigInt(s.releasedAmount),
        isActive: s.isActive,
        revokedAt: s.revokedAt,
      });
      if (s.isActive) ledger._activeCount += 1;
    }
    ledger._registry.push(...snapshot.registry);
    ledger._totalVesting = BigInt(snapshot.totals.vesting);
    ledger._totalReleased = BigInt(snapshot.totals.released);
    ledger._totalForfeited = BigInt(snapshot.totals.forfeited);

    return ledger;
  }

  // ─── Internal ────────────────────────────────────────────────────────

  private _time(now: number | undefined): number {
    return Math.floor(now ?? this._clock.now());
  }

  private _requireAdministrator(caller: Identity, action: string): void {
    if (!this._authority.isAdministrator(caller)) {
      throw new VestingError("UNAUTHORIZED", `"${caller}" is not allowed to ${action}`);
    }
  }

  private _requireOwner(caller: Identity, action: string): void {
    if (!this._authority.isOwner(caller)) {
      throw new VestingError("UNAUTHORIZED", `Only the owner may ${action}`);
    }
  }

  private _requireActive(beneficiary: Identity): ScheduleRecord {
    const record = this._schedules.get(beneficiary);
    if (record === undefined || !record.isActive) {
      throw new VestingError("NO_ACTIVE_SCHEDULE", `No active schedule for "${beneficiary}"`);
    }
    return record;
  }

  /**
   * Call the token ledger. Anything but a well-formed `{ ok: true }`
   * becomes TRANSFER_FAILED.
   *
   * @returns the transfer reference, if the ledger gave one
   */
  private async _transfer(beneficiary: Identity, amount: bigint): Promise<string | undefined> {
    let result: unknown;
    try {
      result = await this._tokenLedger.transfer(beneficiary, amount);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new VestingError("TRANSFER_FAILED", `Transfer to "${beneficiary}" failed: ${reason}`, {
        amount: amount.toString(),
        reason,
      });
    }

    if (!isTransferResult(result)) {
      throw new VestingError("TRANSFER_FAILED", `Transfer to "${beneficiary}" returned an invalid result`, {
        amount: amount.toString(),
      });
    }
    if (!result.ok) {
      throw new VestingError("TRANSFER_FAILED", `Transfer to "${beneficiary}" failed: ${result.reason}`, {
        amount: amount.toString(),
        reason: result.reason,
      });
    }
    return result.reference;
  }

  private _applyRelease(record: ScheduleRecord, amount: bigint, reference: string | undefined): PendingEvent {
    record.releasedAmount += amount;
    this._totalReleased += amount;

    const payload: TokensReleasedPayload = {
      beneficiary: record.beneficiary,
      amount: amount.toString(),
      releasedAmount: record.releasedAmount.toString(),
      ...(reference === undefined ? {} : { reference }),
    };
    return { type: VESTING_EVENTS.TOKENS_RELEASED, payload };
  }

  private _emit(streamId: string, source: EventSource, actor: Identity, pending: readonly PendingEvent[]): void {
    const correlationId = this._newId();
    const timestamp = new Date(this._time(undefined) * 1000).toISOString();

    const events: DomainEvent[] = pending.map((p) => ({
      type: p.type,
      metadata: { eventId: this._newId(), timestamp, actor, correlationId, source },
      payload: { ...p.payload },
    }));
    this._eventStore.append(streamId, events);
  }
}

// ─── Snapshot validation ─────────────────────────────────────────────────

const AMOUNT_PATTERN = /^\d+$/;

function invalidSnapshot(message: string, details?: Readonly<Record<string, unknown>>): VestingError {
  return new VestingError("INVALID_SNAPSHOT", `Invalid snapshot: ${message}`, details);
}

function parseAmount(value: unknown, field: string): bigint {
  if (typeof value !== "string" || !AMOUNT_PATTERN.test(value)) {
    throw invalidSnapshot(`${field} must be a decimal string of base units`, { field, value });
  }
  return BigInt(value);
}

function isTimestamp(value: unknown): value is number {
  return typeof value === "number" && Number.isSafeInteger(value) && value >= 0;
}

/**
 * Every created schedule's total ends up released, forfeited, or still
 * owed on an active schedule, so
 * `vesting = released + forfeited + sum(active total - released)`.
 */
function validateSnapshot(snapshot: VestingSnapshot): void {
  if (snapshot.version !== 1) {
    throw invalidSnapshot(`unsupported version ${String(snapshot.version)}`);
  }

  const registry = new Set<Identity>();
  for (const beneficiary of snapshot.registry) {
    if (!isIdentity(beneficiary)) {
      throw invalidSnapshot(`registry holds an invalid identity "${String(beneficiary)}"`);
    }
    registry.add(beneficiary);
  }

  const seen = new Set<Identity>();
  let outstanding = 0n;
  let released = 0n;
  let forfeited = 0n;

  for (const s of snapshot.schedules) {
    if (!isIdentity(s.beneficiary)) {
      throw invalidSnapshot(`invalid beneficiary "${String(s.beneficiary)}"`);
    }
    const where = `schedule "${s.beneficiary}"`;
    if (seen.has(s.beneficiary)) {
      throw invalidSnapshot(`${where} appears twice`);
    }
    seen.add(s.beneficiary);
    if (!registry.has(s.beneficiary)) {
      throw invalidSnapshot(`${where} is missing from the registry`);
    }

    const total = parseAmount(s.totalAmount, `${where} totalAmount`);
    const paid = parseAmount(s.releasedAmount, `${where} releasedAmount`);
    if (total <= 0n) {
      throw invalidSnapshot(`${where} has a zero total`);
    }
    if (paid > total) {
      throw invalidSnapshot(`${where} released more than its total`, {
        totalAmount: s.totalAmount,
        releasedAmount: s.releasedAmount,
      });
    }
    if (!isTimestamp(s.startTime) || !areValidDurations(s.cliffDuration, s.vestingDuration)) {
      throw invalidSnapshot(`${where} has an invalid start or durations`, {
        startTime: s.startTime,
        cliffDuration: s.cliffDuration,
        vestingDuration: s.vestingDuration,
      });
    }
    if (s.isActive === (s.revokedAt !== undefined) || (s.revokedAt !== undefined && !isTimestamp(s.revokedAt))) {
      throw invalidSnapshot(`${where} must carry a revocation time exactly when inactive`);
    }

    released += paid;
    if (s.isActive) {
      outstanding += total - paid;
    } else {
      forfeited += total - paid;
    }
  }

  const totals = {
    vesting: parseAmount(snapshot.totals.vesting, "totals.vesting"),
    released: parseAmount(snapshot.totals.released, "totals.released"),
    forfeited: parseAmount(snapshot.totals.forfeited, "totals.forfeited"),
  };
  if (
    totals.released < released ||
    totals.forfeited < forfeited ||
    totals.vesting !== totals.released + totals.forfeited + outstanding
  ) {
    throw invalidSnapshot("totals do not match the schedules", { totals: snapshot.totals });
  }
}

function toSchedule(record: ScheduleRecord): VestingSchedule {
  return {
    beneficiary: record.beneficiary,
    totalAmount: record.totalAmount,
    startTime: record.startTime,
    cliffDuration: record.cliffDuration,
    vestingDuration: record.vestingDuration,
    releasedAmount: record.releasedAmount,
    isActive: record.isActive,
    ...(record.revokedAt === undefined ? {} : { revokedAt: record.revokedAt }),
  };
}

function toScheduleSnapshot(record: ScheduleRecord): ScheduleSnapshot {
  return {
    beneficiary: record.beneficiary,
    totalAmount: record.totalAmount.toString(),
    startTime: record.startTime,
    cliffDuration: record.cliffDuration,
    vestingDuration: record.vestingDuration,
    releasedAmount: record.releasedAmount.toString(),
    isActive: record.isActive,
    ...(record.revokedAt === undefined ? {} : { revokedAt: record.revokedAt }),
  };
}
