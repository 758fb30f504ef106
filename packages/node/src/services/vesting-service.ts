/**
 * VestingService: composition root for the domain packages.
 *
 * Route handlers delegate to this service; they never import domain
 * packages directly. One service owns one VestingLedger, its custody
 * token ledger and the event store both write to.
 */

import pino from "pino";
import type { Logger } from "pino";
import type {
  Clock,
  Identity,
  VestingSchedule,
  VestingStats,
} from "@tranche/types";
import { SECONDS_PER_DAY } from "@tranche/types";
import { CustodyTokenLedger } from "@tranche/ledger";
import { InMemoryEventStore } from "@tranche/event-store";
import type {
  StoredEvent,
  ReadOptions,
  ReadAllOptions,
  EventStoreIntegrityResult,
  Subscription,
} from "@tranche/event-store";
import { VestingLedger, VestingError, SystemClock } from "@tranche/vesting";
import type { RevocationResult } from "@tranche/vesting";

// =============================================================================
// Configuration
// =============================================================================

export interface VestingServiceConfig {
  readonly owner: Identity;
  readonly tokenAddress: string;
  readonly tokenSymbol: string;
  readonly tokenDecimals: number;
  readonly authorizedCreators?: readonly Identity[] | undefined;
  /** Tokens placed in custody at startup, in base units */
  readonly initialCustodyBalance?: bigint | undefined;
  readonly clock?: Clock | undefined;
  readonly idGenerator?: (() => string) | undefined;
  readonly logger?: Logger | undefined;
}

export interface CreateScheduleInput {
  readonly beneficiary: Identity;
  readonly totalAmount: bigint;
  readonly cliffDurationDays: number;
  readonly vestingDurationDays: number;
}

export interface AuthorityView {
  readonly owner: Identity;
  readonly creators: readonly Identity[];
  readonly tokenAddress: string;
}

export interface CustodyView {
  readonly currency: string;
  readonly decimals: number;
  readonly balance: string;
  readonly balanced: boolean;
}

export interface Readiness {
  readonly ready: boolean;
  readonly integrity: EventStoreIntegrityResult;
  readonly custodyBalanced: boolean;
}

// =============================================================================
// Service
// =============================================================================

export class VestingService {
  readonly ledger: VestingLedger;
  readonly custody: CustodyTokenLedger;
  readonly eventStore: InMemoryEventStore;

  private readonly _logger: Logger;
  private readonly _clock: Clock;
  private readonly _subscription: Subscription;
  private _ready = false;

  constructor(config: VestingServiceConfig) {
    this._logger = config.logger ?? pino({ level: "silent" });
    this._clock = config.clock ?? new SystemClock();
    const timestamp = (): string => new Date(this._clock.now() * 1000).toISOString();

    this.eventStore = new InMemoryEventStore({
      timestamp,
      onSubscriberError: (err, event) => {
        this._logger.error(
          { err, streamId: event.streamId, version: event.version, type: event.event.type },
          "Event subscriber failed",
        );
      },
    });
    this.custody = new CustodyTokenLedger({
      currency: config.tokenSymbol,
      decimals: config.tokenDecimals,
      timestamp,
    });
    if (config.initialCustodyBalance !== undefined && config.initialCustodyBalance > 0n) {
      this.custody.fund(config.initialCustodyBalance);
    }

    this.ledger = new VestingLedger({
      owner: config.owner,
      tokenAddress: config.tokenAddress,
      authorizedCreators: config.authorizedCreators,
      tokenLedger: this.custody,
      clock: this._clock,
      eventStore: this.eventStore,
      idGenerator: config.idGenerator,
    });

    this._subscription = this.eventStore.subscribeAll((stored) => {
      this._logger.debug(
        { type: stored.event.type, streamId: stored.streamId, position: stored.globalPosition },
        "Event appended",
      );
    });

    this._ready = true;
  }

  // ─── Schedules ──────────────────────────────────────────────────────

  async createSchedule(caller: Identity, input: CreateScheduleInput): Promise<VestingSchedule> {
    const schedule = await this.ledger.createSchedule(
      caller,
      input.beneficiary,
      input.totalAmount,
      input.cliffDurationDays * SECONDS_PER_DAY,
      input.vestingDurationDays * SECONDS_PER_DAY,
    );
    this._logger.info(
      { beneficiary: schedule.beneficiary, totalAmount: schedule.totalAmount.toString(), caller },
      "Schedule created",
    );
    return schedule;
  }

  async release(caller: Identity, beneficiary: Identity): Promise<bigint> {
    try {
      const amount = await this.ledger.release(caller, beneficiary);
      this._logger.info({ beneficiary, amount: amount.toString(), caller }, "Tokens released");
      return amount;
    } catch (err: unknown) {
      this._logTransferFailure(err, beneficiary, "release");
      throw err;
    }
  }

  async revoke(caller: Identity, beneficiary: Identity): Promise<RevocationResult> {
    try {
      const result = await this.ledger.revoke(caller, beneficiary);
      this._logger.info(
        {
          beneficiary,
          settledAmount: result.settledAmount.toString(),
          forfeitedAmount: result.forfeitedAmount.toString(),
          caller,
        },
        "Schedule revoked",
      );
      return result;
    } catch (err: unknown) {
      this._logTransferFailure(err, beneficiary, "revoke");
      throw err;
    }
  }

  getSchedule(beneficiary: Identity): VestingSchedule | undefined {
    return this.ledger.getSchedule(beneficiary);
  }

  /**
   * Vested and releasable amounts at `at` (default: now).
   */
  getReleasable(beneficiary: Identity, at?: number): { vested: bigint; releasable: bigint; at: number } {
    const time = at ?? this._clock.now();
    return {
      vested: this.ledger.vestedAmount(beneficiary, time),
      releasable: this.ledger.getReleasableAmount(beneficiary, time),
      at: time,
    };
  }

  getStats(): VestingStats {
    return this.ledger.getStats();
  }

  listBeneficiaries(): readonly Identity[] {
    return this.ledger.listBeneficiaries();
  }

  // ─── Authority ──────────────────────────────────────────────────────

  getAuthority(): AuthorityView {
    return {
      owner: this.ledger.authority.owner,
      creators: this.ledger.creators,
      tokenAddress: this.ledger.tokenAddress,
    };
  }

  async transferOwnership(caller: Identity, newOwner: Identity): Promise<void> {
    await this.ledger.transferOwnership(caller, newOwner);
    this._logger.info({ previousOwner: caller, newOwner }, "Ownership transferred");
  }

  async updateTokenAddress(caller: Identity, tokenAddress: string): Promise<void> {
    await this.ledger.updateTokenAddress(caller, tokenAddress);
    this._logger.info({ tokenAddress, caller }, "Token address updated");
  }

  grantCreator(caller: Identity, identity: Identity): Promise<boolean> {
    return this.ledger.grantCreator(caller, identity);
  }

  revokeCreator(caller: Identity, identity: Identity): Promise<boolean> {
    return this.ledger.revokeCreator(caller, identity);
  }

  // ─── Events ─────────────────────────────────────────────────────────

  readAllEvents(options?: ReadAllOptions): readonly StoredEvent[] {
    return this.eventStore.readAll(options);
  }

  readStreamEvents(
    streamId: string,
    options?: ReadOptions,
  ): readonly StoredEvent[] {
    return this.eventStore.read(streamId, options);
  }

  // ─── Custody ────────────────────────────────────────────────────────

  getCustody(): CustodyView {
    return {
      currency: this.custody.currency,
      decimals: this.custody.decimals,
      balance: this.custody.custodyBalance().toString(),
      balanced: this.custody.isBalanced(),
    };
  }

  // ─── Lifecycle ──────────────────────────────────────────────────────

  /**
   * Deep health: the event hash chain verifies and custody books balance.
   */
  checkReadiness(): Readiness {
    const integrity = this.eventStore.verifyIntegrity();
    const custodyBalanced = this.custody.isBalanced();
    return {
      ready: this._ready && integrity.valid && custodyBalanced,
      integrity,
      custodyBalanced,
    };
  }

  stop(): void {
    this._subscription.unsubscribe();
    this._ready = false;
  }

  private _logTransferFailure(err: unknown, beneficiary: Identity, operation: "release" | "revoke"): void {
    if (err instanceof VestingError && err.code === "TRANSFER_FAILED") {
      this._logger.warn({ beneficiary, operation, details: err.details }, "Settlement transfer failed");
    }
  }
}
