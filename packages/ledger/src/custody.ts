/**
 * @tranche/ledger — In-process TokenLedger backed by the double-entry ledger.
 *
 * Chart of accounts:
 * - `custody` (asset): tokens held for vesting
 * - `vesting-reserve` (equity): tokens committed to the vesting program
 * - `payout:<identity>` (expense): tokens paid out to one beneficiary
 *
 * Funding debits custody and credits the reserve. A transfer debits the
 * beneficiary's payout account and credits custody.
 */

import type { Identity, TokenLedger, TransferResult } from "@tranche/types";
import { Ledger } from "./ledger.js";
import { toMoney } from "./money-math.js";
import type { AppendResult } from "./types.js";
import { LedgerError } from "./types.js";

export const CUSTODY_ACCOUNT = "custody";
export const RESERVE_ACCOUNT = "vesting-reserve";

export function payoutAccountId(identity: Identity): string {
  return `payout:${identity}`;
}

export interface CustodyTokenLedgerOptions {
  /** Token symbol used as the ledger currency */
  readonly currency: string;
  readonly decimals: number;
  /** ISO timestamp source for entries. Defaults to wall-clock time. */
  readonly timestamp?: (() => string) | undefined;
}

export class CustodyTokenLedger implements TokenLedger {
  readonly ledger: Ledger = new Ledger();
  private readonly _currency: string;
  private readonly _decimals: number;
  private readonly _timestamp: () => string;
  private _sequence = 0;

  constructor(options: CustodyTokenLedgerOptions) {
    this._currency = options.currency;
    this._decimals = options.decimals;
    this._timestamp = options.timestamp ?? (() => new Date().toISOString());

    const ts = this._timestamp();
    this.ledger.registerAccount({ id: CUSTODY_ACCOUNT, type: "asset", name: "Custody" }, ts);
    this.ledger.registerAccount({ id: RESERVE_ACCOUNT, type: "equity", name: "Vesting reserve" }, ts);
  }

  get currency(): string {
    return this._currency;
  }

  get decimals(): number {
    return this._decimals;
  }

  /**
   * Move tokens into custody.
   *
   * @throws LedgerError INVALID_AMOUNT for a non-positive amount
   */
  fund(amount: bigint): AppendResult {
    if (amount <= 0n) {
      throw new LedgerError("INVALID_AMOUNT", `Funding amount must be positive, got ${amount.toString()}`);
    }
    return this._post("fund", CUSTODY_ACCOUNT, RESERVE_ACCOUNT, amount);
  }

  async transfer(to: Identity, amount: bigint): Promise<TransferResult> {
    if (amount <= 0n) {
      return { ok: false, reason: "INVALID_AMOUNT" };
    }
    if (this.custodyBalance() < amount) {
      return { ok: false, reason: "INSUFFICIENT_CUSTODY_BALANCE" };
    }

    const payout = payoutAccountId(to);
    if (!this.ledger.hasAccount(payout)) {
      this.ledger.registerAccount({ id: payout, type: "expense", name: `Payout to ${to}` }, this._timestamp());
    }

    const result = this._post("transfer", payout, CUSTODY_ACCOUNT, amount, to);
    return { ok: true, reference: result.correlationId };
  }

  /** Tokens currently held in custody, in base units. */
  custodyBalance(): bigint {
    return this.ledger.getUnits(CUSTODY_ACCOUNT, this._currency);
  }

  /** Tokens paid out to `identity` so far, in base units. */
  paidTo(identity: Identity): bigint {
    const payout = payoutAccountId(identity);
    return this.ledger.hasAccount(payout) ? this.ledger.getUnits(payout, this._currency) : 0n;
  }

  isBalanced(): boolean {
    return this.ledger.getTrialBalance(this._timestamp()).balanced;
  }

  private _post(
    kind: "fund" | "transfer",
    debitAccount: string,
    creditAccount: string,
    amount: bigint,
    beneficiary?: Identity,
  ): AppendResult {
    this._sequence += 1;
    const correlationId = `${kind}-${String(this._sequence)}`;
    const timestamp = this._timestamp();
    const money = toMoney(amount, this._currency, this._decimals);
    const link = beneficiary === undefined ? {} : { beneficiary };

    return this.ledger.append(
      [
        { id: `${correlationId}:dr`, accountId: debitAccount, type: "debit", money, timestamp, correlationId, ...link },
        { id: `${correlationId}:cr`, accountId: creditAccount, type: "credit", money, timestamp, correlationId, ...link },
      ],
      { description: kind === "fund" ? "Custody funding" : `Vesting settlement to ${beneficiary ?? ""}` },
    );
  }
}
