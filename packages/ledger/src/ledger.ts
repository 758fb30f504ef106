/**
 * @tranche/ledger — Append-only double-entry ledger.
 *
 * Once an entry is written it is permanent. Corrections are new
 * reversing entries; there is no update or delete.
 */

import type { AccountRef, LedgerEntry } from "@tranche/types";
import { AccountRegistry } from "./accounts.js";
import { computeAccountBalance, computeTrialBalance, netUnits } from "./balance-calculator.js";
import { parseAmount, validateMoney } from "./money-math.js";
import type {
  AccountBalance,
  AppendOptions,
  AppendResult,
  EntryFilter,
  LedgerAccount,
  LedgerSnapshot,
  LedgerTransaction,
  TrialBalance,
} from "./types.js";
import { LedgerError } from "./types.js";

export class Ledger {
  private readonly _accounts: AccountRegistry = new AccountRegistry();
  private readonly _entries: LedgerEntry[] = [];
  private readonly _entryIds: Set<string> = new Set();
  private readonly _transactions: LedgerTransaction[] = [];

  // ─── Accounts ────────────────────────────────────────────────────────

  registerAccount(ref: AccountRef, timestamp?: string): LedgerAccount {
    return this._accounts.register(ref, timestamp ?? new Date().toISOString());
  }

  getAccount(id: string): LedgerAccount | undefined {
    return this._accounts.get(id);
  }

  hasAccount(id: string): boolean {
    return this._accounts.has(id);
  }

  getAccounts(): readonly LedgerAccount[] {
    return this._accounts.getAll();
  }

  // ─── Append ──────────────────────────────────────────────────────────

  /**
   * Append a balanced set of entries. Nothing is written unless every
   * rule passes:
   * 1. at least one entry
   * 2. one shared correlationId
   * 3. entry IDs unique across the ledger and the batch
   * 4. every account registered
   * 5. well-formed, strictly positive amounts
   * 6. debits equal credits per currency
   *
   * @throws LedgerError
   */
  append(entries: readonly LedgerEntry[], options?: AppendOptions): AppendResult {
    const [first] = entries;
    if (first === undefined) {
      throw new LedgerError("EMPTY_TRANSACTION", "Cannot append an empty set of entries");
    }

    const { correlationId, timestamp } = first;
    const batchIds = new Set<string>();

    for (const entry of entries) {
      if (entry.correlationId !== correlationId) {
        throw new LedgerError(
          "MIXED_CORRELATION_ID",
          `All entries must share correlationId "${correlationId}", got "${entry.correlationId}"`,
        );
      }
      if (this._entryIds.has(entry.id)) {
        throw new LedgerError("DUPLICATE_ENTRY_ID", `Entry ID already exists in ledger: "${entry.id}"`);
      }
      if (batchIds.has(entry.id)) {
        throw new LedgerError("DUPLICATE_ENTRY_ID", `Duplicate entry ID within batch: "${entry.id}"`);
      }
      batchIds.add(entry.id);

      this._accounts.assertExists(entry.accountId);
      validateMoney(entry.money);
      if (parseAmount(entry.money.amount, entry.money.decimals) <= 0n) {
        throw new LedgerError(
          "INVALID_AMOUNT",
          `Entry amounts must be positive. Entry "${entry.id}" has amount "${entry.money.amount}"`,
        );
      }
    }

    this._assertBalanced(entries);

    for (const entry of entries) {
      this._entries.push(entry);
      this._entryIds.add(entry.id);
    }
    this._transactions.push({
      correlationId,
      entries: [...entries],
      timestamp,
      description: options?.description,
    });

    return { correlationId, entryCount: entries.length, timestamp };
  }

  private _assertBalanced(entries: readonly LedgerEntry[]): void {
    const net = new Map<string, bigint>();

    for (const entry of entries) {
      const amount = parseAmount(entry.money.amount, entry.money.decimals);
      const current = net.get(entry.money.currency) ?? 0n;
      net.set(entry.money.currency, entry.type === "debit" ? current + amount : current - amount);
    }

    for (const [currency, diff] of net) {
      if (diff !== 0n) {
        throw new LedgerError(
          "UNBALANCED_TRANSACTION",
          `Transaction is unbalanced for currency "${currency}": debits - credits = ${diff.toString()}`,
        );
      }
    }
  }

  // ─── Queries ─────────────────────────────────────────────────────────

  getBalance(accountId: string): AccountBalance {
    return computeAccountBalance(accountId, this._entries, this._accounts);
  }

  /**
   * Net balance of an account in base units of one currency.
   */
  getUnits(accountId: string, currency: string): bigint {
    return netUnits(accountId, currency, this._entries, this._accounts);
  }

  getTrialBalance(timestamp?: string): TrialBalance {
    return computeTrialBalance(this._entries, this._accounts, timestamp ?? new Date().toISOString());
  }

  getEntries(filter?: EntryFilter): readonly LedgerEntry[] {
    if (filter === undefined) {
      return [...this._entries];
    }

    return this._entries.filter(
      (entry) =>
        (filter.accountId === undefined || entry.accountId === filter.accountId) &&
        (filter.correlationId === undefined || entry.correlationId === filter.correlationId) &&
        (filter.beneficiary === undefined || entry.beneficiary === filter.beneficiary) &&
        (filter.currency === undefined || entry.money.currency === filter.currency),
    );
  }

  getTransactions(): readonly LedgerTransaction[] {
    return [...this._transactions];
  }

  get entryCount(): number {
    return this._entries.length;
  }

  get transactionCount(): number {
    return this._transactions.length;
  }

  // ─── Snapshot ────────────────────────────────────────────────────────

  snapshot(): LedgerSnapshot {
    return {
      version: 1,
      accounts: this._accounts.getAll(),
      entries: [...this._entries],
      createdAt: new Date().toISOString(),
    };
  }

  /**
   * Rebuild a ledger by replaying a snapshot through `append`, so a
   * tampered snapshot fails the same validation as live input.
   */
  static fromSnapshot(snapshot: LedgerSnapshot): Ledger {
    const ledger = new Ledger();

    for (const account of snapshot.accounts) {
      ledger._accounts.register(account.ref, account.createdAt);
    }

    const groups = new Map<string, LedgerEntry[]>();
    for (const entry of snapshot.entries) {
      const group = groups.get(entry.correlationId);
      if (group === undefined) {
        groups.set(entry.correlationId, [entry]);
      } else {
        group.push(entry);
      }
    }

    for (const entries of groups.values()) {
      ledger.append(entries);
    }

    return ledger;
  }
}
