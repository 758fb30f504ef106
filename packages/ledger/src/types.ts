/**
 * @tranche/ledger — Internal types for the ledger engine.
 *
 * Ledger-specific structures layered on the shared financial
 * primitives from @tranche/types.
 */

import type { AccountRef, LedgerEntry } from "@tranche/types";

// ─── Account Types ───────────────────────────────────────────────────────

export type AccountType = AccountRef["type"];

export type NormalBalance = "debit" | "credit";

/**
 * Asset and expense accounts grow with debits; liability, income and
 * equity accounts grow with credits.
 */
export const NORMAL_BALANCE: Readonly<Record<AccountType, NormalBalance>> = {
  asset: "debit",
  expense: "debit",
  liability: "credit",
  income: "credit",
  equity: "credit",
} as const;

// ─── Ledger Types ────────────────────────────────────────────────────────

export interface LedgerAccount {
  readonly ref: AccountRef;
  readonly createdAt: string;
}

/**
 * A balanced group of entries sharing a correlation ID.
 */
export interface LedgerTransaction {
  readonly correlationId: string;
  readonly entries: readonly LedgerEntry[];
  readonly timestamp: string;
  readonly description?: string | undefined;
}

export interface CurrencyBalance {
  readonly currency: string;
  readonly decimals: number;
  /** Net balance in the account's normal direction. Negative = contra. */
  readonly balance: string;
  readonly totalDebits: string;
  readonly totalCredits: string;
}

export interface AccountBalance {
  readonly accountId: string;
  readonly accountType: AccountType;
  readonly balances: readonly CurrencyBalance[];
}

export interface TrialBalanceLine {
  readonly accountId: string;
  readonly accountType: AccountType;
  readonly currency: string;
  readonly decimals: number;
  readonly debitBalance: string;
  readonly creditBalance: string;
}

export interface TrialBalance {
  readonly lines: readonly TrialBalanceLine[];
  readonly generatedAt: string;
  /** Debit column equals credit column for every currency. */
  readonly balanced: boolean;
}

// ─── Error Types ─────────────────────────────────────────────────────────

export type LedgerErrorCode =
  | "UNBALANCED_TRANSACTION"
  | "UNKNOWN_ACCOUNT"
  | "INVALID_AMOUNT"
  | "DUPLICATE_ENTRY_ID"
  | "DUPLICATE_ACCOUNT_ID"
  | "EMPTY_TRANSACTION"
  | "MIXED_CORRELATION_ID"
  | "INVALID_MONEY";

export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
  }
}

// ─── Append ──────────────────────────────────────────────────────────────

export interface AppendOptions {
  readonly description?: string | undefined;
}

export interface AppendResult {
  readonly correlationId: string;
  readonly entryCount: number;
  readonly timestamp: string;
}

// ─── Snapshot ────────────────────────────────────────────────────────────

export interface LedgerSnapshot {
  readonly version: 1;
  readonly accounts: readonly LedgerAccount[];
  readonly entries: readonly LedgerEntry[];
  readonly createdAt: string;
}

// ─── Query ───────────────────────────────────────────────────────────────

export interface EntryFilter {
  readonly accountId?: string | undefined;
  readonly correlationId?: string | undefined;
  readonly beneficiary?: string | undefined;
  readonly currency?: string | undefined;
}
