/**
 * Financial Types
 *
 * Primitives for the custody ledger that backs token settlement.
 *
 * Rules:
 * - Amounts are decimal strings on the wire and bigint in arithmetic
 * - Currency is always explicit (the vested token's symbol)
 * - Ledger entries are append-only by contract
 */

/**
 * Token symbol or other currency identifier.
 */
export type Currency = string;

/**
 * A precise monetary amount.
 * String representation to avoid IEEE 754 floating-point issues.
 */
export interface Money {
  /** Decimal string (e.g., "1200", "0.000098") */
  readonly amount: string;

  /** Token symbol (e.g., "TRN") */
  readonly currency: Currency;

  /** Number of decimal places between base units and whole tokens. */
  readonly decimals: number;
}

/**
 * Reference to an account in the ledger.
 */
export interface AccountRef {
  readonly id: string;
  readonly type: "asset" | "liability" | "income" | "expense" | "equity";
  readonly name: string;
}

/**
 * Type of ledger entry (double-entry accounting).
 */
export type LedgerEntryType = "debit" | "credit";

/**
 * A single line in the ledger.
 * Always part of a balanced transaction (debits = credits).
 */
export interface LedgerEntry {
  readonly id: string;
  readonly accountId: string;
  readonly type: LedgerEntryType;
  readonly money: Money;

  /** ISO 8601 timestamp */
  readonly timestamp: string;

  /** Beneficiary the entry pays out to, for settlement transfers */
  readonly beneficiary?: string;

  /** Correlation ID for grouping related entries */
  readonly correlationId: string;
}
