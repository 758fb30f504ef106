/**
 * @tranche/ledger — Append-only double-entry ledger and the custody
 * TokenLedger built on it.
 *
 * - Every transaction balances (debits = credits per currency)
 * - Entries are immutable once appended
 * - All token arithmetic is bigint
 */

export { Ledger } from "./ledger.js";
export { AccountRegistry } from "./accounts.js";
export {
  computeAccountBalance,
  computeTrialBalance,
  netUnits,
} from "./balance-calculator.js";
export { parseAmount, formatAmount, toMoney, validateMoney } from "./money-math.js";
export {
  CustodyTokenLedger,
  CUSTODY_ACCOUNT,
  RESERVE_ACCOUNT,
  payoutAccountId,
} from "./custody.js";
export type { CustodyTokenLedgerOptions } from "./custody.js";

export type {
  AccountType,
  NormalBalance,
  LedgerAccount,
  LedgerTransaction,
  CurrencyBalance,
  AccountBalance,
  TrialBalanceLine,
  TrialBalance,
  LedgerErrorCode,
  AppendOptions,
  AppendResult,
  LedgerSnapshot,
  EntryFilter,
} from "./types.js";

export { LedgerError, NORMAL_BALANCE } from "./types.js";
