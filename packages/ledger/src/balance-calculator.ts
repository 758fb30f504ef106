/**
 * @tranche/ledger — Balance computation.
 *
 * Balances are per account and per currency, summed in bigint.
 */

import type { LedgerEntry } from "@tranche/types";
import type { AccountRegistry } from "./accounts.js";
import type { AccountBalance, TrialBalance, TrialBalanceLine } from "./types.js";
import { NORMAL_BALANCE } from "./types.js";
import { formatAmount, parseAmount } from "./money-math.js";

interface Totals {
  readonly accountId: string;
  readonly currency: string;
  readonly decimals: number;
  debits: bigint;
  credits: bigint;
}

function sumByAccountAndCurrency(entries: readonly LedgerEntry[]): Map<string, Totals> {
  const totals = new Map<string, Totals>();

  for (const entry of entries) {
    const key = `${entry.accountId}::${entry.money.currency}`;
    let t = totals.get(key);
    if (t === undefined) {
      t = {
        accountId: entry.accountId,
        currency: entry.money.currency,
        decimals: entry.money.decimals,
        debits: 0n,
        credits: 0n,
      };
      totals.set(key, t);
    }

    const amount = parseAmount(entry.money.amount, entry.money.decimals);
    if (entry.type === "debit") {
      t.debits += amount;
    } else {
      t.credits += amount;
    }
  }

  return totals;
}

/**
 * Net base-unit balance of one account in one currency, in the
 * account's normal direction. 0n when the account has no entries.
 */
export function netUnits(
  accountId: string,
  currency: string,
  entries: readonly LedgerEntry[],
  accounts: AccountRegistry,
): bigint {
  const normal = NORMAL_BALANCE[accounts.getType(accountId)];
  let net = 0n;
  for (const entry of entries) {
    if (entry.accountId !== accountId || entry.money.currency !== currency) continue;
    const amount = parseAmount(entry.money.amount, entry.money.decimals);
    net += entry.type === normal ? amount : -amount;
  }
  return net;
}

export function computeAccountBalance(
  accountId: string,
  entries: readonly LedgerEntry[],
  accounts: AccountRegistry,
): AccountBalance {
  const account = accounts.assertExists(accountId);
  const normal = NORMAL_BALANCE[account.ref.type];
  const totals = sumByAccountAndCurrency(entries.filter((e) => e.accountId === accountId));

  const balances = [...totals.values()].map((t) => {
    const net = normal === "debit" ? t.debits - t.credits : t.credits - t.debits;
    return {
      currency: t.currency,
      decimals: t.decimals,
      balance: formatAmount(net, t.decimals),
      totalDebits: formatAmount(t.debits, t.decimals),
      totalCredits: formatAmount(t.credits, t.decimals),
    };
  });

  return { accountId, accountType: account.ref.type, balances };
}

/**
 * Trial balance over every account. A positive net goes in the column
 * of the account's normal balance, a negative net in the other one.
 */
export function computeTrialBalance(
  entries: readonly LedgerEntry[],
  accounts: AccountRegistry,
  timestamp: string,
): TrialBalance {
  const lines: TrialBalanceLine[] = [];
  const columns = new Map<string, { debits: bigint; credits: bigint }>();

  for (const t of sumByAccountAndCurrency(entries).values()) {
    const accountType = accounts.getType(t.accountId);
    const netDebit = t.debits - t.credits;
    const debitBalance = netDebit > 0n ? netDebit : 0n;
    const creditBalance = netDebit < 0n ? -netDebit : 0n;

    lines.push({
      accountId: t.accountId,
      accountType,
      currency: t.currency,
      decimals: t.decimals,
      debitBalance: formatAmount(debitBalance, t.decimals),
      creditBalance: formatAmount(creditBalance, t.decimals),
    });

    let column = columns.get(t.currency);
    if (column === undefined) {
      column = { debits: 0n, credits: 0n };
      columns.set(t.currency, column);
    }
    column.debits += debitBalance;
    column.credits += creditBalance;
  }

  const balanced = [...columns.values()].every((c) => c.debits === c.credits);
  return { lines, generatedAt: timestamp, balanced };
}
