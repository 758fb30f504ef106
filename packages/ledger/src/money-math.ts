/**
 * @tranche/ledger — Token amount arithmetic.
 *
 * Amounts are decimal strings at the edges and bigint base units inside.
 * No floating point anywhere.
 */

import type { Money } from "@tranche/types";
import { LedgerError } from "./types.js";

const AMOUNT_FORMAT = /^-?\d+(\.\d+)?$/;

/**
 * Parse a decimal string into base units.
 *
 * "12.5" with decimals=2 → 1250n
 * "1200" with decimals=0 → 1200n
 * "-0.3" with decimals=1 → -3n
 */
export function parseAmount(amount: string, decimals: number): bigint {
  const trimmed = amount.trim();
  if (!AMOUNT_FORMAT.test(trimmed)) {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount format: "${amount}"`);
  }

  const negative = trimmed.startsWith("-");
  const [intPart = "0", fracPart = ""] = (negative ? trimmed.slice(1) : trimmed).split(".");

  if (fracPart.length > decimals) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `Amount "${trimmed}" has ${String(fracPart.length)} decimal places, token allows ${String(decimals)}`,
    );
  }

  const value = BigInt(intPart + fracPart.padEnd(decimals, "0"));
  return negative ? -value : value;
}

/**
 * Render base units as a decimal string with exactly `decimals` places.
 *
 * 1250n with decimals=2 → "12.50"
 * 98n with decimals=0 → "98"
 */
export function formatAmount(units: bigint, decimals: number): string {
  if (decimals === 0) {
    return units.toString();
  }

  const negative = units < 0n;
  const digits = (negative ? -units : units).toString().padStart(decimals + 1, "0");
  const result = `${digits.slice(0, -decimals)}.${digits.slice(-decimals)}`;
  return negative ? `-${result}` : result;
}

/**
 * Money value for a base-unit amount of a token.
 */
export function toMoney(units: bigint, currency: string, decimals: number): Money {
  return { amount: formatAmount(units, decimals), currency, decimals };
}

/**
 * Throws LedgerError unless the Money is well-formed.
 */
export function validateMoney(money: Money): void {
  if (money.currency.trim() === "") {
    throw new LedgerError("INVALID_MONEY", "Money currency must be a non-empty string");
  }
  if (!Number.isInteger(money.decimals) || money.decimals < 0) {
    throw new LedgerError(
      "INVALID_MONEY",
      `Money decimals must be a non-negative integer, got: ${String(money.decimals)}`,
    );
  }
  if (money.amount.trim() === "") {
    throw new LedgerError("INVALID_MONEY", "Money amount must be a non-empty string");
  }
  parseAmount(money.amount, money.decimals);
}
