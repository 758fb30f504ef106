/**
 * Tests for the append-only double-entry ledger.
 */

import { describe, it, expect, beforeEach } from "vitest";
import type { LedgerEntry, Money } from "@tranche/types";
import { Ledger } from "../src/ledger.js";
import { AccountRegistry } from "../src/accounts.js";
import { LedgerError } from "../src/types.js";

// ─── Fixtures ────────────────────────────────────────────────────────────

const TS = "2025-01-01T00:00:00.000Z";

function trn(amount: string): Money {
  return { amount, currency: "TRN", decimals: 2 };
}

function entry(
  id: string,
  accountId: string,
  type: "debit" | "credit",
  money: Money,
  correlationId: string,
  beneficiary?: string,
): LedgerEntry {
  return {
    id,
    accountId,
    type,
    money,
    timestamp: TS,
    correlationId,
    ...(beneficiary === undefined ? {} : { beneficiary }),
  };
}

function fundAndPay(ledger: Ledger): void {
  ledger.append([
    entry("f1", "custody", "debit", trn("100.00"), "fund-1"),
    entry("f2", "reserve", "credit", trn("100.00"), "fund-1"),
  ]);
  ledger.append(
    [
      entry("p1", "payout:alice", "debit", trn("30.00"), "pay-1", "alice"),
      entry("p2", "custody", "credit", trn("30.00"), "pay-1", "alice"),
    ],
    { description: "Settlement to alice" },
  );
}

// ─── Tests ───────────────────────────────────────────────────────────────

describe("Ledger", () => {
  let ledger: Ledger;

  beforeEach(() => {
    ledger = new Ledger();
    ledger.registerAccount({ id: "custody", type: "asset", name: "Custody" }, TS);
    ledger.registerAccount({ id: "reserve", type: "equity", name: "Reserve" }, TS);
    ledger.registerAccount({ id: "payout:alice", type: "expense", name: "Payout to alice" }, TS);
  });

  describe("accounts", () => {
    it("registers and retrieves accounts", () => {
      expect(ledger.hasAccount("custody")).toBe(true);
      expect(ledger.getAccount("custody")?.ref.type).toBe("asset");
      expect(ledger.getAccount("custody")?.createdAt).toBe(TS);
      expect(ledger.getAccounts()).toHaveLength(3);
    });

    it("rejects a duplicate account ID", () => {
      expect(() =>
        ledger.registerAccount({ id: "custody", type: "asset", name: "Again" }, TS),
      ).toThrow(/already exists/);
    });

    it("copies the registered ref", () => {
      const registry = new AccountRegistry();
      const ref = { id: "a", type: "asset" as const, name: "A" };
      const account = registry.register(ref, TS);
      expect(account.ref).not.toBe(ref);
      expect(account.ref).toEqual(ref);
      expect(registry.count).toBe(1);
      expect(registry.getType("a")).toBe("asset");
    });

    it("throws UNKNOWN_ACCOUNT from assertExists", () => {
      const registry = new AccountRegistry();
      expect(() => registry.assertExists("missing")).toThrow(/Unknown account/);
    });
  });

  describe("append", () => {
    it("appends a balanced transaction", () => {
      const result = ledger.append([
        entry("e1", "custody", "debit", trn("100.00"), "tx1"),
        entry("e2", "reserve", "credit", trn("100.00"), "tx1"),
      ]);

      expect(result).toEqual({ correlationId: "tx1", entryCount: 2, timestamp: TS });
      expect(ledger.entryCount).toBe(2);
      expect(ledger.transactionCount).toBe(1);
    });

    it("stores the description", () => {
      fundAndPay(ledger);
      const txns = ledger.getTransactions();
      expect(txns[1]?.description).toBe("Settlement to alice");
      expect(txns[0]?.description).toBeUndefined();
    });

    it("rejects an empty batch", () => {
      expect(() => ledger.append([])).toThrow(/empty/);
    });

    it("rejects mixed correlation IDs", () => {
      expect(() =>
        ledger.append([
          entry("e1", "custody", "debit", trn("1.00"), "tx1"),
          entry("e2", "reserve", "credit", trn("1.00"), "tx2"),
        ]),
      ).toThrow(/correlationId/);
    });

    it("rejects duplicate IDs within a batch and across batches", () => {
      expect(() =>
        ledger.append([
          entry("e1", "custody", "debit", trn("1.00"), "tx1"),
          entry("e1", "reserve", "credit", trn("1.00"), "tx1"),
        ]),
      ).toThrow(/Duplicate entry ID within batch/);

      ledger.append([
        entry("e1", "custody", "debit", trn("1.00"), "tx1"),
        entry("e2", "reserve", "credit", trn("1.00"), "tx1"),
      ]);
      expect(() =>
        ledger.append([
          entry("e1", "custody", "debit", trn("1.00"), "tx2"),
          entry("e3", "reserve", "credit", trn("1.00"), "tx2"),
        ]),
      ).toThrow(/already exists in ledger/);
    });

    it("rejects unknown accounts", () => {
      expect(() =>
        ledger.append([
          entry("e1", "nowhere", "debit", trn("1.00"), "tx1"),
          entry("e2", "reserve", "credit", trn("1.00"), "tx1"),
        ]),
      ).toThrow(/Unknown account/);
    });

    it("rejects zero and negative amounts", () => {
      for (const amount of ["0.00", "-1.00"]) {
        expect(() =>
          ledger.append([
            entry("e1", "custody", "debit", trn(amount), "tx1"),
            entry("e2", "reserve", "credit", trn(amount), "tx1"),
          ]),
        ).toThrow(/positive/);
      }
    });

    it("rejects an unbalanced transaction without committing anything", () => {
      try {
        ledger.append([
          entry("e1", "custody", "debit", trn("100.00"), "tx1"),
          entry("e2", "reserve", "credit", trn("99.99"), "tx1"),
        ]);
        expect.fail("Should have thrown");
      } catch (err) {
        expect(err).toBeInstanceOf(LedgerError);
        expect((err as LedgerError).code).toBe("UNBALANCED_TRANSACTION");
        expect((err as LedgerError).message).toContain("debits - credits = 1");
      }

      expect(ledger.entryCount).toBe(0);
      expect(ledger.transactionCount).toBe(0);
    });

    it("has no update or delete method", () => {
      expect((ledger as unknown as Record<string, unknown>)["update"]).toBeUndefined();
      expect((ledger as unknown as Record<string, unknown>)["delete"]).toBeUndefined();
    });
  });

  describe("balances", () => {
    beforeEach(() => fundAndPay(ledger));

    it("computes balances in the normal direction", () => {
      expect(ledger.getBalance("custody").balances).toEqual([
        {
          currency: "TRN",
          decimals: 2,
          balance: "70.00",
          totalDebits: "100.00",
          totalCredits: "30.00",
        },
      ]);
      expect(ledger.getBalance("reserve").balances[0]?.balance).toBe("100.00");
      expect(ledger.getBalance("payout:alice").balances[0]?.balance).toBe("30.00");
    });

    it("returns base units through getUnits", () => {
      expect(ledger.getUnits("custody", "TRN")).toBe(7000n);
      expect(ledger.getUnits("payout:alice", "TRN")).toBe(3000n);
      expect(ledger.getUnits("custody", "OTHER")).toBe(0n);
    });

    it("produces a balanced trial balance", () => {
      const tb = ledger.getTrialBalance(TS);
      expect(tb.balanced).toBe(true);
      expect(tb.generatedAt).toBe(TS);
      expect(tb.lines).toEqual([
        { accountId: "custody", accountType: "asset", currency: "TRN", decimals: 2, debitBalance: "70.00", creditBalance: "0.00" },
        { accountId: "reserve", accountType: "equity", currency: "TRN", decimals: 2, debitBalance: "0.00", creditBalance: "100.00" },
        { accountId: "payout:alice", accountType: "expense", currency: "TRN", decimals: 2, debitBalance: "30.00", creditBalance: "0.00" },
      ]);
    });

    it("reverses a transaction with opposite entries", () => {
      ledger.append([
        entry("r1", "custody", "debit", trn("30.00"), "reverse-pay-1"),
        entry("r2", "payout:alice", "credit", trn("30.00"), "reverse-pay-1"),
      ]);
      expect(ledger.getUnits("custody", "TRN")).toBe(10000n);
      expect(ledger.getUnits("payout:alice", "TRN")).toBe(0n);
    });
  });

  describe("queries", () => {
    beforeEach(() => fundAndPay(ledger));

    it("returns all entries without a filter", () => {
      expect(ledger.getEntries()).toHaveLength(4);
    });

    it("filters by account, correlation, beneficiary and currency", () => {
      expect(ledger.getEntries({ accountId: "custody" }).map((e) => e.id)).toEqual(["f1", "p2"]);
      expect(ledger.getEntries({ correlationId: "fund-1" }).map((e) => e.id)).toEqual(["f1", "f2"]);
      expect(ledger.getEntries({ beneficiary: "alice" }).map((e) => e.id)).toEqual(["p1", "p2"]);
      expect(ledger.getEntries({ currency: "XYZ" })).toHaveLength(0);
    });
  });

  describe("snapshot", () => {
    it("restores an identical ledger", () => {
      fundAndPay(ledger);
      const restored = Ledger.fromSnapshot(ledger.snapshot());

      expect(restored.entryCount).toBe(4);
      expect(restored.transactionCount).toBe(2);
      expect(restored.getAccounts()).toEqual(ledger.getAccounts());
      expect(restored.getTrialBalance(TS)).toEqual(ledger.getTrialBalance(TS));
    });

    it("rejects a tampered snapshot", () => {
      fundAndPay(ledger);
      const snap = ledger.snapshot();
      const tampered = {
        ...snap,
        entries: snap.entries.map((e) => (e.id === "f1" ? { ...e, money: trn("999.00") } : e)),
      };
      expect(() => Ledger.fromSnapshot(tampered)).toThrow(/unbalanced/);
    });
  });

  it("LedgerError carries name and code", () => {
    const err = new LedgerError("UNKNOWN_ACCOUNT", "test");
    expect(err.name).toBe("LedgerError");
    expect(err.code).toBe("UNKNOWN_ACCOUNT");
    expect(err.message).toBe("test");
  });
});
