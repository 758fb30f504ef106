/**
 * @tranche/ledger — Chart of accounts.
 *
 * Append-only: accounts are registered once and never change.
 */

import type { AccountRef } from "@tranche/types";
import type { AccountType, LedgerAccount } from "./types.js";
import { LedgerError } from "./types.js";

export class AccountRegistry {
  private readonly _accounts: Map<string, LedgerAccount> = new Map();

  /**
   * Register a new account. Throws on a duplicate ID.
   */
  register(ref: AccountRef, timestamp: string): LedgerAccount {
    if (this._accounts.has(ref.id)) {
      throw new LedgerError("DUPLICATE_ACCOUNT_ID", `Account already exists: "${ref.id}"`);
    }

    const account: LedgerAccount = { ref: { ...ref }, createdAt: timestamp };
    this._accounts.set(ref.id, account);
    return account;
  }

  get(id: string): LedgerAccount | undefined {
    return this._accounts.get(id);
  }

  has(id: string): boolean {
    return this._accounts.has(id);
  }

  assertExists(id: string): LedgerAccount {
    const account = this._accounts.get(id);
    if (account === undefined) {
      throw new LedgerError("UNKNOWN_ACCOUNT", `Unknown account: "${id}"`);
    }
    return account;
  }

  getType(id: string): AccountType {
    return this.assertExists(id).ref.type;
  }

  getAll(): readonly LedgerAccount[] {
    return [...this._accounts.values()];
  }

  get count(): number {
    return this._accounts.size;
  }
}
