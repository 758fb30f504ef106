/**
 * Authority — role table keyed by identity.
 *
 * Roles: exactly one `owner`, any number of `authorized-creator`s.
 * The owner and every authorized creator are administrators.
 */

import type { AuthorityRole, Identity } from "@tranche/types";
import { isIdentity } from "@tranche/types";
import { VestingError } from "./errors.js";

/**
 * Read-only capability lookup used by the ledger's permission checks.
 */
export interface AuthorityLookup {
  readonly owner: Identity;
  hasRole(identity: Identity, role: AuthorityRole): boolean;
  isOwner(identity: Identity): boolean;
  isAdministrator(identity: Identity): boolean;
}

export interface AuthoritySnapshot {
  readonly owner: Identity;
  readonly creators: readonly Identity[];
}

export class AuthorityTable implements AuthorityLookup {
  private _owner: Identity;
  private readonly _creators = new Set<Identity>();

  constructor(owner: Identity, creators: readonly Identity[] = []) {
    assertIdentity(owner);
    this._owner = owner;
    for (const creator of creators) {
      assertIdentity(creator);
      this._creators.add(creator);
    }
  }

  get owner(): Identity {
    return this._owner;
  }

  /** Authorized creators in grant order. */
  get creators(): readonly Identity[] {
    return [...this._creators];
  }

  hasRole(identity: Identity, role: AuthorityRole): boolean {
    return role === "owner" ? identity === this._owner : this._creators.has(identity);
  }

  isOwner(identity: Identity): boolean {
    return identity === this._owner;
  }

  isAdministrator(identity: Identity): boolean {
    return identity === this._owner || this._creators.has(identity);
  }

  // ─── Mutations (called by VestingLedger after its permission check) ──

  /** Returns the previous owner, who loses the owner role. */
  transferOwnership(newOwner: Identity): Identity {
    assertIdentity(newOwner);
    const previous = this._owner;
    this._owner = newOwner;
    return previous;
  }

  /** Returns false when the identity already held the role. */
  grantCreator(identity: Identity): boolean {
    assertIdentity(identity);
    if (this._creators.has(identity)) return false;
    this._creators.add(identity);
    return true;
  }

  /** Returns false when the identity did not hold the role. */
  revokeCreator(identity: Identity): boolean {
    return this._creators.delete(identity);
  }

  snapshot(): AuthoritySnapshot {
    return { owner: this._owner, creators: this.creators };
  }

  static fromSnapshot(snapshot: AuthoritySnapshot): AuthorityTable {
    return new AuthorityTable(snapshot.owner, snapshot.creators);
  }
}

function assertIdentity(identity: Identity): void {
  if (!isIdentity(identity)) {
    throw new VestingError("INVALID_ADDRESS", `Invalid identity: "${identity}"`);
  }
}
