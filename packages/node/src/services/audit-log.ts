/**
 * Append-only audit log for recording who-did-what-when.
 *
 * Route handlers record every successful mutation here. In-memory only;
 * survives as long as the process.
 */

// =============================================================================
// Types
// =============================================================================

export type AuditAction =
  | "create"
  | "release"
  | "revoke"
  | "transfer-ownership"
  | "update-token"
  | "grant-creator"
  | "revoke-creator";

export interface AuditLogEntry {
  readonly timestamp: string;
  readonly action: AuditAction;
  readonly resourceType: "schedule" | "authority";
  readonly resourceId: string;
  readonly actor: string;
  readonly requestId?: string | undefined;
  readonly detail?: string | undefined;
}

export interface AuditLogQuery {
  readonly action?: AuditAction | undefined;
  readonly resourceType?: AuditLogEntry["resourceType"] | undefined;
  readonly resourceId?: string | undefined;
  readonly actor?: string | undefined;
  readonly limit?: number | undefined;
}

// =============================================================================
// AuditLog
// =============================================================================

export class AuditLog {
  private readonly _entries: AuditLogEntry[] = [];
  private readonly _timestamp: () => string;

  constructor(timestamp?: () => string) {
    this._timestamp = timestamp ?? (() => new Date().toISOString());
  }

  append(entry: Omit<AuditLogEntry, "timestamp">): void {
    this._entries.push({
      ...entry,
      timestamp: this._timestamp(),
    });
  }

  /**
   * Query audit log entries with optional filters.
   *
   * Returns newest-first.
   */
  query(filter?: AuditLogQuery): readonly AuditLogEntry[] {
    let results: AuditLogEntry[] = this._entries;

    if (filter?.action !== undefined) {
      results = results.filter((e) => e.action === filter.action);
    }
    if (filter?.resourceType !== undefined) {
      results = results.filter((e) => e.resourceType === filter.resourceType);
    }
    if (filter?.resourceId !== undefined) {
      results = results.filter((e) => e.resourceId === filter.resourceId);
    }
    if (filter?.actor !== undefined) {
      results = results.filter((e) => e.actor === filter.actor);
    }

    results = [...results].reverse();

    if (filter?.limit !== undefined && filter.limit > 0) {
      results = results.slice(0, filter.limit);
    }

    return results;
  }

  get size(): number {
    return this._entries.length;
  }
}
