/**
 * Append-only audit log for recording who-did-what-when.
 *
 * The service records every mutation here (amendments, ingestion runs,
 * resets). In-memory only; it lasts as long as the process.
 */

// =============================================================================
// Types
// =============================================================================

export type AuditAction = "record" | "ingest" | "reset";

export interface AuditLogEntry {
  readonly timestamp: string;
  readonly action: AuditAction;
  readonly resourceType: "amendment" | "act" | "ledger";
  readonly resourceId: string;
  readonly actor: string;
  readonly detail?: string | undefined;
}

export interface AuditLogQuery {
  readonly action?: string | undefined;
  readonly resourceType?: string | undefined;
  readonly resourceId?: string | undefined;
  readonly limit?: number | undefined;
}

// =============================================================================
// AuditLog
// =============================================================================

export class AuditLog {
  private readonly _entries: AuditLogEntry[] = [];

  constructor(private readonly _clock: () => number = Date.now) {}

  /**
   * Append an entry to the audit log.
   */
  append(entry: Omit<AuditLogEntry, "timestamp">): AuditLogEntry {
    const stored: AuditLogEntry = {
      ...entry,
      timestamp: new Date(this._clock()).toISOString(),
    };
    this._entries.push(stored);
    return stored;
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

    // Newest first
    results = [...results].reverse();

    if (filter?.limit !== undefined && filter.limit > 0) {
      results = results.slice(0, filter.limit);
    }

    return results;
  }

  /**
   * Total number of entries.
   */
  get size(): number {
    return this._entries.length;
  }
}
