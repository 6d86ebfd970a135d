/**
 * Append-only audit log for recording who-did-what-when.
 *
 * Receives one entry per receiver create, delete and trigger.
 * In-memory only — survives as long as the process.
 */

// =============================================================================
// Types
// =============================================================================

export type AuditAction = "create" | "delete" | "trigger";

export interface AuditLogEntry {
  readonly timestamp: string;
  /** Owning project */
  readonly tenantId: string;
  readonly action: AuditAction;
  readonly resourceType: string;
  readonly resourceId: string;
  /** User name, or "webhook" for anonymous triggers */
  readonly actor: string;
  readonly detail?: string | undefined;
}

export interface AuditLogQuery {
  readonly tenantId?: string | undefined;
  readonly action?: AuditAction | undefined;
  readonly resourceId?: string | undefined;
  readonly limit?: number | undefined;
}

// =============================================================================
// AuditLog
// =============================================================================

export class AuditLog {
  private readonly _entries: AuditLogEntry[] = [];
  private readonly _now: () => Date;

  constructor(now: () => Date = () => new Date()) {
    this._now = now;
  }

  append(entry: Omit<AuditLogEntry, "timestamp">): void {
    this._entries.push({
      ...entry,
      timestamp: this._now().toISOString(),
    });
  }

  /**
   * Entries matching every given filter, newest first.
   */
  query(filter: AuditLogQuery = {}): readonly AuditLogEntry[] {
    const results = this._entries.filter(
      (e) =>
        (filter.tenantId === undefined || e.tenantId === filter.tenantId) &&
        (filter.action === undefined || e.action === filter.action) &&
        (filter.resourceId === undefined || e.resourceId === filter.resourceId),
    );

    results.reverse();

    if (filter.limit !== undefined && filter.limit > 0) {
      return results.slice(0, filter.limit);
    }
    return results;
  }

  get size(): number {
    return this._entries.length;
  }
}
