/**
 * Receiver Store types.
 *
 * The store is the durable record of receivers. It is the only place
 * where uniqueness is enforced: ids globally, names per project.
 */

import type { ReceiverRecord, ReceiverType } from "@clusterhook/types";

// =============================================================================
// Query
// =============================================================================

export type SortKey = "name" | "type" | "clusterId" | "action" | "createdAt";

export type SortDirection = "asc" | "desc";

export interface SortSpec {
  readonly key: SortKey;
  readonly direction: SortDirection;
}

export interface ReceiverQuery {
  /** Restrict to one project. Omitted: every project. */
  readonly project?: string | undefined;
  /** Match any of these names */
  readonly names?: readonly string[] | undefined;
  readonly type?: ReceiverType | undefined;
  readonly clusterId?: string | undefined;
  readonly action?: string | undefined;
  /** Sort order; the receiver id always breaks ties. Default: createdAt asc */
  readonly sort?: readonly SortSpec[] | undefined;
}

// =============================================================================
// Store
// =============================================================================

export interface ReceiverStore {
  /**
   * Persist a new receiver.
   *
   * @throws StoreError DUPLICATE_ID or NAME_CONFLICT
   */
  insert(record: ReceiverRecord): Promise<void>;

  get(id: string): Promise<ReceiverRecord | undefined>;

  findByName(project: string, name: string): Promise<ReceiverRecord | undefined>;

  /**
   * Matching receivers in query sort order.
   */
  list(query?: ReceiverQuery): Promise<readonly ReceiverRecord[]>;

  /**
   * Remove a receiver only if it still exists with the given actor.
   *
   * @returns true if this call removed the record
   */
  compareAndDelete(id: string, expectedActor: string): Promise<boolean>;

  /**
   * Liveness check for readiness probes.
   *
   * @throws StoreError STORE_UNAVAILABLE
   */
  ping(): Promise<void>;
}
