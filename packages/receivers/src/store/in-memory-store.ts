/**
 * In-memory ReceiverStore.
 *
 * Records live in a Map keyed by id, with a secondary index on
 * (project, name). Every mutation runs to completion without awaiting,
 * so inserts and compare-and-deletes are atomic per record.
 */

import type { ReceiverRecord } from "@clusterhook/types";
import { StoreError } from "../errors.js";
import { applyQuery } from "./query.js";
import type { ReceiverQuery, ReceiverStore } from "./types.js";

export function nameKey(project: string, name: string): string {
  return `${project}\u0000${name}`;
}

export class InMemoryReceiverStore implements ReceiverStore {
  protected readonly _records = new Map<string, ReceiverRecord>();
  protected readonly _names = new Map<string, string>();

  async insert(record: ReceiverRecord): Promise<void> {
    this.assertInsertable(record);
    this.put(record);
  }

  async get(id: string): Promise<ReceiverRecord | undefined> {
    return this._records.get(id);
  }

  async findByName(
    project: string,
    name: string,
  ): Promise<ReceiverRecord | undefined> {
    const id = this._names.get(nameKey(project, name));
    return id === undefined ? undefined : this._records.get(id);
  }

  async list(query?: ReceiverQuery): Promise<readonly ReceiverRecord[]> {
    return applyQuery(this._records.values(), query);
  }

  async compareAndDelete(id: string, expectedActor: string): Promise<boolean> {
    const current = this._records.get(id);
    if (current === undefined || current.actor !== expectedActor) {
      return false;
    }
    this.remove(current);
    return true;
  }

  async ping(): Promise<void> {
    // Always available
  }

  get size(): number {
    return this._records.size;
  }

  // ─── Internals ──────────────────────────────────────────────────────

  protected assertInsertable(record: ReceiverRecord): void {
    if (this._records.has(record.id)) {
      throw new StoreError(
        "DUPLICATE_ID",
        `Receiver '${record.id}' already exists`,
        record.id,
      );
    }
    if (this._names.has(nameKey(record.project, record.name))) {
      throw new StoreError(
        "NAME_CONFLICT",
        `A receiver named '${record.name}' already exists in project '${record.project}'`,
        record.id,
      );
    }
  }

  protected put(record: ReceiverRecord): void {
    this._records.set(record.id, record);
    this._names.set(nameKey(record.project, record.name), record.id);
  }

  protected remove(record: ReceiverRecord): void {
    this._records.delete(record.id);
    this._names.delete(nameKey(record.project, record.name));
  }
}
