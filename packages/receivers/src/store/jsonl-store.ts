/**
 * File-based JSONL ReceiverStore.
 *
 * Persists receivers as an append-only log of put/delete operations,
 * one JSON object per line. The current state is the replay of the log.
 *
 * Crash safety:
 * - Each write flushes to disk via fsync before in-memory state changes
 * - Partial or invalid lines are skipped on load
 *
 * File format:
 * {"op":"put","record":{...},"at":"..."}
 * {"op":"delete","id":"...","at":"..."}
 */

import {
  openSync,
  closeSync,
  appendFileSync,
  readFileSync,
  existsSync,
  fsyncSync,
  mkdirSync,
  accessSync,
  constants,
} from "node:fs";
import { dirname } from "node:path";
import type { ReceiverRecord } from "@clusterhook/types";
import { isReceiverRecord } from "@clusterhook/types";
import { StoreError } from "../errors.js";
import { InMemoryReceiverStore } from "./in-memory-store.js";

export interface JsonlReceiverStoreOptions {
  /** Path to the JSONL file */
  readonly filePath: string;
}

type LogLine =
  | { readonly op: "put"; readonly record: ReceiverRecord; readonly at: string }
  | { readonly op: "delete"; readonly id: string; readonly at: string };

export class JsonlReceiverStore extends InMemoryReceiverStore {
  private readonly _filePath: string;

  /**
   * If the file exists, receivers are loaded from it. Otherwise it is
   * created on first write; the parent directory is created now.
   */
  constructor(options: JsonlReceiverStoreOptions) {
    super();
    this._filePath = options.filePath;
    mkdirSync(dirname(this._filePath), { recursive: true });
    this._loadFromFile();
  }

  override async insert(record: ReceiverRecord): Promise<void> {
    this.assertInsertable(record);
    this._append({ op: "put", record, at: new Date().toISOString() });
    this.put(record);
  }

  override async compareAndDelete(
    id: string,
    expectedActor: string,
  ): Promise<boolean> {
    const current = this._records.get(id);
    if (current === undefined || current.actor !== expectedActor) {
      return false;
    }
    this._append({ op: "delete", id, at: new Date().toISOString() });
    this.remove(current);
    return true;
  }

  override async ping(): Promise<void> {
    try {
      accessSync(dirname(this._filePath), constants.W_OK);
    } catch (err: unknown) {
      throw new StoreError(
        "STORE_UNAVAILABLE",
        `Receiver store at '${this._filePath}' is not writable: ${err instanceof Error ? err.message : String(err)}`,
      );
    }
  }

  // ─── Internals ──────────────────────────────────────────────────────

  private _append(line: LogLine): void {
    try {
      const fd = openSync(this._filePath, "a");
      try {
        appendFileSync(fd, JSON.stringify(line) + "\n", "utf-8");
        fsyncSync(fd);
      } finally {
        closeSync(fd);
      }
    } catch (err: unknown) {
      throw new StoreError(
        "STORE_UNAVAILABLE",
        `Failed to write receiver store: ${err instanceof Error ? err.message : String(err)}`,
      );
    }
  }

  private _loadFromFile(): void {
    if (!existsSync(this._filePath)) {
      return;
    }

    const content = readFileSync(this._filePath, "utf-8");

    for (const line of content.split("\n")) {
      const trimmed = line.trim();
      if (trimmed.length === 0) {
        continue;
      }

      let parsed: unknown;
      try {
        parsed = JSON.parse(trimmed);
      } catch {
        // Torn write — skip
        continue;
      }
      if (parsed === null || typeof parsed !== "object") {
        continue;
      }

      const entry = parsed as Record<string, unknown>;
      if (entry.op === "put" && isReceiverRecord(entry.record)) {
        const previous = this._records.get(entry.record.id);
        if (previous !== undefined) {
          this.remove(previous);
        }
        this.put(entry.record);
      } else if (entry.op === "delete" && typeof entry.id === "string") {
        const current = this._records.get(entry.id);
        if (current !== undefined) {
          this.remove(current);
        }
      }
    }
  }
}
