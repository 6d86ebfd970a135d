/**
 * Filtering and ordering shared by every ReceiverStore implementation.
 *
 * A record's position in a listing is the tuple of its sort key values
 * followed by its id. Positions are plain strings so that a listing
 * cursor can carry one without knowing anything about records.
 */

import type { ReceiverRecord } from "@clusterhook/types";
import type { ReceiverQuery, SortKey, SortSpec } from "./types.js";

export const DEFAULT_SORT: readonly SortSpec[] = [
  { key: "createdAt", direction: "asc" },
];

export const SORT_KEYS: readonly SortKey[] = [
  "name",
  "type",
  "clusterId",
  "action",
  "createdAt",
];

export function matchesQuery(record: ReceiverRecord, query: ReceiverQuery): boolean {
  if (query.project !== undefined && record.project !== query.project) {
    return false;
  }
  if (
    query.names !== undefined &&
    query.names.length > 0 &&
    !query.names.includes(record.name)
  ) {
    return false;
  }
  if (query.type !== undefined && record.type !== query.type) {
    return false;
  }
  if (query.clusterId !== undefined && record.clusterId !== query.clusterId) {
    return false;
  }
  if (query.action !== undefined && record.action !== query.action) {
    return false;
  }
  return true;
}

/**
 * Sort key values of a record followed by its id.
 */
export function sortPosition(
  record: ReceiverRecord,
  sort: readonly SortSpec[],
): readonly string[] {
  return [...sort.map((s) => record[s.key]), record.id];
}

function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Compare two positions under a sort. The trailing id always sorts
 * ascending.
 */
export function comparePositions(
  a: readonly string[],
  b: readonly string[],
  sort: readonly SortSpec[],
): number {
  const length = Math.min(a.length, b.length);
  for (let i = 0; i < length; i++) {
    const cmp = compareStrings(a[i] ?? "", b[i] ?? "");
    if (cmp !== 0) {
      return sort[i]?.direction === "desc" ? -cmp : cmp;
    }
  }
  return a.length - b.length;
}

/**
 * Filter and order records for a query.
 */
export function applyQuery(
  records: Iterable<ReceiverRecord>,
  query: ReceiverQuery = {},
): readonly ReceiverRecord[] {
  const sort = query.sort !== undefined && query.sort.length > 0 ? query.sort : DEFAULT_SORT;
  const matched: ReceiverRecord[] = [];
  for (const record of records) {
    if (matchesQuery(record, query)) {
      matched.push(record);
    }
  }
  return matched.sort((x, y) =>
    comparePositions(sortPosition(x, sort), sortPosition(y, sort), sort),
  );
}
