/**
 * Marker-based pagination.
 *
 * A marker is a base64url-encoded JSON object { s, p }: the sort it was
 * issued under and the position of the last item served. Positions are
 * compared with the same ordering the listing was sorted by, so pages
 * stay stable while receivers are created and deleted between requests.
 *
 * List endpoints return { <items>, pagination: { marker, hasMore } }.
 */

// =============================================================================
// Types
// =============================================================================

export interface PaginationQuery {
  /** Position of the last item on the previous page */
  readonly after?: readonly string[] | undefined;
  readonly limit: number;
}

export interface PaginationMeta {
  readonly marker: string | null;
  readonly hasMore: boolean;
}

export interface Page<T> {
  readonly items: readonly T[];
  readonly pagination: PaginationMeta;
}

export interface DecodedMarker {
  readonly sort: string;
  readonly position: readonly string[];
}

// =============================================================================
// Marker Encoding
// =============================================================================

interface MarkerData {
  readonly s: string; // sort signature (compact key)
  readonly p: readonly string[]; // last seen position
}

export function encodeMarker(sort: string, position: readonly string[]): string {
  const data: MarkerData = { s: sort, p: position };
  return Buffer.from(JSON.stringify(data)).toString("base64url");
}

/**
 * @returns Decoded marker, or undefined if the marker is malformed.
 */
export function decodeMarker(marker: string): DecodedMarker | undefined {
  try {
    const json = Buffer.from(marker, "base64url").toString("utf-8");
    const data: unknown = JSON.parse(json);
    if (
      typeof data !== "object" ||
      data === null ||
      !("s" in data) ||
      !("p" in data) ||
      typeof data.s !== "string" ||
      !Array.isArray(data.p)
    ) {
      return undefined;
    }
    const position: string[] = [];
    for (const value of data.p) {
      if (typeof value !== "string") {
        return undefined;
      }
      position.push(value);
    }
    return { sort: data.s, position };
  } catch {
    return undefined;
  }
}

// =============================================================================
// Paginate
// =============================================================================

/**
 * Cut one page out of a sorted array.
 *
 * Items must already be in `compare` order. Returns the page items, the
 * marker for the next page, and hasMore.
 */
export function paginate<T>(
  items: readonly T[],
  query: PaginationQuery,
  getPosition: (item: T) => readonly string[],
  compare: (a: readonly string[], b: readonly string[]) => number,
  sort: string,
): Page<T> {
  const after = query.after;
  const remaining =
    after === undefined
      ? items
      : items.filter((item) => compare(getPosition(item), after) > 0);

  // Fetch one extra to detect hasMore
  const page = remaining.slice(0, query.limit + 1);
  const hasMore = page.length > query.limit;
  const data = hasMore ? page.slice(0, query.limit) : page;
  const last = data[data.length - 1];

  const marker =
    hasMore && last !== undefined ? encodeMarker(sort, getPosition(last)) : null;

  return { items: data, pagination: { marker, hasMore } };
}
