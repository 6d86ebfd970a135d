/**
 * ETag for receiver representations.
 *
 * Receivers are immutable, so the tag only lets clients revalidate
 * cached reads.
 */

import { createHash } from "node:crypto";
import type { Context } from "hono";

/**
 * Compute an ETag for a JSON-serializable object.
 */
export function computeETag(obj: unknown): string {
  const json = JSON.stringify(obj);
  const hash = createHash("sha256").update(json).digest("hex").slice(0, 16);
  return `"${hash}"`;
}

/**
 * Whether If-None-Match already names the entity's current ETag.
 */
export function isNotModified(c: Context, entity: unknown): boolean {
  const ifNoneMatch = c.req.header("If-None-Match");
  if (ifNoneMatch === undefined) {
    return false;
  }
  const current = computeETag(entity);
  return ifNoneMatch.split(",").some((tag) => tag.trim() === current);
}

/**
 * Set ETag header on the response for the given entity.
 */
export function setETag(c: Context, entity: unknown): void {
  c.header("ETag", computeETag(entity));
}
