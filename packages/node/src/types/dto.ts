/**
 * Request DTOs with Zod validation schemas.
 *
 * Field names follow the wire format (snake_case); the presenter and the
 * route handlers translate to the domain's camelCase.
 */

import { z } from "zod";
import { SORT_KEYS } from "@clusterhook/receivers";
import type { SortKey, SortSpec } from "@clusterhook/receivers";

// =============================================================================
// Shared Schemas
// =============================================================================

export const ParamsSchema = z.record(z.unknown());

export const PaginationQuerySchema = z.object({
  marker: z.string().min(1).optional(),
  limit: z.coerce.number().int().min(1).max(1000).default(20),
});

const BooleanQuerySchema = z
  .enum(["true", "false"])
  .transform((v) => v === "true");

// =============================================================================
// Receiver DTOs
// =============================================================================

/**
 * Type and action are checked by the lifecycle, not here, so that
 * unsupported values get their own error codes.
 */
export const CreateReceiverSchema = z.object({
  receiver: z.object({
    name: z.string().max(255),
    cluster_id: z.string().min(1),
    type: z.string().min(1),
    action: z.string().min(1),
    actor: z.record(z.unknown()).optional(),
    params: ParamsSchema.optional(),
  }),
});

export type CreateReceiverDto = z.infer<typeof CreateReceiverSchema>;

/**
 * `name` may repeat; only its presence is checked here, the route reads
 * every value.
 */
export const ListReceiversQuerySchema = PaginationQuerySchema.extend({
  name: z.string().optional(),
  sort: z.string().optional(),
  global_project: BooleanQuerySchema.optional(),
  type: z.enum(["webhook", "signal"]).optional(),
  cluster_id: z.string().min(1).optional(),
  action: z.string().min(1).optional(),
}).strict();

export type ListReceiversQuery = z.infer<typeof ListReceiversQuerySchema>;

export const TriggerReceiverSchema = z.object({
  params: ParamsSchema.optional(),
});

export type TriggerReceiverDto = z.infer<typeof TriggerReceiverSchema>;

// =============================================================================
// Sort
// =============================================================================

/** `clusterId` is spelled `cluster_id` on the wire. */
const WIRE_SORT_KEYS: ReadonlyMap<string, SortKey> = new Map(
  SORT_KEYS.map((key): [string, SortKey] => [
    key.replace(/[A-Z]/g, (c) => `_${c.toLowerCase()}`),
    key,
  ]),
);

/**
 * Parse `key[:asc|desc]` entries, comma-separated.
 *
 * @returns the sort, or a message describing the first bad entry
 */
export function parseSort(
  raw: string,
): { readonly ok: true; readonly sort: readonly SortSpec[] } | { readonly ok: false; readonly message: string } {
  const sort: SortSpec[] = [];
  for (const entry of raw.split(",")) {
    const [wireKey = "", direction = "asc", ...rest] = entry.trim().split(":");
    const key = WIRE_SORT_KEYS.get(wireKey);
    if (key === undefined) {
      return {
        ok: false,
        message: `Unsupported sort key '${wireKey}'; expected one of: ${[...WIRE_SORT_KEYS.keys()].join(", ")}`,
      };
    }
    if ((direction !== "asc" && direction !== "desc") || rest.length > 0) {
      return { ok: false, message: `Unsupported sort direction in '${entry.trim()}'` };
    }
    if (sort.some((s) => s.key === key)) {
      return { ok: false, message: `Sort key '${wireKey}' given more than once` };
    }
    sort.push({ key, direction });
  }
  return { ok: true, sort };
}

/**
 * Canonical text of a sort, carried in pagination markers.
 */
export function sortSignature(sort: readonly SortSpec[]): string {
  return sort.map((s) => `${s.key}:${s.direction}`).join(",");
}
