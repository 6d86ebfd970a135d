/**
 * Global error handler.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response.
 *
 * Maps coded domain errors (ReceiverError, DelegationError, StoreError)
 * to HTTP status codes. Anything uncoded is a 500.
 */

import type { Context } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import type { Logger } from "pino";
import { createErrorEnvelope } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

const STATUS_MAP: Readonly<Record<string, ContentfulStatusCode>> = {
  // Lifecycle validation
  VALIDATION_FAILED: 400,
  INVALID_TYPE: 400,
  UNKNOWN_ACTION: 400,
  CLUSTER_NOT_FOUND: 400,

  // Access
  UNAUTHORIZED: 401,
  FORBIDDEN: 403,
  RECEIVER_NOT_FOUND: 404,

  // Store
  NAME_CONFLICT: 409,
  DUPLICATE_ID: 409,
  INVALID_RECORD: 500,
  STORE_UNAVAILABLE: 503,

  // Delegation
  DELEGATION_FAILED: 500,

  // Dispatch
  DISPATCH_REJECTED: 409,
  UNAVAILABLE: 503,
};

/** 5xx codes whose message is safe to show the caller */
const EXPOSED_SERVER_ERRORS = new Set([
  "DELEGATION_FAILED",
  "STORE_UNAVAILABLE",
  "UNAVAILABLE",
]);

/**
 * The error's code if it is one this service maps, else undefined.
 */
function mappedCode(err: Error): string | undefined {
  if (
    "code" in err &&
    typeof err.code === "string" &&
    Object.hasOwn(STATUS_MAP, err.code)
  ) {
    return err.code;
  }
  return undefined;
}

export function statusForCode(code: string): ContentfulStatusCode {
  return STATUS_MAP[code] ?? 500;
}

// =============================================================================
// Handler
// =============================================================================

/**
 * Create the global error handler. Registered as Hono's onError handler.
 */
export function createErrorHandler(
  logger?: Logger,
): (err: Error, c: Context) => Response {
  return (err, c) => {
    const code = mappedCode(err);
    const status = code === undefined ? 500 : statusForCode(code);

    if (status >= 500) {
      logger?.error(
        { err, code, method: c.req.method, path: c.req.path },
        "Request failed",
      );
    }

    // Don't leak internal details on unexpected failures
    const exposed =
      code !== undefined && (status < 500 || EXPOSED_SERVER_ERRORS.has(code));

    return c.json(
      createErrorEnvelope(
        exposed ? code : "INTERNAL_ERROR",
        exposed ? err.message : "Internal server error",
      ),
      status,
    );
  };
}
