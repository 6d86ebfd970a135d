/**
 * Request ID middleware.
 *
 * Propagates an incoming X-Request-Id or generates one, and echoes it on
 * the response.
 */

import { randomUUID } from "node:crypto";
import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export const REQUEST_ID_HEADER = "X-Request-Id";

const MAX_REQUEST_ID_LENGTH = 128;

export function requestIdMiddleware(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const existing = c.req.header(REQUEST_ID_HEADER)?.trim();
    const requestId =
      existing !== undefined &&
      existing !== "" &&
      existing.length <= MAX_REQUEST_ID_LENGTH
        ? existing
        : `req-${randomUUID()}`;

    c.set("requestId", requestId);
    c.header(REQUEST_ID_HEADER, requestId);

    await next();

    c.header(REQUEST_ID_HEADER, requestId);
  };
}
