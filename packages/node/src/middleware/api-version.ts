/**
 * API version negotiation.
 *
 * Clients name the version they speak in X-Api-Version ("major.minor").
 * Absent header: the minimum version. Unsupported: 406. The served
 * version is echoed on every response.
 */

import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";

export const API_VERSION_HEADER = "X-Api-Version";

export const SUPPORTED_API_VERSIONS: readonly string[] = ["1.0", "1.1"];

export const MIN_API_VERSION = "1.0";
export const MAX_API_VERSION = "1.1";

export function apiVersionMiddleware(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const requested = c.req.header(API_VERSION_HEADER)?.trim();
    const version =
      requested === undefined || requested === "" ? MIN_API_VERSION : requested;

    if (!SUPPORTED_API_VERSIONS.includes(version)) {
      c.header(API_VERSION_HEADER, MAX_API_VERSION);
      return c.json(
        createErrorEnvelope(
          "UNSUPPORTED_VERSION",
          `API version '${version}' is not supported; supported versions are ${MIN_API_VERSION} to ${MAX_API_VERSION}`,
        ),
        406,
      );
    }

    c.set("apiVersion", version);
    await next();
    c.header(API_VERSION_HEADER, version);
  };
}
