/**
 * Hono application environment type.
 *
 * Defines the typed context variables available in all route handlers.
 * These are set by middleware and consumed by route handlers.
 */

import type { AuthContext } from "./auth.js";

/**
 * Middleware populates Variables; route handlers read them via c.get().
 */
export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** Negotiated API version (set by api-version middleware) */
    apiVersion: string;

    /** Authentication context (set by auth middleware) */
    auth: AuthContext;

    /** Parsed request body (set by validateBody) */
    validatedBody: unknown;
  };
}
