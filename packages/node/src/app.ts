/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * Separated from main.ts for testability — tests create the app
 * without starting the HTTP server.
 */

import { Hono } from "hono";
import type { Logger } from "pino";
import type { AppEnv } from "./types/api-contract.js";
import { createErrorEnvelope } from "./types/error.js";
import { ReceiverService } from "./services/receiver-service.js";
import type { ReceiverServiceConfig } from "./services/receiver-service.js";
import { createErrorHandler } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { apiVersionMiddleware } from "./middleware/api-version.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import { authMiddleware, devAuthMiddleware } from "./middleware/auth.js";
import type { AuthConfig, DevAuthConfig } from "./middleware/auth.js";
import { createHealthRoutes } from "./routes/health.js";
import { createReceiverRoutes } from "./routes/receivers.js";
import { createWebhookRoutes } from "./routes/webhooks.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly serviceConfig: ReceiverServiceConfig;
  readonly logFn?: ((entry: RequestLogEntry) => void) | undefined;
  /** Logger for unexpected failures */
  readonly logger?: Logger | undefined;
  /** Auth configuration. When provided, auth middleware is enabled. */
  readonly auth?: AuthConfig | undefined;
  /** Caller defaults for the unsecured mode used when `auth` is absent */
  readonly devAuth?: DevAuthConfig | undefined;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: ReceiverService;
}

const DEFAULT_DEV_AUTH: DevAuthConfig = {
  defaultProject: "default",
  defaultUser: "developer",
  defaultDomain: "default",
};

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const service = new ReceiverService(options.serviceConfig);
  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  // ─── Error Handler ──────────────────────────────────────────────
  app.onError(createErrorHandler(options.logger));
  app.notFound((c) =>
    c.json(createErrorEnvelope("NOT_FOUND", `No route for ${c.req.method} ${c.req.path}`), 404),
  );

  // ─── Health Routes (no auth, no versioning) ─────────────────────
  app.route("/", createHealthRoutes(service));

  // ─── API Routes ─────────────────────────────────────────────────
  app.use("/v1/*", apiVersionMiddleware());

  // Webhook triggers are anonymous; the receiver's credential authorizes them
  app.route("/v1/webhooks", createWebhookRoutes(service));

  const authenticate =
    options.auth !== undefined
      ? authMiddleware(options.auth)
      : devAuthMiddleware(options.devAuth ?? DEFAULT_DEV_AUTH);
  const receivers = new Hono<AppEnv>();
  receivers.use("*", authenticate);
  receivers.route("/", createReceiverRoutes(service));
  app.route("/v1/receivers", receivers);

  return { app, service };
}
