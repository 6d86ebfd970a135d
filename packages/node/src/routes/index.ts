/**
 * Route barrel — re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createReceiverRoutes } from "./receivers.js";
export { createWebhookRoutes } from "./webhooks.js";
