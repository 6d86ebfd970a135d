/**
 * @clusterhook/node — package public API.
 */

export { ReceiverService } from "./services/receiver-service.js";
export type { ReceiverServiceConfig } from "./services/receiver-service.js";
export { AuditLog } from "./services/audit-log.js";
export type { AuditLogEntry, AuditLogQuery, AuditAction } from "./services/audit-log.js";
export { loadConfig, parseApiKeys, parseClusters, ConfigSchema } from "./config.js";
export type { AppConfig, ParsedApiKey } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export { presentReceiver, presentAction } from "./presenter.js";
export type { ReceiverView, ActionView } from "./presenter.js";
export * from "./middleware/index.js";
export * from "./types/index.js";
