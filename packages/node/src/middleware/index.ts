/**
 * Middleware barrel — re-exports all middleware.
 */

export { createErrorHandler, statusForCode } from "./error-handler.js";
export { requestIdMiddleware, REQUEST_ID_HEADER } from "./request-id.js";
export {
  apiVersionMiddleware,
  API_VERSION_HEADER,
  SUPPORTED_API_VERSIONS,
  MIN_API_VERSION,
  MAX_API_VERSION,
} from "./api-version.js";
export { loggerMiddleware } from "./logger.js";
export type { RequestLogEntry } from "./logger.js";
export { validateBody, formatZodErrors } from "./validate.js";
export type { ValidateBodyOptions } from "./validate.js";
export { computeETag, isNotModified, setETag } from "./etag.js";
export {
  authMiddleware,
  devAuthMiddleware,
  requirePermission,
  verifyJwt,
  signJwt,
} from "./auth.js";
export type { AuthConfig, DevAuthConfig } from "./auth.js";
