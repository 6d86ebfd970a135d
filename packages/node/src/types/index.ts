/**
 * Type barrel — re-exports all public types from @clusterhook/node.
 */

// DTOs
export {
  ParamsSchema,
  PaginationQuerySchema,
  CreateReceiverSchema,
  ListReceiversQuerySchema,
  TriggerReceiverSchema,
  parseSort,
  sortSignature,
} from "./dto.js";
export type {
  CreateReceiverDto,
  ListReceiversQuery,
  TriggerReceiverDto,
} from "./dto.js";

// Error
export { createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// Pagination
export { encodeMarker, decodeMarker, paginate } from "./pagination.js";
export type {
  PaginationQuery,
  PaginationMeta,
  Page,
  DecodedMarker,
} from "./pagination.js";

// Auth
export { ROLES, ROLE_PERMISSIONS, hasPermission, isRole, toRequester } from "./auth.js";
export type {
  Role,
  AuthContext,
  ApiKeyRecord,
  JwtClaims,
} from "./auth.js";

// App env
export type { AppEnv } from "./api-contract.js";
