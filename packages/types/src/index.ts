/**
 * @clusterhook/types — Shared domain types for the receiver service.
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - Wire naming (snake_case) lives in the HTTP layer, not here
 */

// Receiver types
export { RECEIVER_TYPES } from "./receiver.js";
export type {
  ReceiverType,
  ReceiverParams,
  ChannelInfo,
  ReceiverRecord,
  Receiver,
} from "./receiver.js";

// Action types
export { ACTION_NAMES } from "./action.js";
export type {
  ActionName,
  ActionStatus,
  ActionRequest,
  ActionHandle,
} from "./action.js";

// Identity types
export { isOperator, canWrite } from "./identity.js";
export type {
  Permission,
  RequesterIdentity,
  ActingIdentity,
} from "./identity.js";

// Cluster types
export type { ClusterRef } from "./cluster.js";

// Runtime type guards
export {
  isReceiverType,
  isActionName,
  isPermission,
  isReceiverParams,
  isChannelInfo,
  isReceiverRecord,
} from "./guards.js";
