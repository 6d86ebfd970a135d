/**
 * @clusterhook/receivers — the receiver subsystem.
 *
 * - Channel Allocator: webhook URLs derived from receiver ids
 * - Credential Delegator: trusts issued, revoked and impersonated
 * - Receiver Store: in-memory and JSONL-backed persistence
 * - Trigger Dispatcher: authenticate an invocation, submit its action
 * - Lifecycle Manager: create/delete without orphaned credentials
 *
 * @packageDocumentation
 */

// Errors
export { ReceiverError, DelegationError, StoreError, hasErrorCode } from "./errors.js";
export type { ReceiverErrorCode, DelegationErrorCode, StoreErrorCode } from "./errors.js";

// Channel
export {
  createChannelAllocator,
  webhookTriggerPath,
  WEBHOOK_PROTOCOL_VERSION,
} from "./channel.js";
export type { ChannelAllocator } from "./channel.js";

// Retry / timeout
export {
  withRetry,
  withTimeout,
  computeDelay,
  sleep,
  RetryExhaustedError,
  TimeoutError,
  DEFAULT_RETRY_CONFIG,
} from "./retry.js";
export type { RetryConfig } from "./retry.js";

// Delegation
export {
  credentialHandle,
  TrustNotFoundError,
  TrustExpiredError,
  DelegationNotAllowedError,
} from "./delegation/types.js";
export type {
  DelegationScope,
  CredentialHandle,
  CredentialDelegator,
  IdentityService,
  TrustRecord,
  TrustRequest,
} from "./delegation/types.js";
export { TrustDelegator } from "./delegation/trust-delegator.js";
export type { TrustDelegatorOptions } from "./delegation/trust-delegator.js";
export { InMemoryIdentityService } from "./delegation/in-memory-identity-service.js";
export type { InMemoryIdentityServiceOptions } from "./delegation/in-memory-identity-service.js";

// Store
export type {
  ReceiverStore,
  ReceiverQuery,
  SortKey,
  SortDirection,
  SortSpec,
} from "./store/types.js";
export {
  applyQuery,
  comparePositions,
  sortPosition,
  DEFAULT_SORT,
  SORT_KEYS,
} from "./store/query.js";
export { InMemoryReceiverStore } from "./store/in-memory-store.js";
export { JsonlReceiverStore } from "./store/jsonl-store.js";
export type { JsonlReceiverStoreOptions } from "./store/jsonl-store.js";

// External collaborators
export { InMemoryClusterRegistry } from "./collaborators/cluster-registry.js";
export type { ClusterRegistry } from "./collaborators/cluster-registry.js";
export {
  InMemoryActionEngine,
  ActionRejectedError,
} from "./collaborators/action-engine.js";
export type {
  ActionEngine,
  ActionRejectionReason,
  InMemoryActionEngineOptions,
} from "./collaborators/action-engine.js";

// Dispatcher
export {
  TriggerDispatcher,
  createAuthenticators,
  webhookAuthenticator,
  signalAuthenticator,
  mergeParams,
  ANONYMOUS,
} from "./dispatcher.js";
export type {
  InvocationAuth,
  InvocationState,
  InvocationTransition,
  InvocationResult,
  Authenticator,
  TriggerDispatcherDeps,
} from "./dispatcher.js";

// Lifecycle
export { ReceiverLifecycle } from "./lifecycle.js";
export type {
  CreateReceiverInput,
  ListReceiversOptions,
  ReceiverLifecycleDeps,
} from "./lifecycle.js";
