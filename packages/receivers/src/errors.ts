/**
 * Receiver subsystem errors.
 *
 * Every failure the subsystem reports to its callers carries a code.
 * The HTTP layer maps codes to statuses; nothing above this layer
 * inspects messages.
 */

// =============================================================================
// Receiver Errors (lifecycle + dispatch)
// =============================================================================

export type ReceiverErrorCode =
  | "INVALID_TYPE"
  | "UNKNOWN_ACTION"
  | "CLUSTER_NOT_FOUND"
  | "VALIDATION_FAILED"
  | "RECEIVER_NOT_FOUND"
  | "FORBIDDEN"
  | "UNAUTHORIZED"
  | "DISPATCH_REJECTED"
  | "UNAVAILABLE";

export class ReceiverError extends Error {
  public readonly code: ReceiverErrorCode;
  constructor(code: ReceiverErrorCode, message: string) {
    super(message);
    this.name = "ReceiverError";
    this.code = code;
  }
}

// =============================================================================
// Delegation Errors (credential delegator)
// =============================================================================

export type DelegationErrorCode =
  | "DELEGATION_FAILED"
  | "REVOCATION_FAILED"
  | "ALREADY_REVOKED"
  | "CREDENTIAL_INVALID";

export class DelegationError extends Error {
  constructor(
    public readonly code: DelegationErrorCode,
    message: string,
    public readonly trustId?: string,
  ) {
    super(message);
    this.name = "DelegationError";
  }
}

// =============================================================================
// Store Errors
// =============================================================================

export type StoreErrorCode =
  | "NAME_CONFLICT"
  | "DUPLICATE_ID"
  | "INVALID_RECORD"
  | "STORE_UNAVAILABLE";

export class StoreError extends Error {
  constructor(
    public readonly code: StoreErrorCode,
    message: string,
    public readonly receiverId?: string,
  ) {
    super(message);
    this.name = "StoreError";
  }
}

/**
 * Narrow an unknown thrown value to one of the coded errors above.
 */
export function hasErrorCode<C extends string>(
  err: unknown,
  code: C,
): err is Error & { readonly code: C } {
  return (
    err instanceof Error &&
    "code" in err &&
    err.code === code
  );
}
