/**
 * @clusterhook/sdk — SDK types.
 *
 * Types specific to the SDK client layer. Receiver and action shapes
 * mirror the wire format (snake_case), not the server's domain types.
 */

import type { ActionName, ReceiverType } from "@clusterhook/types";

// =============================================================================
// Client Configuration
// =============================================================================

export interface ClusterhookClientConfig {
  /** Base URL of the receivers API (e.g., "https://hooks.example.com") */
  readonly baseUrl: string;
  /** API key sent as X-Api-Key */
  readonly apiKey?: string | undefined;
  /** JWT sent as a bearer token when no API key is set */
  readonly bearerToken?: string | undefined;
  /** Value for X-Api-Version (server default: "1.0") */
  readonly apiVersion?: string | undefined;
  /** Request timeout in milliseconds (default: 30000) */
  readonly timeout?: number | undefined;
  /** Maximum retry attempts for idempotent requests (default: 3) */
  readonly retries?: number | undefined;
  /** First retry delay in milliseconds, doubled per attempt (default: 1000) */
  readonly retryBaseMs?: number | undefined;
  /** Custom fetch function (for testing or polyfills) */
  readonly fetchFn?: typeof fetch | undefined;
}

// =============================================================================
// Response Types
// =============================================================================

export interface ClusterhookResponse<T> {
  readonly data: T;
  readonly status: number;
  /** Response headers (selected) */
  readonly headers: Readonly<Record<string, string>>;
}

// =============================================================================
// Wire Types
// =============================================================================

export interface Receiver {
  readonly id: string;
  readonly name: string;
  readonly type: ReceiverType;
  readonly cluster_id: string;
  readonly action: ActionName;
  /** `{ trust_id }` for webhook receivers, `{}` for signal receivers */
  readonly actor: Readonly<Record<string, string>>;
  readonly params: Readonly<Record<string, unknown>>;
  /** `{ alarm_url }` for webhook receivers */
  readonly channel: { readonly alarm_url: string } | null;
  readonly project: string;
  readonly domain: string;
  readonly user: string;
  readonly created_at: string;
  readonly updated_at: string | null;
}

export interface Action {
  readonly id: string;
  readonly action: ActionName;
  readonly target: string;
  readonly status: string;
  readonly created_at: string;
}

export interface ReceiverPage {
  readonly receivers: readonly Receiver[];
  readonly pagination: {
    /** Pass back as `marker` for the next page; null on the last page */
    readonly marker: string | null;
    readonly hasMore: boolean;
  };
}

// =============================================================================
// Error Types
// =============================================================================

/**
 * Structured error from the receivers API, or a transport failure
 * (statusCode 0).
 */
export class ClusterhookError extends Error {
  /** Error code from the API (e.g., "RECEIVER_NOT_FOUND", "VALIDATION_ERROR") */
  readonly code: string;
  /** HTTP status code */
  readonly statusCode: number;
  /** Additional error details (validation issues, etc.) */
  readonly details?: unknown;

  constructor(code: string, message: string, statusCode: number, details?: unknown) {
    super(message);
    this.name = "ClusterhookError";
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;
  }
}
