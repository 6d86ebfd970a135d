/**
 * @clusterhook/sdk — Typed HTTP client for the receivers API.
 *
 * Uses native fetch; no runtime dependencies beyond the shared types.
 *
 * @packageDocumentation
 */

// Types
export type {
  ClusterhookClientConfig,
  ClusterhookResponse,
  Receiver,
  Action,
  ReceiverPage,
} from "./types.js";

export { ClusterhookError } from "./types.js";

// HTTP Client
export { HttpClient } from "./http-client.js";

// Client
export { ClusterhookClient, ReceiversNamespace } from "./client.js";
export type {
  CreateReceiverParams,
  ListReceiversParams,
  ReceiverSortKey,
  SortDirection,
} from "./client.js";
