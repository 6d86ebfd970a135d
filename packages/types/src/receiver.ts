/**
 * Receiver Types
 *
 * A receiver is a persistent binding between an external trigger and a
 * cluster action. Two trigger kinds exist:
 *
 * - webhook: an anonymous HTTP POST to a derived URL, authorized by a
 *   delegated credential issued when the receiver was created
 * - signal: a direct call by a caller who authenticates with their own
 *   credential at invocation time
 */

import type { ActionName } from "./action.js";

/**
 * How a receiver is triggered.
 */
export type ReceiverType = "webhook" | "signal";

export const RECEIVER_TYPES: readonly ReceiverType[] = ["webhook", "signal"];

/**
 * Default action parameters, stored verbatim.
 */
export type ReceiverParams = Readonly<Record<string, unknown>>;

/**
 * The externally reachable invocation descriptor of a webhook receiver.
 */
export interface ChannelInfo {
  readonly alarm_url: string;
}

/**
 * A receiver as persisted by the store.
 *
 * The channel is not part of the persisted state; it is always derived
 * from `id` when a receiver is read.
 */
export interface ReceiverRecord {
  /** System-generated, immutable */
  readonly id: string;

  /** Unique within the owning project */
  readonly name: string;

  readonly type: ReceiverType;

  /** Target cluster; the receiver is bound to it for life */
  readonly clusterId: string;

  readonly action: ActionName;

  /**
   * Delegated credential reference (trust id) for webhook receivers.
   * Empty for signal receivers.
   */
  readonly actor: string;

  readonly params: ReceiverParams;

  readonly project: string;
  readonly domain: string;
  readonly user: string;

  /** ISO 8601 */
  readonly createdAt: string;

  /** ISO 8601; null until a mutating operation exists */
  readonly updatedAt: string | null;
}

/**
 * A receiver as returned to callers, with its channel decorated.
 */
export interface Receiver extends ReceiverRecord {
  readonly channel: ChannelInfo | null;
}
