/**
 * Channel Allocator.
 *
 * Derives the public invocation URL of a webhook receiver from its id.
 * Nothing is stored: the same id always yields the same URL, so every
 * read path recomputes the channel instead of trusting a stored copy.
 *
 * URL shape: <baseUrl>/v1/webhooks/<id>/trigger?V=1
 */

import type { ChannelInfo, ReceiverType } from "@clusterhook/types";

/** Webhook trigger protocol version carried in the `V` query parameter */
export const WEBHOOK_PROTOCOL_VERSION = "1";

export type ChannelAllocator = (
  receiverId: string,
  type: ReceiverType,
) => ChannelInfo | null;

/**
 * Build the trigger path for a receiver, relative to the service root.
 */
export function webhookTriggerPath(receiverId: string): string {
  return `/v1/webhooks/${encodeURIComponent(receiverId)}/trigger?V=${WEBHOOK_PROTOCOL_VERSION}`;
}

/**
 * Create a channel allocator bound to the service's public base URL.
 */
export function createChannelAllocator(baseUrl: string): ChannelAllocator {
  const base = baseUrl.replace(/\/+$/, "");

  return (receiverId, type) => {
    if (type !== "webhook") {
      return null;
    }
    return { alarm_url: `${base}${webhookTriggerPath(receiverId)}` };
  };
}
