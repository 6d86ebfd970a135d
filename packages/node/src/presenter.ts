/**
 * Wire representations.
 *
 * The domain speaks camelCase; the API speaks snake_case.
 */

import type { ActionHandle, ChannelInfo, Receiver, ReceiverParams } from "@clusterhook/types";

export interface ReceiverView {
  readonly id: string;
  readonly name: string;
  readonly type: string;
  readonly cluster_id: string;
  readonly action: string;
  readonly actor: { readonly trust_id: string } | Record<string, never>;
  readonly params: ReceiverParams;
  readonly channel: ChannelInfo | null;
  readonly project: string;
  readonly domain: string;
  readonly user: string;
  readonly created_at: string;
  readonly updated_at: string | null;
}

export interface ActionView {
  readonly id: string;
  readonly action: string;
  readonly target: string;
  readonly status: string;
  readonly created_at: string;
}

export function presentReceiver(receiver: Receiver): ReceiverView {
  return {
    id: receiver.id,
    name: receiver.name,
    type: receiver.type,
    cluster_id: receiver.clusterId,
    action: receiver.action,
    actor: receiver.actor === "" ? {} : { trust_id: receiver.actor },
    params: receiver.params,
    channel: receiver.channel,
    project: receiver.project,
    domain: receiver.domain,
    user: receiver.user,
    created_at: receiver.createdAt,
    updated_at: receiver.updatedAt,
  };
}

export function presentAction(handle: ActionHandle): ActionView {
  return {
    id: handle.id,
    action: handle.action,
    target: handle.target,
    status: handle.status,
    created_at: handle.createdAt,
  };
}

export function actionLocation(handle: ActionHandle): string {
  return `/v1/actions/${encodeURIComponent(handle.id)}`;
}

export function receiverLocation(receiver: Receiver): string {
  return `/v1/receivers/${encodeURIComponent(receiver.id)}`;
}
