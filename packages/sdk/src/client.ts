/**
 * @clusterhook/sdk — Receivers API client.
 *
 * Usage:
 * ```typescript
 * const client = new ClusterhookClient({
 *   baseUrl: "https://hooks.example.com",
 *   apiKey: "your-api-key",
 * });
 *
 * const { data: receiver } = await client.receivers.create({
 *   name: "scale-on-cpu",
 *   type: "webhook",
 *   clusterId: "c-1",
 *   action: "CLUSTER_SCALE_UP",
 *   params: { count: 1 },
 * });
 *
 * // Anyone holding the alarm URL can now fire it:
 * await client.receivers.trigger(receiver.id, { count: 2 });
 * ```
 */

import type { ActionName, ReceiverType } from "@clusterhook/types";
import { HttpClient } from "./http-client.js";
import type {
  Action,
  ClusterhookClientConfig,
  ClusterhookResponse,
  Receiver,
  ReceiverPage,
} from "./types.js";

// =============================================================================
// Parameters
// =============================================================================

export interface CreateReceiverParams {
  readonly name: string;
  readonly type: ReceiverType;
  readonly clusterId: string;
  readonly action: ActionName;
  readonly params?: Readonly<Record<string, unknown>> | undefined;
}

export type SortDirection = "asc" | "desc";

export type ReceiverSortKey = "name" | "type" | "cluster_id" | "action" | "created_at";

export interface ListReceiversParams {
  readonly limit?: number | undefined;
  readonly marker?: string | undefined;
  readonly sort?: readonly (ReceiverSortKey | `${ReceiverSortKey}:${SortDirection}`)[] | undefined;
  /** Every project's receivers (operators only) */
  readonly globalProject?: boolean | undefined;
  readonly names?: readonly string[] | undefined;
  readonly type?: ReceiverType | undefined;
  readonly clusterId?: string | undefined;
  readonly action?: ActionName | undefined;
}

function receiverPath(id: string): string {
  return `/v1/receivers/${encodeURIComponent(id)}`;
}

// =============================================================================
// Receivers Namespace
// =============================================================================

export class ReceiversNamespace {
  constructor(private readonly http: HttpClient) {}

  async list(params: ListReceiversParams = {}): Promise<ClusterhookResponse<ReceiverPage>> {
    const query = new URLSearchParams();
    if (params.limit !== undefined) query.set("limit", String(params.limit));
    if (params.marker !== undefined) query.set("marker", params.marker);
    if (params.sort !== undefined && params.sort.length > 0) query.set("sort", params.sort.join(","));
    if (params.globalProject !== undefined) query.set("global_project", String(params.globalProject));
    for (const name of params.names ?? []) query.append("name", name);
    if (params.type !== undefined) query.set("type", params.type);
    if (params.clusterId !== undefined) query.set("cluster_id", params.clusterId);
    if (params.action !== undefined) query.set("action", params.action);

    const qs = query.toString();
    return this.http.get<ReceiverPage>(qs.length > 0 ? `/v1/receivers?${qs}` : "/v1/receivers");
  }

  /**
   * Iterate every receiver across pages.
   */
  async *listAll(
    params: Omit<ListReceiversParams, "marker"> = {},
  ): AsyncGenerator<Receiver, void, undefined> {
    let marker: string | undefined;
    do {
      const { data } = await this.list({ ...params, marker });
      yield* data.receivers;
      marker = data.pagination.marker ?? undefined;
    } while (marker !== undefined);
  }

  async create(params: CreateReceiverParams): Promise<ClusterhookResponse<Receiver>> {
    const result = await this.http.post<{ receiver: Receiver }>("/v1/receivers", {
      receiver: {
        name: params.name,
        type: params.type,
        cluster_id: params.clusterId,
        action: params.action,
        params: params.params,
      },
    });
    return { data: result.data.receiver, status: result.status, headers: result.headers };
  }

  async get(id: string): Promise<ClusterhookResponse<Receiver>> {
    const result = await this.http.get<{ receiver: Receiver }>(receiverPath(id));
    return { data: result.data.receiver, status: result.status, headers: result.headers };
  }

  async delete(id: string): Promise<ClusterhookResponse<undefined>> {
    return this.http.delete(receiverPath(id));
  }

  /**
   * Signal a receiver as the authenticated caller.
   */
  async notify(
    id: string,
    params?: Readonly<Record<string, unknown>>,
  ): Promise<ClusterhookResponse<Action>> {
    const result = await this.http.post<{ action: Action }>(
      `${receiverPath(id)}/notify`,
      params === undefined ? {} : { params },
    );
    return { data: result.data.action, status: result.status, headers: result.headers };
  }

  /**
   * Fire a webhook receiver. The server authorizes the action with the
   * receiver's own delegated credential; no caller credential is needed.
   */
  async trigger(
    id: string,
    params?: Readonly<Record<string, unknown>>,
  ): Promise<ClusterhookResponse<Action>> {
    const result = await this.http.post<{ action: Action }>(
      `/v1/webhooks/${encodeURIComponent(id)}/trigger?V=1`,
      params === undefined ? {} : { params },
    );
    return { data: result.data.action, status: result.status, headers: result.headers };
  }
}

// =============================================================================
// Main Client
// =============================================================================

export class ClusterhookClient {
  readonly receivers: ReceiversNamespace;

  private readonly http: HttpClient;

  constructor(config: ClusterhookClientConfig) {
    this.http = new HttpClient(config);
    this.receivers = new ReceiversNamespace(this.http);
  }
}
