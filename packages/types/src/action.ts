/**
 * Action Types
 *
 * The action engine is an external system. Receivers only name the action
 * to run and the cluster to run it against; the engine accepts the
 * submission and reports progress on its own.
 */

import type { ActingIdentity } from "./identity.js";

/**
 * Cluster actions the action engine accepts from receivers.
 */
export const ACTION_NAMES = [
  "CLUSTER_CREATE",
  "CLUSTER_DELETE",
  "CLUSTER_UPDATE",
  "CLUSTER_ADD_NODES",
  "CLUSTER_DEL_NODES",
  "CLUSTER_SCALE_UP",
  "CLUSTER_SCALE_DOWN",
  "CLUSTER_ATTACH_POLICY",
  "CLUSTER_DETACH_POLICY",
] as const;

export type ActionName = (typeof ACTION_NAMES)[number];

/**
 * Engine-side action status. Only READY is produced by a submission;
 * the remaining states belong to the engine.
 */
export type ActionStatus =
  | "INIT"
  | "WAITING"
  | "READY"
  | "RUNNING"
  | "SUCCEEDED"
  | "FAILED"
  | "CANCELLED";

/**
 * A request to run one action against one cluster.
 */
export interface ActionRequest {
  readonly action: ActionName;
  readonly clusterId: string;
  readonly params: Readonly<Record<string, unknown>>;
  readonly actor: ActingIdentity;

  /** Why the action was submitted, e.g. "receiver:<id>" */
  readonly cause: string;
}

/**
 * Asynchronous handle returned by the engine on accepted submission.
 */
export interface ActionHandle {
  readonly id: string;
  readonly action: ActionName;
  readonly target: string;
  readonly status: ActionStatus;
  readonly createdAt: string;
}
