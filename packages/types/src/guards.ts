/**
 * Runtime Type Guards
 *
 * Narrowing functions for receiver domain types.
 * Used at system boundaries (API inputs, records read back from disk).
 */

import type { ActionName } from "./action.js";
import { ACTION_NAMES } from "./action.js";
import type { ChannelInfo, ReceiverParams, ReceiverRecord, ReceiverType } from "./receiver.js";
import type { Permission } from "./identity.js";

const RECEIVER_TYPE_SET = new Set<string>(["webhook", "signal"]);
const ACTION_NAME_SET = new Set<string>(ACTION_NAMES);
const PERMISSION_SET = new Set<string>(["read", "write", "admin"]);

// =============================================================================
// Receiver guards
// =============================================================================

export function isReceiverType(value: unknown): value is ReceiverType {
  return typeof value === "string" && RECEIVER_TYPE_SET.has(value);
}

export function isActionName(value: unknown): value is ActionName {
  return typeof value === "string" && ACTION_NAME_SET.has(value);
}

export function isPermission(value: unknown): value is Permission {
  return typeof value === "string" && PERMISSION_SET.has(value);
}

export function isReceiverParams(value: unknown): value is ReceiverParams {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

export function isChannelInfo(value: unknown): value is ChannelInfo {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return typeof v.alarm_url === "string" && v.alarm_url.length > 0;
}

export function isReceiverRecord(value: unknown): value is ReceiverRecord {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.id === "string" &&
    v.id.length > 0 &&
    typeof v.name === "string" &&
    isReceiverType(v.type) &&
    typeof v.clusterId === "string" &&
    isActionName(v.action) &&
    typeof v.actor === "string" &&
    isReceiverParams(v.params) &&
    typeof v.project === "string" &&
    typeof v.domain === "string" &&
    typeof v.user === "string" &&
    typeof v.createdAt === "string" &&
    (v.updatedAt === null || typeof v.updatedAt === "string")
  );
}
