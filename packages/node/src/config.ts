/**
 * @clusterhook/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";
import type { ClusterRef } from "@clusterhook/types";
import { isRole } from "./types/auth.js";
import type { Role } from "./types/auth.js";

// =============================================================================
// Schema
// =============================================================================

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(8778),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Auth
  API_KEYS: z.string().default(""),
  JWT_SECRET: z.string().min(1).optional(),
  JWT_ISSUER: z.string().default("clusterhook"),
  DEFAULT_DOMAIN: z.string().min(1).default("default"),

  // Channel
  PUBLIC_BASE_URL: z.string().url().default("http://localhost:8778"),

  // Store: JSONL file, in-memory when unset
  STORE_PATH: z.string().min(1).optional(),

  // Development cluster registry
  CLUSTERS: z.string().default(""),

  // Identity service
  DELEGATION_TIMEOUT_MS: z.coerce.number().int().min(100).default(10000),
  REVOCATION_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// API Key Parsing
// =============================================================================

export interface ParsedApiKey {
  readonly key: string;
  readonly role: Role;
  readonly user: string;
  readonly project: string;
}

/**
 * Parse the API_KEYS env var into structured records.
 *
 * Format: "key1:role1:user1:project1,key2:role2:user2:project2"
 */
export function parseApiKeys(raw: string): readonly ParsedApiKey[] {
  if (raw.trim() === "") {
    return [];
  }

  const keys: ParsedApiKey[] = [];

  for (const entry of raw.split(",")) {
    const parts = entry.trim().split(":");
    const [key, role, user, project] = parts;
    if (
      parts.length !== 4 ||
      key === undefined ||
      role === undefined ||
      user === undefined ||
      project === undefined
    ) {
      throw new Error(
        `Invalid API_KEYS entry: "${entry.trim()}". Expected format: key:role:user:project`,
      );
    }

    if (key === "") {
      throw new Error("API key cannot be empty");
    }
    if (!isRole(role)) {
      throw new Error(
        `Invalid role "${role}" in API_KEYS. Must be: admin, member, or reader`,
      );
    }
    if (user === "") {
      throw new Error("User cannot be empty in API_KEYS");
    }
    if (project === "") {
      throw new Error("Project cannot be empty in API_KEYS");
    }

    keys.push({ key, role, user, project });
  }

  return keys;
}

// =============================================================================
// Cluster Parsing
// =============================================================================

/**
 * Parse the CLUSTERS env var.
 *
 * Format: "id:project[:name],..." — name defaults to the id.
 */
export function parseClusters(raw: string): readonly ClusterRef[] {
  if (raw.trim() === "") {
    return [];
  }

  return raw.split(",").map((entry) => {
    const parts = entry.trim().split(":");
    const [id, project, name] = parts;
    if (
      parts.length < 2 ||
      parts.length > 3 ||
      id === undefined ||
      id === "" ||
      project === undefined ||
      project === ""
    ) {
      throw new Error(
        `Invalid CLUSTERS entry: "${entry.trim()}". Expected format: id:project[:name]`,
      );
    }
    return {
      id,
      name: name !== undefined && name !== "" ? name : id,
      project,
      status: "ACTIVE",
    };
  });
}

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if required env vars are missing or invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}
