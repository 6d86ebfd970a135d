/**
 * Health check routes.
 *
 * GET /health — Liveness probe (always 200 if server is running)
 * GET /ready  — Readiness probe (receiver store reachable)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { ReceiverService } from "../services/receiver-service.js";

interface SubsystemStatus {
  readonly status: "ok" | "down";
  readonly detail?: string | undefined;
}

export function createHealthRoutes(service: ReceiverService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", async (c) => {
    let store: SubsystemStatus;
    try {
      await service.ping();
      store = { status: "ok" };
    } catch (err: unknown) {
      store = {
        status: "down",
        detail: err instanceof Error ? err.message : String(err),
      };
    }

    const ready = store.status === "ok";
    return c.json(
      {
        status: ready ? "ready" : "not_ready",
        subsystems: { store },
        timestamp: new Date().toISOString(),
      },
      ready ? 200 : 503,
    );
  });

  return routes;
}
