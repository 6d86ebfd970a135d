/**
 * Webhook trigger route. Anonymous: the receiver's delegated credential
 * authorizes the action.
 *
 * POST /v1/webhooks/:id/trigger?V=1
 *
 * Query parameters other than V become action params; a JSON body
 * `{ "params": {...} }` overrides them per key.
 */

import { Hono } from "hono";
import { WEBHOOK_PROTOCOL_VERSION } from "@clusterhook/receivers";
import type { AppEnv } from "../types/api-contract.js";
import { TriggerReceiverSchema } from "../types/dto.js";
import type { TriggerReceiverDto } from "../types/dto.js";
import { createErrorEnvelope } from "../types/error.js";
import { validateBody } from "../middleware/validate.js";
import { actionLocation, presentAction } from "../presenter.js";
import type { ReceiverService } from "../services/receiver-service.js";

export function createWebhookRoutes(service: ReceiverService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post(
    "/:id/trigger",
    async (c, next) => {
      const version = c.req.query("V");
      if (version === undefined) {
        return c.json(
          createErrorEnvelope("VALIDATION_ERROR", "Missing required query parameter 'V'"),
          400,
        );
      }
      if (version !== WEBHOOK_PROTOCOL_VERSION) {
        return c.json(
          createErrorEnvelope(
            "VALIDATION_ERROR",
            `Webhook version '${version}' is not supported; expected '${WEBHOOK_PROTOCOL_VERSION}'`,
          ),
          400,
        );
      }
      return next();
    },
    validateBody(TriggerReceiverSchema, { allowEmpty: true }),
    async (c) => {
      const body = c.get("validatedBody") as TriggerReceiverDto;
      const queryParams = Object.fromEntries(
        Object.entries(c.req.query()).filter(([key]) => key !== "V"),
      );

      const result = await service.triggerWebhook(c.req.param("id"), {
        ...queryParams,
        ...body.params,
      });

      c.header("Location", actionLocation(result.action));
      return c.json({ action: presentAction(result.action) }, 202);
    },
  );

  return routes;
}
