/**
 * Receiver routes.
 *
 * GET    /v1/receivers             — List receivers (marker pagination)
 * POST   /v1/receivers             — Create a receiver
 * GET    /v1/receivers/:id         — Show a receiver
 * DELETE /v1/receivers/:id         — Delete a receiver
 * POST   /v1/receivers/:id/notify  — Signal a receiver as the caller
 */

import { Hono } from "hono";
import { comparePositions, DEFAULT_SORT, sortPosition } from "@clusterhook/receivers";
import type { AppEnv } from "../types/api-contract.js";
import { toRequester } from "../types/auth.js";
import {
  CreateReceiverSchema,
  ListReceiversQuerySchema,
  TriggerReceiverSchema,
  parseSort,
  sortSignature,
} from "../types/dto.js";
import type {
  CreateReceiverDto,
  ListReceiversQuery,
  TriggerReceiverDto,
} from "../types/dto.js";
import { createErrorEnvelope } from "../types/error.js";
import { decodeMarker, paginate } from "../types/pagination.js";
import { validateBody, formatZodErrors } from "../middleware/validate.js";
import { requirePermission } from "../middleware/auth.js";
import { isNotModified, setETag } from "../middleware/etag.js";
import {
  actionLocation,
  presentAction,
  presentReceiver,
  receiverLocation,
} from "../presenter.js";
import type { ReceiverService } from "../services/receiver-service.js";

export function createReceiverRoutes(service: ReceiverService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // GET /v1/receivers — List
  routes.get("/", async (c) => {
    const queryResult = ListReceiversQuerySchema.safeParse(c.req.query());
    if (!queryResult.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Invalid query parameters", {
          issues: formatZodErrors(queryResult.error),
        }),
        400,
      );
    }
    const query: ListReceiversQuery = queryResult.data;

    let sort = DEFAULT_SORT;
    if (query.sort !== undefined) {
      const parsed = parseSort(query.sort);
      if (!parsed.ok) {
        return c.json(createErrorEnvelope("VALIDATION_ERROR", parsed.message), 400);
      }
      sort = parsed.sort;
    }
    const signature = sortSignature(sort);

    let after: readonly string[] | undefined;
    if (query.marker !== undefined) {
      const decoded = decodeMarker(query.marker);
      if (decoded === undefined || decoded.sort !== signature) {
        return c.json(
          createErrorEnvelope("VALIDATION_ERROR", `Invalid marker '${query.marker}'`),
          400,
        );
      }
      after = decoded.position;
    }

    const receivers = await service.listReceivers(toRequester(c.get("auth")), {
      globalProject: query.global_project,
      names: c.req.queries("name"),
      type: query.type,
      clusterId: query.cluster_id,
      action: query.action,
      sort,
    });

    const page = paginate(
      receivers,
      { after, limit: query.limit },
      (receiver) => sortPosition(receiver, sort),
      (a, b) => comparePositions(a, b, sort),
      signature,
    );

    return c.json({
      receivers: page.items.map(presentReceiver),
      pagination: page.pagination,
    });
  });

  // POST /v1/receivers — Create
  routes.post(
    "/",
    requirePermission("write"),
    validateBody(CreateReceiverSchema),
    async (c) => {
      const { receiver: body } = c.get("validatedBody") as CreateReceiverDto;

      const receiver = await service.createReceiver(
        {
          name: body.name,
          type: body.type,
          clusterId: body.cluster_id,
          action: body.action,
          actor: body.actor,
          params: body.params,
        },
        toRequester(c.get("auth")),
      );

      c.header("Location", receiverLocation(receiver));
      setETag(c, presentReceiver(receiver));
      return c.json({ receiver: presentReceiver(receiver) }, 201);
    },
  );

  // GET /v1/receivers/:id — Show
  routes.get("/:id", async (c) => {
    const receiver = await service.getReceiver(
      c.req.param("id"),
      toRequester(c.get("auth")),
    );
    const view = presentReceiver(receiver);

    setETag(c, view);
    if (isNotModified(c, view)) {
      return c.body(null, 304);
    }
    return c.json({ receiver: view });
  });

  // DELETE /v1/receivers/:id
  routes.delete("/:id", requirePermission("write"), async (c) => {
    await service.deleteReceiver(c.req.param("id"), toRequester(c.get("auth")));
    return c.body(null, 204);
  });

  // POST /v1/receivers/:id/notify — Signal
  routes.post(
    "/:id/notify",
    validateBody(TriggerReceiverSchema, { allowEmpty: true }),
    async (c) => {
      const body = c.get("validatedBody") as TriggerReceiverDto;

      const result = await service.notify(
        c.req.param("id"),
        body.params,
        toRequester(c.get("auth")),
      );

      c.header("Location", actionLocation(result.action));
      return c.json({ action: presentAction(result.action) }, 202);
    },
  );

  return routes;
}
