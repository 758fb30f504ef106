/**
 * Audit trail routes over the hash-chained event store.
 *
 * GET /api/v1/events                        — Every event, in global order
 * GET /api/v1/events/schedules/:beneficiary — One beneficiary's schedule history
 * GET /api/v1/events/:streamId              — Any stream by id, e.g. `authority`
 *
 * A beneficiary's creations, releases and revocations all land in
 * `schedule:<beneficiary>`, including those of earlier schedules it
 * outlived. Ownership, token-address and role changes land in `authority`.
 * Every listing takes `?type=` to keep one event type.
 */

import { Hono } from "hono";
import type { Context } from "hono";
import { scheduleStreamId } from "@tranche/event-store";
import type { StoredEvent } from "@tranche/event-store";
import type { AppEnv } from "../types/api-contract.js";
import { paginate, positionKey } from "../types/pagination.js";
import type { PaginatedResponse } from "../types/pagination.js";
import { ListEventsQuerySchema, ListStreamEventsQuerySchema } from "../types/dto.js";
import type { ListStreamEventsQuery } from "../types/dto.js";
import { createErrorEnvelope } from "../types/error.js";

function ofType(events: readonly StoredEvent[], type: string | undefined): readonly StoredEvent[] {
  return type === undefined ? events : events.filter((e) => e.event.type === type);
}

function streamPage(
  c: Context<AppEnv>,
  streamId: string,
  query: ListStreamEventsQuery,
): PaginatedResponse<StoredEvent> {
  const events = c.get("service").readStreamEvents(
    streamId,
    query.afterVersion !== undefined ? { fromVersion: query.afterVersion + 1 } : undefined,
  );

  return paginate(
    ofType(events, query.type),
    { cursor: query.cursor, limit: query.limit },
    (e) => positionKey(e.version),
    "version",
  );
}

export function createEventRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    const queryResult = ListEventsQuerySchema.safeParse(c.req.query());
    if (!queryResult.success) {
      return c.json(createErrorEnvelope("VALIDATION_ERROR", "Invalid query parameters"), 400);
    }

    const query = queryResult.data;
    const events = c.get("service").readAllEvents(
      query.afterPosition !== undefined ? { fromPosition: query.afterPosition + 1 } : undefined,
    );

    return c.json(
      paginate(
        ofType(events, query.type),
        { cursor: query.cursor, limit: query.limit },
        (e) => positionKey(e.globalPosition),
        "globalPosition",
      ),
    );
  });

  // Unlike a raw stream read, an identity never given a schedule is a 404
  routes.get("/schedules/:beneficiary", (c) => {
    const beneficiary = c.req.param("beneficiary");
    if (!c.get("service").listBeneficiaries().includes(beneficiary)) {
      return c.json(createErrorEnvelope("NOT_FOUND", `No schedule history for '${beneficiary}'`), 404);
    }

    const queryResult = ListStreamEventsQuerySchema.safeParse(c.req.query());
    if (!queryResult.success) {
      return c.json(createErrorEnvelope("VALIDATION_ERROR", "Invalid query parameters"), 400);
    }

    return c.json(streamPage(c, scheduleStreamId(beneficiary), queryResult.data));
  });

  routes.get("/:streamId", (c) => {
    const queryResult = ListStreamEventsQuerySchema.safeParse(c.req.query());
    if (!queryResult.success) {
      return c.json(createErrorEnvelope("VALIDATION_ERROR", "Invalid query parameters"), 400);
    }

    return c.json(streamPage(c, c.req.param("streamId"), queryResult.data));
  });

  return routes;
}
