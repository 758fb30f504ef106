/**
 * Vesting schedule routes.
 *
 * POST /api/v1/schedules                          — Create a schedule
 * GET  /api/v1/schedules/:beneficiary             — Get a schedule
 * GET  /api/v1/schedules/:beneficiary/releasable  — Vested and releasable amounts
 * POST /api/v1/schedules/:beneficiary/release     — Release vested tokens
 * POST /api/v1/schedules/:beneficiary/revoke      — Revoke a schedule
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  CreateScheduleSchema,
  ReleasableQuerySchema,
  toRevocationView,
  toScheduleView,
} from "../types/dto.js";
import { validateBody, formatZodErrors } from "../middleware/validate.js";
import { createErrorEnvelope } from "../types/error.js";
import type { AuditLog } from "../services/audit-log.js";

export interface ScheduleRouteDeps {
  readonly auditLog?: AuditLog | undefined;
}

export function createScheduleRoutes(deps?: ScheduleRouteDeps): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();
  const auditLog = deps?.auditLog;

  // POST /api/v1/schedules — Create
  routes.post("/", validateBody(CreateScheduleSchema), async (c) => {
    const service = c.get("service");
    const caller = c.get("auth").identity;
    const body = c.get("validatedBody");

    const schedule = await service.createSchedule(caller, body);

    auditLog?.append({
      action: "create",
      resourceType: "schedule",
      resourceId: schedule.beneficiary,
      actor: caller,
      requestId: c.get("requestId"),
      detail: `total=${schedule.totalAmount.toString()}`,
    });

    return c.json({ data: toScheduleView(schedule) }, 201);
  });

  // GET /api/v1/schedules/:beneficiary
  routes.get("/:beneficiary", (c) => {
    const beneficiary = c.req.param("beneficiary");
    const schedule = c.get("service").getSchedule(beneficiary);

    if (schedule === undefined) {
      return c.json(
        createErrorEnvelope("NOT_FOUND", `No schedule for '${beneficiary}'`),
        404,
      );
    }

    return c.json({ data: toScheduleView(schedule) });
  });

  // GET /api/v1/schedules/:beneficiary/releasable
  routes.get("/:beneficiary/releasable", (c) => {
    const beneficiary = c.req.param("beneficiary");

    const queryResult = ReleasableQuerySchema.safeParse(c.req.query());
    if (!queryResult.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Invalid query parameters", {
          issues: formatZodErrors(queryResult.error),
        }),
        400,
      );
    }

    const { vested, releasable, at } = c
      .get("service")
      .getReleasable(beneficiary, queryResult.data.at);

    return c.json({
      data: {
        beneficiary,
        vested: vested.toString(),
        releasable: releasable.toString(),
        at,
      },
    });
  });

  // POST /api/v1/schedules/:beneficiary/release
  routes.post("/:beneficiary/release", async (c) => {
    const beneficiary = c.req.param("beneficiary");
    const caller = c.get("auth").identity;

    const amount = await c.get("service").release(caller, beneficiary);

    auditLog?.append({
      action: "release",
      resourceType: "schedule",
      resourceId: beneficiary,
      actor: caller,
      requestId: c.get("requestId"),
      detail: `amount=${amount.toString()}`,
    });

    return c.json({ data: { beneficiary, amount: amount.toString() } });
  });

  // POST /api/v1/schedules/:beneficiary/revoke
  routes.post("/:beneficiary/revoke", async (c) => {
    const beneficiary = c.req.param("beneficiary");
    const caller = c.get("auth").identity;

    const result = await c.get("service").revoke(caller, beneficiary);

    auditLog?.append({
      action: "revoke",
      resourceType: "schedule",
      resourceId: beneficiary,
      actor: caller,
      requestId: c.get("requestId"),
      detail: `settled=${result.settledAmount.toString()} forfeited=${result.forfeitedAmount.toString()}`,
    });

    return c.json({ data: toRevocationView(result) });
  });

  return routes;
}
