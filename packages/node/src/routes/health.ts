/**
 * Health check routes.
 *
 * GET /health — Liveness probe (always 200 if server is running)
 * GET /ready  — Readiness probe (event hash chain + custody books)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { VestingService } from "../services/vesting-service.js";

interface SubsystemStatus {
  readonly status: "ok" | "down";
  readonly detail?: string | undefined;
}

export function createHealthRoutes(service: VestingService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", (c) => {
    const { ready, integrity, custodyBalanced } = service.checkReadiness();

    const eventStore: SubsystemStatus = integrity.valid
      ? { status: "ok" }
      : {
          status: "down",
          detail: `chainValid=false, errors=${integrity.errors.length}`,
        };
    const custody: SubsystemStatus = custodyBalanced
      ? { status: "ok" }
      : { status: "down", detail: "trial balance does not balance" };

    return c.json(
      {
        status: ready ? "ready" : "not_ready",
        subsystems: { eventStore, custody },
        events: integrity.lastVerifiedPosition,
        timestamp: new Date().toISOString(),
      },
      ready ? 200 : 503,
    );
  });

  return routes;
}
