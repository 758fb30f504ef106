/**
 * GET /api/v1/stats — Aggregate counters.
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { toStatsView } from "../types/dto.js";

export function createStatsRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => c.json({ data: toStatsView(c.get("service").getStats()) }));

  return routes;
}
