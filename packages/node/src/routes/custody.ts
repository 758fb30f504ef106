/**
 * GET /api/v1/custody — Custody balance of the token ledger.
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export function createCustodyRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => c.json({ data: c.get("service").getCustody() }));

  return routes;
}
