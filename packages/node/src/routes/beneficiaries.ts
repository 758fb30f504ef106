/**
 * Beneficiary registry routes.
 *
 * GET /api/v1/beneficiaries — Registry in creation order (cursor pagination)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { ListBeneficiariesQuerySchema } from "../types/dto.js";
import { createErrorEnvelope } from "../types/error.js";
import { paginate, positionKey } from "../types/pagination.js";

export interface RegistryItem {
  /** 1-based position in the registry */
  readonly position: number;
  readonly beneficiary: string;
}

export function createBeneficiaryRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    const queryResult = ListBeneficiariesQuerySchema.safeParse(c.req.query());
    if (!queryResult.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Invalid query parameters"),
        400,
      );
    }

    // The registry may list a beneficiary more than once
    const items: RegistryItem[] = c
      .get("service")
      .listBeneficiaries()
      .map((beneficiary, i) => ({ position: i + 1, beneficiary }));

    const result = paginate(
      items,
      { cursor: queryResult.data.cursor, limit: queryResult.data.limit },
      (item) => positionKey(item.position),
      "position",
    );

    return c.json(result);
  });

  return routes;
}
