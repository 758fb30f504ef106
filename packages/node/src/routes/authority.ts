/**
 * Authority routes. Every mutation is owner-only; the vesting core
 * rejects other callers with UNAUTHORIZED.
 *
 * GET  /api/v1/authority                            — Owner, creators, token address
 * POST /api/v1/authority/ownership                  — Transfer ownership
 * POST /api/v1/authority/token                      — Update the token address
 * POST /api/v1/authority/creators                   — Grant the creator role
 * POST /api/v1/authority/creators/:identity/revoke  — Revoke the creator role
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  GrantCreatorSchema,
  TransferOwnershipSchema,
  UpdateTokenAddressSchema,
} from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";
import type { AuditLog } from "../services/audit-log.js";

export interface AuthorityRouteDeps {
  readonly auditLog?: AuditLog | undefined;
}

export function createAuthorityRoutes(deps?: AuthorityRouteDeps): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();
  const auditLog = deps?.auditLog;

  routes.get("/", (c) => c.json({ data: c.get("service").getAuthority() }));

  routes.post("/ownership", validateBody(TransferOwnershipSchema), async (c) => {
    const service = c.get("service");
    const caller = c.get("auth").identity;
    const { newOwner } = c.get("validatedBody");

    await service.transferOwnership(caller, newOwner);

    auditLog?.append({
      action: "transfer-ownership",
      resourceType: "authority",
      resourceId: "owner",
      actor: caller,
      requestId: c.get("requestId"),
      detail: `newOwner=${newOwner}`,
    });

    return c.json({ data: service.getAuthority() });
  });

  routes.post("/token", validateBody(UpdateTokenAddressSchema), async (c) => {
    const service = c.get("service");
    const caller = c.get("auth").identity;
    const { tokenAddress } = c.get("validatedBody");

    await service.updateTokenAddress(caller, tokenAddress);

    auditLog?.append({
      action: "update-token",
      resourceType: "authority",
      resourceId: "token",
      actor: caller,
      requestId: c.get("requestId"),
      detail: `tokenAddress=${tokenAddress}`,
    });

    return c.json({ data: service.getAuthority() });
  });

  routes.post("/creators", validateBody(GrantCreatorSchema), async (c) => {
    const caller = c.get("auth").identity;
    const { identity } = c.get("validatedBody");

    const granted = await c.get("service").grantCreator(caller, identity);

    auditLog?.append({
      action: "grant-creator",
      resourceType: "authority",
      resourceId: identity,
      actor: caller,
      requestId: c.get("requestId"),
      detail: granted ? undefined : "already a creator",
    });

    return c.json({ data: { identity, granted } }, granted ? 201 : 200);
  });

  routes.post("/creators/:identity/revoke", async (c) => {
    const caller = c.get("auth").identity;
    const identity = c.req.param("identity");

    const revoked = await c.get("service").revokeCreator(caller, identity);

    auditLog?.append({
      action: "revoke-creator",
      resourceType: "authority",
      resourceId: identity,
      actor: caller,
      requestId: c.get("requestId"),
      detail: revoked ? undefined : "not a creator",
    });

    return c.json({ data: { identity, revoked } });
  });

  return routes;
}
