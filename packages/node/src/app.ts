/**
 * Hono application factory.
 *
 * Wires middleware and routes around one VestingService. Returns the
 * app without starting a server, so tests drive it through
 * `app.request()`.
 */

import { Hono } from "hono";
import type { AppEnv } from "./types/api-contract.js";
import { VestingService } from "./services/vesting-service.js";
import type { VestingServiceConfig } from "./services/vesting-service.js";
import { AuditLog } from "./services/audit-log.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import { handleError } from "./middleware/error-handler.js";
import { idempotencyMiddleware, InMemoryIdempotencyStore } from "./middleware/idempotency.js";
import { authMiddleware, callerHeaderMiddleware } from "./middleware/auth.js";
import type { AuthConfig } from "./middleware/auth.js";
import { createHealthRoutes } from "./routes/health.js";
import { createScheduleRoutes } from "./routes/schedules.js";
import { createBeneficiaryRoutes } from "./routes/beneficiaries.js";
import { createStatsRoutes } from "./routes/stats.js";
import { createAuthorityRoutes } from "./routes/authority.js";
import { createEventRoutes } from "./routes/events.js";
import { createCustodyRoutes } from "./routes/custody.js";
import { createErrorEnvelope } from "./types/error.js";

// =============================================================================
// Options
// =============================================================================

export interface CreateAppOptions {
  readonly serviceConfig: VestingServiceConfig;
  /** Called once per request after the response is produced */
  readonly logFn?: ((entry: RequestLogEntry) => void) | undefined;
  readonly idempotencyTtlMs?: number | undefined;
  /**
   * Credentials for mutating requests. Without it the caller is taken
   * from X-Caller-Id (development and tests only).
   */
  readonly auth?: AuthConfig | undefined;
}

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: VestingService;
  readonly auditLog: AuditLog;
  readonly idempotencyStore: InMemoryIdempotencyStore;
}

// =============================================================================
// Factory
// =============================================================================

export function createApp(options: CreateAppOptions): AppInstance {
  const service = new VestingService(options.serviceConfig);
  const auditLog = new AuditLog();
  const idempotencyStore = new InMemoryIdempotencyStore(options.idempotencyTtlMs);

  const app = new Hono<AppEnv>();

  // ─── Global middleware ──────────────────────────────────────────────

  app.use("*", requestIdMiddleware());
  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }
  app.onError(handleError);
  app.notFound((c) =>
    c.json(createErrorEnvelope("NOT_FOUND", `No route for ${c.req.method} ${c.req.path}`), 404),
  );

  // ─── Health (no auth) ───────────────────────────────────────────────

  app.route("/", createHealthRoutes(service));

  // ─── API ────────────────────────────────────────────────────────────

  app.use("/api/*", async (c, next) => {
    c.set("service", service);
    return next();
  });

  // Reads are public; only mutations need a caller
  const identify =
    options.auth !== undefined
      ? authMiddleware(options.auth)
      : callerHeaderMiddleware();
  app.use("/api/*", (c, next) => (c.req.method === "GET" ? next() : identify(c, next)));

  app.use("/api/*", idempotencyMiddleware(idempotencyStore));

  app.route("/api/v1/schedules", createScheduleRoutes({ auditLog }));
  app.route("/api/v1/beneficiaries", createBeneficiaryRoutes());
  app.route("/api/v1/stats", createStatsRoutes());
  app.route("/api/v1/authority", createAuthorityRoutes({ auditLog }));
  app.route("/api/v1/events", createEventRoutes());
  app.route("/api/v1/custody", createCustodyRoutes());

  return { app, service, auditLog, idempotencyStore };
}
