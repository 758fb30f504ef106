/**
 * @tranche/node — HTTP service for the vesting ledger.
 *
 * Public API for embedding the app; `main.ts` is the executable.
 */

export { VestingService } from "./services/vesting-service.js";
export type {
  VestingServiceConfig,
  CreateScheduleInput,
  AuthorityView,
  CustodyView,
  Readiness,
} from "./services/vesting-service.js";
export { AuditLog } from "./services/audit-log.js";
export type { AuditLogEntry, AuditLogQuery, AuditAction } from "./services/audit-log.js";
export { loadConfig, parseApiKeys, parseIdentityList, ConfigSchema } from "./config.js";
export type { AppConfig, ParsedApiKey } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./middleware/index.js";
export * from "./types/index.js";
