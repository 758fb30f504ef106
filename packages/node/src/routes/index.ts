/**
 * Route barrel — re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createScheduleRoutes } from "./schedules.js";
export type { ScheduleRouteDeps } from "./schedules.js";
export { createBeneficiaryRoutes } from "./beneficiaries.js";
export type { RegistryItem } from "./beneficiaries.js";
export { createStatsRoutes } from "./stats.js";
export { createAuthorityRoutes } from "./authority.js";
export type { AuthorityRouteDeps } from "./authority.js";
export { createEventRoutes } from "./events.js";
export { createCustodyRoutes } from "./custody.js";
