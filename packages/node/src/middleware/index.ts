/**
 * Middleware barrel — re-exports all middleware.
 */

export { handleError, mapError } from "./error-handler.js";
export { requestIdMiddleware, REQUEST_ID_HEADER } from "./request-id.js";
export { loggerMiddleware } from "./logger.js";
export type { RequestLogEntry } from "./logger.js";
export { validateBody, formatZodErrors } from "./validate.js";
export type { ValidatedEnv } from "./validate.js";
export {
  idempotencyMiddleware,
  InMemoryIdempotencyStore,
  IDEMPOTENCY_HEADER,
} from "./idempotency.js";
export { REPLAY_HEADER } from "./idempotency.js";
export type { IdempotencyStore, CachedResponse } from "./idempotency.js";
export {
  authMiddleware,
  callerHeaderMiddleware,
  verifyJwt,
  signJwt,
  CALLER_HEADER,
  ANONYMOUS_CALLER,
} from "./auth.js";
export type { AuthConfig } from "./auth.js";
