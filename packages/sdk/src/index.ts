/**
 * @tranche/sdk — Typed HTTP client for the Tranche vesting API.
 *
 * Uses native fetch; no runtime dependencies.
 *
 * @packageDocumentation
 */

// Types
export type {
  TrancheClientConfig,
  TrancheResponse,
  MutationOptions,
  PaginatedList,
  PageParams,
  Schedule,
  CreateScheduleParams,
  Releasable,
  ReleaseResult,
  Revocation,
  RegistryEntry,
  Stats,
  Authority,
  CreatorGrant,
  CreatorRevocation,
  Custody,
  StoredEvent,
  ListEventsParams,
  ListStreamEventsParams,
} from "./types.js";

export { TrancheError } from "./types.js";

// HTTP Client
export { HttpClient } from "./http-client.js";
export type { HttpResult, RequestOptions } from "./http-client.js";

// Client
export {
  TrancheClient,
  SchedulesNamespace,
  BeneficiariesNamespace,
  AuthorityNamespace,
  EventsNamespace,
} from "./client.js";
