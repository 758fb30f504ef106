/**
 * Type barrel — re-exports all public types from @tranche/node.
 */

// DTOs
export {
  AmountSchema,
  PaginationQuerySchema,
  CreateScheduleSchema,
  ReleasableQuerySchema,
  ListBeneficiariesQuerySchema,
  TransferOwnershipSchema,
  UpdateTokenAddressSchema,
  GrantCreatorSchema,
  ListEventsQuerySchema,
  ListStreamEventsQuerySchema,
  toScheduleView,
  toStatsView,
  toRevocationView,
} from "./dto.js";
export type {
  CreateScheduleDto,
  ReleasableQuery,
  ListBeneficiariesQuery,
  TransferOwnershipDto,
  UpdateTokenAddressDto,
  GrantCreatorDto,
  ListEventsQuery,
  ListStreamEventsQuery,
  ScheduleView,
  StatsView,
  RevocationView,
} from "./dto.js";

// Error
export { createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, ErrorStatus, ErrorDetail, ErrorEnvelope } from "./error.js";

// Pagination
export { encodeCursor, decodeCursor, paginate, positionKey } from "./pagination.js";
export type {
  PaginationQuery,
  PaginationMeta,
  PaginatedResponse,
} from "./pagination.js";

// Auth
export type { AuthContext, ApiKeyRecord, JwtClaims } from "./auth.js";

// App env
export type { AppEnv } from "./api-contract.js";
