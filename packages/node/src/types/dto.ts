/**
 * Request/Response DTOs with Zod validation schemas.
 *
 * Requests: each DTO has a Zod schema and a derived TypeScript type.
 * Responses: amounts leave the API as decimal strings of base units.
 */

import { z } from "zod";
import type { VestingSchedule, VestingStats } from "@tranche/types";
import type { RevocationResult } from "@tranche/vesting";
import { VESTING_EVENTS } from "@tranche/event-store";

// =============================================================================
// Shared Schemas
// =============================================================================

/** Base units as a decimal string, parsed to bigint */
export const AmountSchema = z
  .string()
  .regex(/^\d+$/, "Amount must be a decimal string of base units")
  .transform((v) => BigInt(v));

export const PaginationQuerySchema = z.object({
  cursor: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

// =============================================================================
// Schedule DTOs
// =============================================================================

/**
 * Identity and duration rules are left to the vesting core so that
 * callers see its error codes.
 */
export const CreateScheduleSchema = z.object({
  beneficiary: z.string(),
  totalAmount: AmountSchema,
  cliffDurationDays: z.number().int(),
  vestingDurationDays: z.number().int(),
});

export type CreateScheduleDto = z.infer<typeof CreateScheduleSchema>;

export const ReleasableQuerySchema = z.object({
  at: z.coerce.number().int().min(0).optional(),
});

export type ReleasableQuery = z.infer<typeof ReleasableQuerySchema>;

export const ListBeneficiariesQuerySchema = PaginationQuerySchema;

export type ListBeneficiariesQuery = z.infer<typeof ListBeneficiariesQuerySchema>;

// =============================================================================
// Authority DTOs
// =============================================================================

export const TransferOwnershipSchema = z.object({
  newOwner: z.string(),
});

export type TransferOwnershipDto = z.infer<typeof TransferOwnershipSchema>;

export const UpdateTokenAddressSchema = z.object({
  tokenAddress: z.string(),
});

export type UpdateTokenAddressDto = z.infer<typeof UpdateTokenAddressSchema>;

export const GrantCreatorSchema = z.object({
  identity: z.string(),
});

export type GrantCreatorDto = z.infer<typeof GrantCreatorSchema>;

// =============================================================================
// Event DTOs
// =============================================================================

/** Narrows a listing to one kind of vesting or authority event */
export const EventTypeSchema = z.enum([
  VESTING_EVENTS.SCHEDULE_CREATED,
  VESTING_EVENTS.TOKENS_RELEASED,
  VESTING_EVENTS.SCHEDULE_REVOKED,
  VESTING_EVENTS.OWNERSHIP_TRANSFERRED,
  VESTING_EVENTS.TOKEN_UPDATED,
  VESTING_EVENTS.ROLE_GRANTED,
  VESTING_EVENTS.ROLE_REVOKED,
]);

export const ListEventsQuerySchema = PaginationQuerySchema.extend({
  afterPosition: z.coerce.number().int().min(0).optional(),
  type: EventTypeSchema.optional(),
});

export type ListEventsQuery = z.infer<typeof ListEventsQuerySchema>;

export const ListStreamEventsQuerySchema = PaginationQuerySchema.extend({
  afterVersion: z.coerce.number().int().min(0).optional(),
  type: EventTypeSchema.optional(),
});

export type ListStreamEventsQuery = z.infer<typeof ListStreamEventsQuerySchema>;

// =============================================================================
// Response Views
// =============================================================================

export interface ScheduleView {
  readonly beneficiary: string;
  readonly totalAmount: string;
  readonly startTime: number;
  readonly cliffDuration: number;
  readonly vestingDuration: number;
  readonly releasedAmount: string;
  readonly isActive: boolean;
  readonly revokedAt?: number | undefined;
}

export function toScheduleView(schedule: VestingSchedule): ScheduleView {
  return {
    beneficiary: schedule.beneficiary,
    totalAmount: schedule.totalAmount.toString(),
    startTime: schedule.startTime,
    cliffDuration: schedule.cliffDuration,
    vestingDuration: schedule.vestingDuration,
    releasedAmount: schedule.releasedAmount.toString(),
    isActive: schedule.isActive,
    ...(schedule.revokedAt !== undefined ? { revokedAt: schedule.revokedAt } : {}),
  };
}

export interface StatsView {
  readonly beneficiaryCount: number;
  readonly activeCount: number;
  readonly totalVesting: string;
  readonly totalReleased: string;
  readonly totalForfeited: string;
}

export function toStatsView(stats: VestingStats): StatsView {
  return {
    beneficiaryCount: stats.beneficiaryCount,
    activeCount: stats.activeCount,
    totalVesting: stats.totalVesting.toString(),
    totalReleased: stats.totalReleased.toString(),
    totalForfeited: stats.totalForfeited.toString(),
  };
}

export interface RevocationView {
  readonly beneficiary: string;
  readonly settledAmount: string;
  readonly forfeitedAmount: string;
  readonly revokedAt: number;
}

export function toRevocationView(result: RevocationResult): RevocationView {
  return {
    beneficiary: result.beneficiary,
    settledAmount: result.settledAmount.toString(),
    forfeitedAmount: result.forfeitedAmount.toString(),
    revokedAt: result.revokedAt,
  };
}
