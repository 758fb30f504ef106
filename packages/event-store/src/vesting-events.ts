/**
 * @tranche/event-store — Vesting domain event definitions.
 *
 * Naming convention: `<subsystem>.<entity>.<action>`.
 * Amounts in payloads are decimal strings of token base units.
 */

// =============================================================================
// Vesting Events (stream `schedule:<beneficiary>`)
// =============================================================================

export interface ScheduleCreatedPayload {
  readonly beneficiary: string;
  readonly totalAmount: string;
  readonly startTime: number;
  readonly cliffDuration: number;
  readonly vestingDuration: number;
}

export interface TokensReleasedPayload {
  readonly beneficiary: string;
  readonly amount: string;
  readonly releasedAmount: string;
  readonly reference?: string | undefined;
}

export interface ScheduleRevokedPayload {
  readonly beneficiary: string;
  readonly settledAmount: string;
  readonly forfeitedAmount: string;
  readonly revokedAt: number;
}

// =============================================================================
// Authority Events (stream `authority`)
// =============================================================================

export interface OwnershipTransferredPayload {
  readonly previousOwner: string;
  readonly newOwner: string;
}

export interface TokenAddressUpdatedPayload {
  readonly previousAddress: string;
  readonly newAddress: string;
}

export interface RoleChangedPayload {
  readonly identity: string;
  readonly role: string;
}

// =============================================================================
// Constants
// =============================================================================

export const VESTING_EVENTS = {
  SCHEDULE_CREATED: "vesting.schedule.created",
  TOKENS_RELEASED: "vesting.tokens.released",
  SCHEDULE_REVOKED: "vesting.schedule.revoked",
  OWNERSHIP_TRANSFERRED: "authority.ownership.transferred",
  TOKEN_UPDATED: "authority.token.updated",
  ROLE_GRANTED: "authority.role.granted",
  ROLE_REVOKED: "authority.role.revoked",
} as const;

export type VestingEventType = (typeof VESTING_EVENTS)[keyof typeof VESTING_EVENTS];

export const AUTHORITY_STREAM = "authority";

export function scheduleStreamId(beneficiary: string): string {
  return `schedule:${beneficiary}`;
}
