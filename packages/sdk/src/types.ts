/**
 * @tranche/sdk — SDK types.
 *
 * Types specific to the SDK client layer. Wire shapes mirror the
 * HTTP service: amounts travel as decimal strings of base units.
 */

import type { DomainEvent } from "@tranche/types";

// =============================================================================
// Client Configuration
// =============================================================================

export interface TrancheClientConfig {
  /** Base URL of the Tranche API (e.g., "http://localhost:3000") */
  readonly baseUrl: string;
  /** Sent as X-Api-Key */
  readonly apiKey?: string | undefined;
  /** Sent as `Authorization: Bearer <token>` */
  readonly bearerToken?: string | undefined;
  /** Sent as X-Caller-Id, for servers running without credentials */
  readonly callerId?: string | undefined;
  /** Request timeout in milliseconds (default: 30000) */
  readonly timeout?: number | undefined;
  /** Maximum retry attempts for 5xx and network errors (default: 3) */
  readonly retries?: number | undefined;
  /** First backoff delay in milliseconds, doubled per attempt (default: 1000) */
  readonly retryDelayMs?: number | undefined;
  /** Custom fetch function (for testing or polyfills) */
  readonly fetchFn?: typeof fetch | undefined;
}

/** Per-call options for mutating requests. */
export interface MutationOptions {
  /**
   * Sent as Idempotency-Key. A keyed POST is also retried on 5xx,
   * since the server replays the first answer.
   */
  readonly idempotencyKey?: string | undefined;
}

// =============================================================================
// Response Types
// =============================================================================

export interface TrancheResponse<T> {
  readonly data: T;
  readonly status: number;
  /** Selected response headers, lower-cased */
  readonly headers: Readonly<Record<string, string>>;
}

export interface PaginatedList<T> {
  readonly data: readonly T[];
  readonly pagination: {
    readonly cursor: string | null;
    readonly hasMore: boolean;
  };
}

export interface PageParams {
  readonly cursor?: string | undefined;
  readonly limit?: number | undefined;
}

// =============================================================================
// Domain Views
// =============================================================================

export interface Schedule {
  readonly beneficiary: string;
  readonly totalAmount: string;
  /** Unix seconds */
  readonly startTime: number;
  /** Seconds */
  readonly cliffDuration: number;
  /** Seconds */
  readonly vestingDuration: number;
  readonly releasedAmount: string;
  readonly isActive: boolean;
  readonly revokedAt?: number | undefined;
}

export interface CreateScheduleParams {
  readonly beneficiary: string;
  readonly totalAmount: string | bigint;
  readonly cliffDurationDays: number;
  readonly vestingDurationDays: number;
}

export interface Releasable {
  readonly beneficiary: string;
  readonly vested: string;
  readonly releasable: string;
  /** Unix seconds the amounts were computed at */
  readonly at: number;
}

export interface ReleaseResult {
  readonly beneficiary: string;
  readonly amount: string;
}

export interface Revocation {
  readonly beneficiary: string;
  readonly settledAmount: string;
  readonly forfeitedAmount: string;
  readonly revokedAt: number;
}

export interface RegistryEntry {
  /** 1-based position in the registry */
  readonly position: number;
  readonly beneficiary: string;
}

export interface Stats {
  readonly beneficiaryCount: number;
  readonly activeCount: number;
  readonly totalVesting: string;
  readonly totalReleased: string;
  readonly totalForfeited: string;
}

export interface Authority {
  readonly owner: string;
  readonly creators: readonly string[];
  readonly tokenAddress: string;
}

export interface CreatorGrant {
  readonly identity: string;
  readonly granted: boolean;
}

export interface CreatorRevocation {
  readonly identity: string;
  readonly revoked: boolean;
}

export interface Custody {
  readonly currency: string;
  readonly decimals: number;
  readonly balance: string;
  readonly balanced: boolean;
}

export interface StoredEvent {
  readonly event: DomainEvent;
  readonly streamId: string;
  readonly version: number;
  readonly globalPosition: number;
  readonly appendedAt: string;
  readonly hash: string;
  readonly previousHash: string;
}

export interface ListEventsParams extends PageParams {
  /** Only events after this global position */
  readonly afterPosition?: number | undefined;
  /** Only events of this type, e.g. "vesting.tokens.released" */
  readonly type?: string | undefined;
}

export interface ListStreamEventsParams extends PageParams {
  /** Only events after this stream version */
  readonly afterVersion?: number | undefined;
  readonly type?: string | undefined;
}

// =============================================================================
// Error Types
// =============================================================================

/**
 * Structured error from the Tranche API.
 *
 * `code` is the server's error code (e.g. "NO_ACTIVE_SCHEDULE"), or one of
 * TIMEOUT, NETWORK_ERROR, CLIENT_ERROR, SERVER_ERROR when the server gave none.
 */
export class TrancheError extends Error {
  readonly code: string;
  /** HTTP status code, 0 when no response arrived */
  readonly statusCode: number;
  readonly details?: unknown;

  constructor(code: string, message: string, statusCode: number, details?: unknown) {
    super(message);
    this.name = "TrancheError";
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;
  }
}
