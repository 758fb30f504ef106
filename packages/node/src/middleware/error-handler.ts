/**
 * Global error handler middleware.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response.
 *
 * Maps known domain errors (VestingError, LedgerError, EventStoreError)
 * to HTTP status codes. Anything else is a 500 with a generic message.
 */

import type { Context } from "hono";
import { VestingError } from "@tranche/vesting";
import type { VestingErrorCode } from "@tranche/vesting";
import { LedgerError } from "@tranche/ledger";
import type { LedgerErrorCode } from "@tranche/ledger";
import { EventStoreError } from "@tranche/event-store";
import type { EventStoreErrorCode } from "@tranche/event-store";
import { createErrorEnvelope } from "../types/error.js";
import type { ErrorStatus } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

const VESTING_STATUS: Record<VestingErrorCode, ErrorStatus> = {
  UNAUTHORIZED: 403,
  INVALID_BENEFICIARY: 400,
  INVALID_AMOUNT: 400,
  INVALID_DURATION: 400,
  INVALID_ADDRESS: 400,
  SCHEDULE_ALREADY_ACTIVE: 409,
  NO_ACTIVE_SCHEDULE: 404,
  NOTHING_TO_RELEASE: 422,
  TRANSFER_FAILED: 502,
  INVALID_SNAPSHOT: 400,
};

const LEDGER_STATUS: Record<LedgerErrorCode, ErrorStatus> = {
  UNBALANCED_TRANSACTION: 400,
  UNKNOWN_ACCOUNT: 404,
  INVALID_AMOUNT: 400,
  INVALID_MONEY: 400,
  DUPLICATE_ENTRY_ID: 409,
  DUPLICATE_ACCOUNT_ID: 409,
  EMPTY_TRANSACTION: 400,
  MIXED_CORRELATION_ID: 400,
};

const EVENT_STORE_STATUS: Record<EventStoreErrorCode, ErrorStatus> = {
  CONCURRENCY_CONFLICT: 409,
  INVALID_STREAM_ID: 400,
  EMPTY_APPEND: 400,
  INVALID_VERSION: 400,
};

interface MappedError {
  readonly status: ErrorStatus;
  readonly code: string;
  readonly message: string;
  readonly details?: Readonly<Record<string, unknown>> | undefined;
}

export function mapError(err: unknown): MappedError {
  if (err instanceof VestingError) {
    return {
      status: VESTING_STATUS[err.code],
      code: err.code,
      message: err.message,
      details: err.details,
    };
  }
  if (err instanceof LedgerError) {
    return { status: LEDGER_STATUS[err.code], code: err.code, message: err.message };
  }
  if (err instanceof EventStoreError) {
    return { status: EVENT_STORE_STATUS[err.code], code: err.code, message: err.message };
  }
  // Don't leak internal details
  return { status: 500, code: "INTERNAL_ERROR", message: "Internal server error" };
}

// =============================================================================
// Middleware
// =============================================================================

/**
 * Global error handler. Registered as Hono's onError handler.
 */
export function handleError(err: unknown, c: Context): Response {
  const mapped = mapError(err);
  return c.json(
    createErrorEnvelope(mapped.code, mapped.message, mapped.details),
    mapped.status,
  );
}
