/**
 * Vesting errors.
 *
 * Every failed mutation rejects with a VestingError and leaves the
 * ledger untouched.
 */

export type VestingErrorCode =
  | "UNAUTHORIZED"
  | "INVALID_BENEFICIARY"
  | "INVALID_AMOUNT"
  | "INVALID_DURATION"
  | "SCHEDULE_ALREADY_ACTIVE"
  | "NO_ACTIVE_SCHEDULE"
  | "NOTHING_TO_RELEASE"
  | "TRANSFER_FAILED"
  | "INVALID_ADDRESS"
  | "INVALID_SNAPSHOT";

export class VestingError extends Error {
  public readonly code: VestingErrorCode;
  public readonly details?: Readonly<Record<string, unknown>> | undefined;

  constructor(code: VestingErrorCode, message: string, details?: Readonly<Record<string, unknown>>) {
    super(message);
    this.name = "VestingError";
    this.code = code;
    this.details = details;
  }
}
