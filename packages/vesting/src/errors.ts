/**
 * Error taxonomy for the vesting engine and the distribution ledger.
 *
 * Every failure aborts the whole operation it was raised in; state
 * mutated earlier in the same call is restored before the error
 * reaches the caller.
 */

export type AllocationErrorKind =
  | "authorization"
  | "validation"
  | "state"
  | "capacity"
  | "dependency";

export type AuthorizationErrorCode = "MISSING_ROLE";

export type ValidationErrorCode =
  | "INVALID_ADDRESS"
  | "INVALID_AMOUNT"
  | "INVALID_SCHEDULE"
  | "START_IN_PAST"
  | "UNKNOWN_PLAN"
  | "UNKNOWN_POOL"
  | "INVALID_TRIGGER_TIME"
  | "DEBT_EXCEEDS_ENTITLEMENT"
  | "POOL_NOT_SWAPPABLE"
  | "INVALID_RECIPIENT"
  | "INVALID_POOL_CONFIG";

export type StateErrorCode =
  | "ALREADY_REVOKED"
  | "NOT_REVOCABLE"
  | "NOTHING_CLAIMABLE"
  | "TRIGGER_TIME_UNSET"
  | "NO_GRANTS"
  | "BENEFICIARY_MISMATCH"
  | "REENTRANT_CALL"
  | "PAUSED";

export type CapacityErrorCode = "POOL_CAPACITY_EXCEEDED" | "RESERVE_INSUFFICIENT";

export type DependencyErrorCode = "TRANSFER_FAILED";

export type AllocationErrorCode =
  | AuthorizationErrorCode
  | ValidationErrorCode
  | StateErrorCode
  | CapacityErrorCode
  | DependencyErrorCode;

export abstract class AllocationError extends Error {
  abstract readonly kind: AllocationErrorKind;
  public readonly code: AllocationErrorCode;

  constructor(code: AllocationErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.code = code;
  }
}

/** A capability check failed. */
export class AuthorizationError extends AllocationError {
  readonly kind = "authorization";

  constructor(code: AuthorizationErrorCode, message: string) {
    super(code, message);
    this.name = "AuthorizationError";
  }
}

/** Malformed or out-of-range input. */
export class ValidationError extends AllocationError {
  readonly kind = "validation";

  constructor(code: ValidationErrorCode, message: string) {
    super(code, message);
    this.name = "ValidationError";
  }
}

/** The operation is not valid in the current state. */
export class StateError extends AllocationError {
  readonly kind = "state";

  constructor(code: StateErrorCode, message: string) {
    super(code, message);
    this.name = "StateError";
  }
}

/** A pool ceiling would be exceeded. */
export class CapacityError extends AllocationError {
  readonly kind = "capacity";

  constructor(code: CapacityErrorCode, message: string) {
    super(code, message);
    this.name = "CapacityError";
  }
}

/** The token ledger reported or raised a failure. */
export class DependencyFailure extends AllocationError {
  readonly kind = "dependency";

  constructor(code: DependencyErrorCode, message: string, options?: ErrorOptions) {
    super(code, message, options);
    this.name = "DependencyFailure";
  }
}
