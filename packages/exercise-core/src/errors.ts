// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@optex/exercise-core/errors`
 * Purpose: Domain error classes for pricing, settlement and configuration failures.
 * Scope: Error definitions and type guards. Does not perform I/O or contain business logic.
 * Invariants: All errors have a readonly `code` discriminant; every one is fatal to the current call (state is rolled back by the journal).
 * Side-effects: none
 * Notes: Insufficient module funding is NOT an error; modules degrade to partial delivery plus credit.
 * @public
 */

import type { Address } from "viem";

// ---------------------------------------------------------------------------
// Authorization
// ---------------------------------------------------------------------------

export class NotGatewayError extends Error {
  public readonly code = "NOT_GATEWAY" as const;
  constructor(public readonly caller: Address) {
    super(`Caller ${caller} is not the options token gateway`);
    this.name = "NotGatewayError";
  }
}

export class NotActiveModuleError extends Error {
  public readonly code = "NOT_ACTIVE_MODULE" as const;
  constructor(public readonly module: Address) {
    super(`Exercise module ${module} is not active`);
    this.name = "NotActiveModuleError";
  }
}

export class NotOwnerError extends Error {
  public readonly code = "NOT_OWNER" as const;
  constructor(
    public readonly caller: Address,
    public readonly contract: Address
  ) {
    super(`Caller ${caller} is not the owner of ${contract}`);
    this.name = "NotOwnerError";
  }
}

export class NotTokenAdminError extends Error {
  public readonly code = "NOT_TOKEN_ADMIN" as const;
  constructor(public readonly caller: Address) {
    super(`Caller ${caller} is not the token admin`);
    this.name = "NotTokenAdminError";
  }
}

export class ReentrantCallError extends Error {
  public readonly code = "REENTRANT_CALL" as const;
  constructor(public readonly contract: Address) {
    super(`Reentrant call into ${contract}`);
    this.name = "ReentrantCallError";
  }
}

// ---------------------------------------------------------------------------
// Temporal
// ---------------------------------------------------------------------------

export class PastDeadlineError extends Error {
  public readonly code = "PAST_DEADLINE" as const;
  constructor(
    public readonly deadline: bigint,
    public readonly now: bigint
  ) {
    super(`Deadline ${deadline} has passed (now ${now})`);
    this.name = "PastDeadlineError";
  }
}

export class ExerciseWindowNotOpenError extends Error {
  public readonly code = "EXERCISE_WINDOW_NOT_OPEN" as const;
  constructor(
    public readonly startTime: bigint,
    public readonly now: bigint
  ) {
    super(`Exercise window opens at ${startTime} (now ${now})`);
    this.name = "ExerciseWindowNotOpenError";
  }
}

export class ExerciseWindowClosedError extends Error {
  public readonly code = "EXERCISE_WINDOW_CLOSED" as const;
  constructor(
    public readonly endTime: bigint,
    public readonly now: bigint
  ) {
    super(`Exercise window closed at ${endTime} (now ${now})`);
    this.name = "ExerciseWindowClosedError";
  }
}

export class InvalidExerciseWindowError extends Error {
  public readonly code = "INVALID_EXERCISE_WINDOW" as const;
  constructor(
    public readonly startTime: bigint,
    public readonly endTime: bigint,
    public readonly now: bigint
  ) {
    super(
      `Invalid exercise window [${startTime}, ${endTime}]: start must be >= now (${now}) and end must be after start`
    );
    this.name = "InvalidExerciseWindowError";
  }
}

// ---------------------------------------------------------------------------
// Price / slippage
// ---------------------------------------------------------------------------

export class BelowMinPriceError extends Error {
  public readonly code = "BELOW_MIN_PRICE" as const;
  constructor(
    public readonly price: bigint,
    public readonly minPrice: bigint
  ) {
    super(`Oracle price ${price} is below the floor ${minPrice}`);
    this.name = "BelowMinPriceError";
  }
}

export class SlippageTooHighError extends Error {
  public readonly code = "SLIPPAGE_TOO_HIGH" as const;
  constructor(
    public readonly paymentAmount: bigint,
    public readonly maxPaymentAmount: bigint
  ) {
    super(
      `Payment ${paymentAmount} exceeds the authorized maximum ${maxPaymentAmount}`
    );
    this.name = "SlippageTooHighError";
  }
}

export class OverflowError extends Error {
  public readonly code = "OVERFLOW" as const;
  constructor(
    public readonly value: bigint,
    public readonly bound: bigint
  ) {
    super(`Value ${value} exceeds safe bound ${bound}`);
    this.name = "OverflowError";
  }
}

export class InsufficientObservationsError extends Error {
  public readonly code = "INSUFFICIENT_OBSERVATIONS" as const;
  constructor(public readonly pair: Address) {
    super(`Pair ${pair} has no observation old enough to average over`);
    this.name = "InsufficientObservationsError";
  }
}

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export class InvalidMultiplierError extends Error {
  public readonly code = "INVALID_MULTIPLIER" as const;
  constructor(
    public readonly multiplier: bigint,
    public readonly minMultiplier: bigint,
    public readonly maxMultiplier: bigint
  ) {
    super(
      `Multiplier ${multiplier} is outside [${minMultiplier}, ${maxMultiplier}]`
    );
    this.name = "InvalidMultiplierError";
  }
}

export class MultiplierOutOfRangeError extends Error {
  public readonly code = "MULTIPLIER_OUT_OF_RANGE" as const;
  constructor(
    public readonly field: string,
    public readonly value: bigint
  ) {
    super(`Configured ${field} ${value} is out of range`);
    this.name = "MultiplierOutOfRangeError";
  }
}

export class FeeArrayLengthMismatchError extends Error {
  public readonly code = "FEE_ARRAY_LENGTH_MISMATCH" as const;
  constructor(
    public readonly recipients: number,
    public readonly weights: number
  ) {
    super(`Fee schedule has ${recipients} recipients but ${weights} weights`);
    this.name = "FeeArrayLengthMismatchError";
  }
}

export class InvalidFeeScheduleError extends Error {
  public readonly code = "INVALID_FEE_SCHEDULE" as const;
  constructor(public readonly reason: string) {
    super(`Invalid fee schedule: ${reason}`);
    this.name = "InvalidFeeScheduleError";
  }
}

export class InvalidSegmentsError extends Error {
  public readonly code = "INVALID_SEGMENTS" as const;
  constructor(public readonly reason: string) {
    super(`Invalid segments: ${reason}`);
    this.name = "InvalidSegmentsError";
  }
}

export class SegmentsNotConfiguredError extends Error {
  public readonly code = "SEGMENTS_NOT_CONFIGURED" as const;
  constructor() {
    super("No stream segments configured");
    this.name = "SegmentsNotConfiguredError";
  }
}

export class InvalidOracleError extends Error {
  public readonly code = "INVALID_ORACLE" as const;
  constructor(public readonly reason: string) {
    super(`Invalid oracle: ${reason}`);
    this.name = "InvalidOracleError";
  }
}

export class StablePairsUnsupportedError extends Error {
  public readonly code = "STABLE_PAIRS_UNSUPPORTED" as const;
  constructor(public readonly pair: Address) {
    super(`Pair ${pair} is a stable pair; TWAP pricing needs a volatile pair`);
    this.name = "StablePairsUnsupportedError";
  }
}

export class InvalidLockDurationsError extends Error {
  public readonly code = "INVALID_LOCK_DURATIONS" as const;
  constructor(
    public readonly minLockDuration: bigint,
    public readonly maxLockDuration: bigint
  ) {
    super(
      `Lock durations must satisfy 0 <= min <= max, got [${minLockDuration}, ${maxLockDuration}]`
    );
    this.name = "InvalidLockDurationsError";
  }
}

export class InvalidVestingScheduleError extends Error {
  public readonly code = "INVALID_VESTING_SCHEDULE" as const;
  constructor(
    public readonly cliffDuration: bigint,
    public readonly totalDuration: bigint
  ) {
    super(
      `Vesting schedule needs 0 < total and cliff <= total, got cliff ${cliffDuration}, total ${totalDuration}`
    );
    this.name = "InvalidVestingScheduleError";
  }
}

export class InvalidParamsError extends Error {
  public readonly code = "INVALID_PARAMS" as const;
  constructor(
    public readonly kind: string,
    cause: unknown
  ) {
    super(`Could not decode ${kind} exercise params`, { cause });
    this.name = "InvalidParamsError";
  }
}

// ---------------------------------------------------------------------------
// Collaborator (port-level) failures
// ---------------------------------------------------------------------------

export class InsufficientBalanceError extends Error {
  public readonly code = "INSUFFICIENT_BALANCE" as const;
  constructor(
    public readonly token: Address,
    public readonly account: Address,
    public readonly balance: bigint,
    public readonly required: bigint
  ) {
    super(
      `Account ${account} holds ${balance} of ${token}, needs ${required}`
    );
    this.name = "InsufficientBalanceError";
  }
}

export class InsufficientAllowanceError extends Error {
  public readonly code = "INSUFFICIENT_ALLOWANCE" as const;
  constructor(
    public readonly token: Address,
    public readonly owner: Address,
    public readonly spender: Address,
    public readonly allowance: bigint,
    public readonly required: bigint
  ) {
    super(
      `Spender ${spender} may move ${allowance} of ${token} from ${owner}, needs ${required}`
    );
    this.name = "InsufficientAllowanceError";
  }
}

export class InsufficientLiquidityError extends Error {
  public readonly code = "INSUFFICIENT_LIQUIDITY" as const;
  constructor(public readonly reason: string) {
    super(`Insufficient liquidity: ${reason}`);
    this.name = "InsufficientLiquidityError";
  }
}

export class InvalidStreamError extends Error {
  public readonly code = "INVALID_STREAM" as const;
  constructor(public readonly reason: string) {
    super(`Invalid stream: ${reason}`);
    this.name = "InvalidStreamError";
  }
}

// ---------------------------------------------------------------------------
// Family
// ---------------------------------------------------------------------------

export type ExerciseCoreError =
  | NotGatewayError
  | NotActiveModuleError
  | NotOwnerError
  | NotTokenAdminError
  | ReentrantCallError
  | PastDeadlineError
  | ExerciseWindowNotOpenError
  | ExerciseWindowClosedError
  | InvalidExerciseWindowError
  | BelowMinPriceError
  | SlippageTooHighError
  | OverflowError
  | InsufficientObservationsError
  | InvalidMultiplierError
  | MultiplierOutOfRangeError
  | FeeArrayLengthMismatchError
  | InvalidFeeScheduleError
  | InvalidSegmentsError
  | SegmentsNotConfiguredError
  | InvalidOracleError
  | StablePairsUnsupportedError
  | InvalidLockDurationsError
  | InvalidVestingScheduleError
  | InvalidParamsError
  | InsufficientBalanceError
  | InsufficientAllowanceError
  | InsufficientLiquidityError
  | InvalidStreamError;

export type ExerciseCoreErrorCode = ExerciseCoreError["code"];

const ERROR_CODES: ReadonlySet<string> = new Set<ExerciseCoreErrorCode>([
  "NOT_GATEWAY",
  "NOT_ACTIVE_MODULE",
  "NOT_OWNER",
  "NOT_TOKEN_ADMIN",
  "REENTRANT_CALL",
  "PAST_DEADLINE",
  "EXERCISE_WINDOW_NOT_OPEN",
  "EXERCISE_WINDOW_CLOSED",
  "INVALID_EXERCISE_WINDOW",
  "BELOW_MIN_PRICE",
  "SLIPPAGE_TOO_HIGH",
  "OVERFLOW",
  "INSUFFICIENT_OBSERVATIONS",
  "INVALID_MULTIPLIER",
  "MULTIPLIER_OUT_OF_RANGE",
  "FEE_ARRAY_LENGTH_MISMATCH",
  "INVALID_FEE_SCHEDULE",
  "INVALID_SEGMENTS",
  "SEGMENTS_NOT_CONFIGURED",
  "INVALID_ORACLE",
  "STABLE_PAIRS_UNSUPPORTED",
  "INVALID_LOCK_DURATIONS",
  "INVALID_VESTING_SCHEDULE",
  "INVALID_PARAMS",
  "INSUFFICIENT_BALANCE",
  "INSUFFICIENT_ALLOWANCE",
  "INSUFFICIENT_LIQUIDITY",
  "INVALID_STREAM",
]);

/**
 * Type guard for any error raised by the exercise core or its collaborators.
 */
export function isExerciseCoreError(
  error: unknown
): error is ExerciseCoreError {
  return (
    error instanceof Error &&
    "code" in error &&
    typeof error.code === "string" &&
    ERROR_CODES.has(error.code)
  );
}

// Type guards

export function isSlippageTooHighError(
  error: unknown
): error is SlippageTooHighError {
  return error instanceof Error && error.name === "SlippageTooHighError";
}

export function isBelowMinPriceError(
  error: unknown
): error is BelowMinPriceError {
  return error instanceof Error && error.name === "BelowMinPriceError";
}

export function isPastDeadlineError(
  error: unknown
): error is PastDeadlineError {
  return error instanceof Error && error.name === "PastDeadlineError";
}

export function isNotActiveModuleError(
  error: unknown
): error is NotActiveModuleError {
  return error instanceof Error && error.name === "NotActiveModuleError";
}

export function isInvalidMultiplierError(
  error: unknown
): error is InvalidMultiplierError {
  return error instanceof Error && error.name === "InvalidMultiplierError";
}
