// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@optex/exercise-core`
 * Purpose: Pricing and settlement engine for options tokens: oracles, fee split, exercise modules and the gateway.
 * Scope: Re-exports the domain API. Does not contain I/O; collaborators arrive through ports.
 * Invariants: No imports from src/ or tests/. All amounts are bigint.
 * Side-effects: none
 * @public
 */

// Errors
export {
  BelowMinPriceError,
  type ExerciseCoreError,
  type ExerciseCoreErrorCode,
  ExerciseWindowClosedError,
  ExerciseWindowNotOpenError,
  FeeArrayLengthMismatchError,
  InsufficientAllowanceError,
  InsufficientBalanceError,
  InsufficientLiquidityError,
  InsufficientObservationsError,
  InvalidExerciseWindowError,
  InvalidFeeScheduleError,
  InvalidLockDurationsError,
  InvalidMultiplierError,
  InvalidOracleError,
  InvalidParamsError,
  InvalidSegmentsError,
  InvalidStreamError,
  InvalidVestingScheduleError,
  isBelowMinPriceError,
  isExerciseCoreError,
  isInvalidMultiplierError,
  isNotActiveModuleError,
  isPastDeadlineError,
  isSlippageTooHighError,
  MultiplierOutOfRangeError,
  NotActiveModuleError,
  NotGatewayError,
  NotOwnerError,
  NotTokenAdminError,
  OverflowError,
  PastDeadlineError,
  ReentrantCallError,
  SegmentsNotConfiguredError,
  SlippageTooHighError,
  StablePairsUnsupportedError,
} from "./errors";

// Model
export type {
  ExerciseModuleKind,
  ExerciseRequest,
  ExerciseResult,
  FeeSchedule,
  SegmentConfig,
  StreamSegment,
  TokenPair,
} from "./model";
export {
  addressKey,
  EXERCISE_MODULE_KINDS,
  sameAddress,
  toAddress,
} from "./model";

// Math
export {
  absBigint,
  applyMultiplier,
  BPS_DENOMINATOR,
  divWadDown,
  divWadUp,
  MAX_UINT256,
  minBigint,
  mulDivDown,
  mulDivUp,
  mulWadDown,
  mulWadUp,
  WAD,
} from "./math";

// State
export {
  Journal,
  JournaledList,
  JournaledMap,
  JournaledValue,
} from "./journal";
export type {
  ConfigChangedEvent,
  CreditClaimedEvent,
  CreditRecordedEvent,
  EventSink,
  ExerciseContractSetEvent,
  ExercisedEvent,
  FeesDistributedEvent,
  GatewayExercisedEvent,
  MintedEvent,
  ProtocolEvent,
  ProtocolEventType,
} from "./events";
export { JournaledEventLog } from "./events";
export { Ownable, ReentrancyLock } from "./access";
export { CreditLedger } from "./credit-ledger";

// Ports
export type * from "./ports";

// Rules
export {
  type DistributeFeesInput,
  distributeFeesFrom,
  type FeeShare,
  feeScheduleTotalBps,
  splitFees,
  toFeeSchedule,
} from "./fees";
export {
  getLockDurationForDiscount,
  type LockDurationBounds,
  type LockDurationLine,
  lockDurationLine,
} from "./lock-duration";
export {
  constructSegments,
  toSegmentSchedule,
  totalSegmentDuration,
} from "./segments";
export {
  type DiscountExerciseParams,
  decodeDiscountExerciseParams,
  decodeMultiplierExerciseParams,
  encodeDiscountExerciseParams,
  encodeMultiplierExerciseParams,
  type MultiplierExerciseParams,
} from "./params";

// Oracles
export {
  type Oracle,
  oracleMatchesTokens,
  orientPair,
  type PairOrientation,
} from "./oracle/oracle";
export {
  MAX_RESERVE,
  PairTwapOracle,
  type PairTwapOracleConfig,
} from "./oracle/pair-twap-oracle";
export {
  ReserveRatioOracle,
  type ReserveRatioOracleConfig,
} from "./oracle/reserve-ratio-oracle";

// Exercise modules
export type { ExerciseModule } from "./exercise/exercise-module";
export {
  BaseExercise,
  type BaseExerciseConfig,
} from "./exercise/base-exercise";
export {
  CreditedExercise,
  type DeliverySplit,
} from "./exercise/credited-exercise";
export {
  MultiplierBounds,
  type MultiplierRange,
  OracleSlot,
  paymentForMultiplier,
} from "./exercise/pricing";
export {
  DiscountExercise,
  type DiscountExerciseConfig,
  MAX_DISCOUNT_MULTIPLIER,
  MIN_DISCOUNT_MULTIPLIER,
} from "./exercise/discount-exercise";
export {
  type ExerciseWindow,
  FixedWindowExercise,
  type FixedWindowExerciseConfig,
} from "./exercise/fixed-window-exercise";
export {
  type LockDurationRange,
  LockedLpExercise,
  type LockedLpExerciseConfig,
} from "./exercise/locked-lp-exercise";
export {
  LinearVestedExercise,
  type LinearVestedExerciseConfig,
  SegmentedVestedExercise,
  type SegmentedVestedExerciseConfig,
  VestedExercise,
  type VestedExerciseConfig,
  type VestingSchedule,
} from "./exercise/vested-exercise";

// Gateway
export {
  type ExerciseOptionsInput,
  OptionsToken,
  type OptionsTokenConfig,
} from "./gateway/options-token";
