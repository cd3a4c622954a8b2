// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/exercise/services/exerciseService`
 * Purpose: Exercise options through the gateway with per-kind param encoding, quotes and credit claims, logging each outcome.
 * Scope: Feature-layer orchestration over the options token and its modules. Does not price or settle anything itself.
 * Invariants:
 * - Every exerciseOptions call logs exactly one of exercise.settled / exercise.failed.
 * - Failures are rethrown unchanged after logging; the gateway has already rolled back.
 * - Amounts are logged as decimal strings.
 * Side-effects: IO (gateway calls move tokens, structured logs)
 * @public
 */

import {
  type CreditedExercise,
  type DiscountExercise,
  encodeDiscountExerciseParams,
  encodeMultiplierExerciseParams,
  type ExerciseModule,
  type ExerciseModuleKind,
  type ExerciseResult,
  type FixedWindowExercise,
  type LinearVestedExercise,
  type LockedLpExercise,
  type OptionsToken,
  type SegmentedVestedExercise,
} from "@optex/exercise-core";
import type { Address, Hex } from "viem";

import {
  EVENT_NAMES,
  logEvent,
  logOperationError,
  type OperationContext,
} from "@/shared/observability";

import { exerciseErrorCode, MultiplierRequiredError } from "../errors";

export interface ExerciseServiceDeps {
  gateway: OptionsToken;
}

export interface ExerciseOptionsInput {
  caller: Address;
  module: ExerciseModule;
  amount: bigint;
  recipient: Address;
  maxPaymentAmount: bigint;
  /** Unix seconds */
  deadline: bigint;
  /** Required by locked-lp and vested modules */
  multiplier?: bigint | undefined;
}

export interface ClaimCreditInput {
  caller: Address;
  module: CreditedExercise;
  to: Address;
}

/** Modules that can quote a payment */
export type QuotableModule =
  | DiscountExercise
  | FixedWindowExercise
  | LockedLpExercise
  | LinearVestedExercise
  | SegmentedVestedExercise;

export function encodeExerciseParams(
  kind: ExerciseModuleKind,
  params: {
    maxPaymentAmount: bigint;
    deadline: bigint;
    multiplier?: bigint | undefined;
  }
): Hex {
  switch (kind) {
    case "discount":
    case "fixed-window":
      return encodeDiscountExerciseParams(params);
    case "locked-lp":
    case "vested-linear":
    case "vested-segmented":
      if (params.multiplier === undefined) {
        throw new MultiplierRequiredError(kind);
      }
      return encodeMultiplierExerciseParams({
        maxPaymentAmount: params.maxPaymentAmount,
        deadline: params.deadline,
        multiplier: params.multiplier,
      });
  }
}

export function exerciseOptions(
  deps: ExerciseServiceDeps,
  ctx: OperationContext,
  input: ExerciseOptionsInput
): ExerciseResult {
  const start = performance.now();
  const { module } = input;

  try {
    const params = encodeExerciseParams(module.kind, input);
    const result = deps.gateway.exercise(input.caller, {
      amount: input.amount,
      recipient: input.recipient,
      module: module.address,
      params,
    });

    logEvent(ctx.log, EVENT_NAMES.EXERCISE_SETTLED, {
      reqId: ctx.reqId,
      module: module.address,
      kind: module.kind,
      amount: input.amount.toString(),
      paymentAmount: result.paymentAmount.toString(),
      data0: result.data0,
      data1: result.data1.toString(),
      data2: result.data2.toString(),
      durationMs: performance.now() - start,
    });
    return result;
  } catch (error) {
    const errorCode = exerciseErrorCode(error);
    logEvent(ctx.log, EVENT_NAMES.EXERCISE_FAILED, {
      reqId: ctx.reqId,
      module: module.address,
      amount: input.amount.toString(),
      errorCode,
      durationMs: performance.now() - start,
    });
    logOperationError(ctx.log, error, errorCode);
    throw error;
  }
}

/**
 * Payment the holder would be charged right now for `amount` options.
 *
 * @throws MultiplierRequiredError for multiplier-priced modules called without one
 */
export function quoteExercise(
  module: QuotableModule,
  amount: bigint,
  multiplier?: bigint
): bigint {
  switch (module.kind) {
    case "discount":
    case "fixed-window":
      return module.getPaymentAmount(amount);
    case "locked-lp":
    case "vested-linear":
    case "vested-segmented":
      if (multiplier === undefined) {
        throw new MultiplierRequiredError(module.kind);
      }
      return module.getPaymentAmount(amount, multiplier);
  }
}

/** Claim the caller's whole credit; logs only when something was paid. */
export function claimCredit(
  ctx: OperationContext,
  input: ClaimCreditInput
): bigint {
  const amount = input.module.claim(input.caller, input.to);
  if (amount > 0n) {
    logEvent(ctx.log, EVENT_NAMES.CREDIT_CLAIMED, {
      reqId: ctx.reqId,
      module: input.module.address,
      account: input.caller,
      to: input.to,
      amount: amount.toString(),
    });
  }
  return amount;
}
