// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/exercise/errors`
 * Purpose: Feature-level errors and the stable error code used in exercise logs.
 * Scope: Error class for missing request input plus code mapping. Does not call the gateway.
 * Invariants: exerciseErrorCode never throws; unknown failures map to "UNKNOWN".
 * Side-effects: none
 * @public
 */

import {
  type ExerciseCoreErrorCode,
  type ExerciseModuleKind,
  isExerciseCoreError,
} from "@optex/exercise-core";

/** Locked-LP and vested modules price from a holder-chosen multiplier. */
export class MultiplierRequiredError extends Error {
  public readonly code = "MULTIPLIER_REQUIRED" as const;
  constructor(public readonly kind: ExerciseModuleKind) {
    super(`Exercising a ${kind} module requires a multiplier`);
    this.name = "MultiplierRequiredError";
  }
}

export function isMultiplierRequiredError(
  error: unknown
): error is MultiplierRequiredError {
  return error instanceof Error && error.name === "MultiplierRequiredError";
}

export type ExerciseErrorCode =
  | ExerciseCoreErrorCode
  | MultiplierRequiredError["code"]
  | "UNKNOWN";

export function exerciseErrorCode(error: unknown): ExerciseErrorCode {
  if (isExerciseCoreError(error)) return error.code;
  if (isMultiplierRequiredError(error)) return error.code;
  return "UNKNOWN";
}
