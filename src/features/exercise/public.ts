// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/exercise/public`
 * Purpose: Single entrypoint for the exercise feature.
 * Scope: Re-exports service operations and error contracts.
 * Side-effects: none
 * @public
 */

export type { ExerciseErrorCode } from "./errors";
export {
  exerciseErrorCode,
  isMultiplierRequiredError,
  MultiplierRequiredError,
} from "./errors";
export type {
  ClaimCreditInput,
  ExerciseOptionsInput,
  ExerciseServiceDeps,
  QuotableModule,
} from "./services/exerciseService";
export {
  claimCredit,
  encodeExerciseParams,
  exerciseOptions,
  quoteExercise,
} from "./services/exerciseService";
