// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@optex/exercise-core/exercise/exercise-module`
 * Purpose: The single capability every exercise strategy exposes to the gateway.
 * Scope: Interface only.
 * Invariants: Only the gateway may call `exercise`; a successful call never charges more than the decoded maxPaymentAmount.
 * Side-effects: none (interface only)
 * @public
 */

import type { Address } from "viem";

import type {
  ExerciseModuleKind,
  ExerciseRequest,
  ExerciseResult,
} from "../model";

export interface ExerciseModule {
  readonly address: Address;
  readonly kind: ExerciseModuleKind;

  exercise(caller: Address, request: ExerciseRequest): ExerciseResult;
}
