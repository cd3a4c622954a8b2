// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@optex/exercise-core/ports/exercise-gateway`
 * Purpose: What an exercise module may see of the options token that routes calls to it.
 * Scope: Interface only. Modules use it to authenticate the caller and re-check the allow-list.
 * Invariants: `isExerciseContract` reflects the owner-managed allow-list at call time.
 * Side-effects: none (interface only)
 * @public
 */

import type { Address } from "viem";

export interface ExerciseGateway {
  readonly address: Address;

  isExerciseContract(module: Address): boolean;
}
