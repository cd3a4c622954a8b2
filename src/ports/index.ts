// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports`
 * Purpose: Hex entry file for the collaborator ports adapters implement - canonical import surface.
 * Scope: Re-exports the port interfaces owned by the exercise core. Does not export implementations.
 * Invariants: Named type exports only, no export *
 * Side-effects: none
 * Links: Implemented by src/adapters; consumed by bootstrap and features
 * @public
 */

export type {
  AddLiquidityParams,
  AddLiquidityResult,
  Clock,
  CreateLinearStreamParams,
  CreateSegmentedStreamParams,
  CumulativeReserves,
  ExerciseGateway,
  LiquidityRouter,
  PairObservation,
  PairReserves,
  RouterReserves,
  StreamingService,
  TokenLedger,
  TwapPairSource,
} from "@optex/exercise-core";
