// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@optex/exercise-core/ports`
 * Purpose: Barrel export for the collaborator ports the core depends on.
 * Scope: Type re-exports only.
 * Side-effects: none
 * @public
 */

export type { Clock } from "./clock.port";
export type { ExerciseGateway } from "./exercise-gateway.port";
export type {
  AddLiquidityParams,
  AddLiquidityResult,
  LiquidityRouter,
  RouterReserves,
} from "./liquidity-router.port";
export type {
  CumulativeReserves,
  PairObservation,
  PairReserves,
  TwapPairSource,
} from "./pair-source.port";
export type {
  CreateLinearStreamParams,
  CreateSegmentedStreamParams,
  StreamingService,
} from "./streaming.port";
export type { TokenLedger } from "./token-ledger.port";
