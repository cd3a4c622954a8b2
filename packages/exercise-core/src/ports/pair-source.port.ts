// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@optex/exercise-core/ports/pair-source`
 * Purpose: Read-side view of an AMM pair with cumulative reserve accumulators and the last observation.
 * Scope: Interface only. Oracles read through it; they never trade.
 * Invariants:
 * - Cumulatives only grow; they accrue the reserves held *before* the latest update.
 * - Observations are ordered oldest first; index `observationLength() - 1` is the latest.
 * Side-effects: none (interface only)
 * @public
 */

import type { Address } from "viem";

export interface PairReserves {
  readonly reserve0: bigint;
  readonly reserve1: bigint;
  readonly blockTimestampLast: bigint;
}

export interface CumulativeReserves {
  readonly reserve0Cumulative: bigint;
  readonly reserve1Cumulative: bigint;
  readonly blockTimestamp: bigint;
}

export interface PairObservation {
  readonly timestamp: bigint;
  readonly reserve0Cumulative: bigint;
  readonly reserve1Cumulative: bigint;
}

export interface TwapPairSource {
  readonly address: Address;

  token0(): Address;

  token1(): Address;

  stable(): boolean;

  getReserves(): PairReserves;

  /** Counterfactual cumulatives as of now, without writing state */
  currentCumulativePrices(): CumulativeReserves;

  observationLength(): number;

  observations(index: number): PairObservation;
}
