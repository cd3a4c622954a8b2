// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@optex/exercise-core/ports/clock`
 * Purpose: Chain-time abstraction for deadlines, windows, TWAP and streams.
 * Scope: Interface only.
 * Invariants: Returns unix seconds; never decreases within one simulated chain.
 * Side-effects: none (interface only)
 * @public
 */

export interface Clock {
  /** Current block timestamp in unix seconds */
  now(): bigint;
}
