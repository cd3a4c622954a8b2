// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@optex/exercise-core/lock-duration`
 * Purpose: Map an LP-exercise discount multiplier to a lock duration.
 * Scope: Pure functions.
 * Invariants:
 * - The line passes through (minMultiplier, maxLockDuration) and (maxMultiplier, minLockDuration):
 *   a deeper discount (lower multiplier) locks longer.
 * - Slope and intercept are kept as a rational line over one denominator, so both end points are exact.
 * Side-effects: none
 * @public
 */

import { absBigint } from "./math";

export interface LockDurationBounds {
  readonly minMultiplier: bigint;
  readonly maxMultiplier: bigint;
  /** Seconds */
  readonly minLockDuration: bigint;
  /** Seconds */
  readonly maxLockDuration: bigint;
}

/** duration(m) = |slopeNumerator * m + interceptNumerator| / denominator */
export interface LockDurationLine {
  readonly slopeNumerator: bigint;
  readonly interceptNumerator: bigint;
  readonly denominator: bigint;
}

export function lockDurationLine(bounds: LockDurationBounds): LockDurationLine {
  const denominator = bounds.maxMultiplier - bounds.minMultiplier;
  if (denominator <= 0n) {
    throw new RangeError(
      `maxMultiplier (${bounds.maxMultiplier}) must exceed minMultiplier (${bounds.minMultiplier})`
    );
  }
  const slopeNumerator = bounds.minLockDuration - bounds.maxLockDuration;
  const interceptNumerator =
    bounds.minLockDuration * denominator - slopeNumerator * bounds.maxMultiplier;
  return { slopeNumerator, interceptNumerator, denominator };
}

export function getLockDurationForDiscount(
  multiplier: bigint,
  bounds: LockDurationBounds
): bigint {
  const line = lockDurationLine(bounds);
  return (
    absBigint(line.slopeNumerator * multiplier + line.interceptNumerator) /
    line.denominator
  );
}
