// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@optex/exercise-core/segments`
 * Purpose: Build and validate piecewise release schedules for segmented vesting streams.
 * Scope: Pure functions.
 * Invariants: Segment amounts are amount / n each with the integer remainder on the last segment; they sum to `amount` exactly.
 * Side-effects: none
 * @public
 */

import { InvalidSegmentsError, SegmentsNotConfiguredError } from "./errors";
import type { SegmentConfig, StreamSegment } from "./model";

export function toSegmentSchedule(
  exponents: readonly bigint[],
  durations: readonly bigint[]
): SegmentConfig[] {
  if (exponents.length !== durations.length) {
    throw new InvalidSegmentsError(
      `${exponents.length} exponents but ${durations.length} durations`
    );
  }
  if (exponents.length === 0) {
    throw new InvalidSegmentsError("at least one segment is required");
  }
  return exponents.map((exponent, i) => {
    const duration = durations[i] ?? 0n;
    if (duration <= 0n) {
      throw new InvalidSegmentsError(`segment ${i} has non-positive duration`);
    }
    if (exponent < 0n) {
      throw new InvalidSegmentsError(`segment ${i} has a negative exponent`);
    }
    return { exponent, duration };
  });
}

export function constructSegments(
  amount: bigint,
  schedule: readonly SegmentConfig[]
): StreamSegment[] {
  if (schedule.length === 0) {
    throw new SegmentsNotConfiguredError();
  }
  const count = BigInt(schedule.length);
  const perSegment = amount / count;
  const remainder = amount - perSegment * count;
  const last = schedule.length - 1;

  return schedule.map((segment, i) => ({
    amount: i === last ? perSegment + remainder : perSegment,
    exponent: segment.exponent,
    duration: segment.duration,
  }));
}

export function totalSegmentDuration(schedule: readonly SegmentConfig[]): bigint {
  return schedule.reduce((sum, segment) => sum + segment.duration, 0n);
}
