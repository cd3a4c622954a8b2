// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@optex/exercise-core/tests/fees`
 * Purpose: Fee schedule validation and share computation, including where rounding dust lands.
 * Scope: Pure functions; transfers are covered with the in-memory ledger in tests/packages.
 * Side-effects: none
 * @internal
 */

import { type Address, getAddress } from "viem";
import { describe, expect, it } from "vitest";

import {
  FeeArrayLengthMismatchError,
  InvalidFeeScheduleError,
} from "../src/errors";
import { feeScheduleTotalBps, splitFees, toFeeSchedule } from "../src/fees";
import { WAD } from "../src/math";

const A: Address = getAddress("0x000000000000000000000000000000000000000a");
const B: Address = getAddress("0x000000000000000000000000000000000000000b");
const C: Address = getAddress("0x000000000000000000000000000000000000000c");

describe("toFeeSchedule", () => {
  it("accepts weights that total 10000 or less", () => {
    expect(toFeeSchedule([A, B], [1000n, 9000n])).toEqual({
      recipients: [A, B],
      bps: [1000n, 9000n],
    });
    expect(feeScheduleTotalBps(toFeeSchedule([A], [2500n]))).toBe(2500n);
  });

  it("rejects arrays of different lengths", () => {
    expect(() => toFeeSchedule([A, B], [10_000n])).toThrow(
      FeeArrayLengthMismatchError
    );
  });

  it("rejects an empty schedule", () => {
    expect(() => toFeeSchedule([], [])).toThrow(InvalidFeeScheduleError);
  });

  it("rejects weights above 10000 in total or individually", () => {
    expect(() => toFeeSchedule([A, B], [5000n, 5001n])).toThrow(
      InvalidFeeScheduleError
    );
    expect(() => toFeeSchedule([A], [10_001n])).toThrow(InvalidFeeScheduleError);
    expect(() => toFeeSchedule([A], [-1n])).toThrow(InvalidFeeScheduleError);
  });
});

describe("splitFees", () => {
  it("splits 10% / 90% exactly", () => {
    const shares = splitFees(75_000n * WAD, toFeeSchedule([A, B], [1000n, 9000n]));
    expect(shares).toEqual([
      { recipient: A, amount: 7_500n * WAD },
      { recipient: B, amount: 67_500n * WAD },
    ]);
  });

  it("gives rounding dust to the last recipient when weights total 10000", () => {
    const shares = splitFees(
      101n,
      toFeeSchedule([A, B, C], [3333n, 3333n, 3334n])
    );
    expect(shares.map((s) => s.amount)).toEqual([33n, 33n, 35n]);
    expect(shares.reduce((sum, s) => sum + s.amount, 0n)).toBe(101n);
  });

  it("leaves the remainder unpulled when weights total less than 10000", () => {
    const shares = splitFees(101n, toFeeSchedule([A], [5000n]));
    expect(shares).toEqual([{ recipient: A, amount: 50n }]);
  });

  it("returns zero shares for a zero payment", () => {
    const shares = splitFees(0n, toFeeSchedule([A, B], [1000n, 9000n]));
    expect(shares.map((s) => s.amount)).toEqual([0n, 0n]);
  });
});
