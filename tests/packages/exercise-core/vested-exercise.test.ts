// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/packages/exercise-core/vested-exercise`
 * Purpose: Linear and segmented vested exercise: payment, stream creation, partial delivery and schedule config.
 * Scope: Vested modules with the in-memory streaming service.
 * Invariants: The stream carries what the module holds; the shortfall is credited; streamId 0 means no stream.
 * Side-effects: none
 * @internal
 */

import {
  encodeMultiplierExerciseParams,
  InvalidMultiplierError,
  InvalidSegmentsError,
  InvalidStreamError,
  InvalidVestingScheduleError,
  type LinearVestedExercise,
  NotOwnerError,
  type SegmentedVestedExercise,
  SegmentsNotConfiguredError,
  WAD,
} from "@optex/exercise-core";
import {
  ADDR,
  createLinearVestedExercise,
  createSegmentedVestedExercise,
  createWorld,
  fundHolder,
  seedDefaultPool,
  type TestWorld,
} from "@tests/_fakes";
import type { Address } from "viem";
import { beforeEach, describe, expect, it } from "vitest";

let world: TestWorld;

function exercise(module: Address, amount: bigint, multiplier: bigint) {
  return world.gateway.exercise(ADDR.alice, {
    amount,
    recipient: ADDR.bob,
    module,
    params: encodeMultiplierExerciseParams({
      maxPaymentAmount: 1_000n * WAD,
      deadline: world.clock.now(),
      multiplier,
    }),
  });
}

beforeEach(() => {
  world = createWorld();
  seedDefaultPool(world);
});

describe("LinearVestedExercise", () => {
  let vested: LinearVestedExercise;

  beforeEach(() => {
    vested = createLinearVestedExercise(world);
    world.gateway.setExerciseContract(ADDR.owner, vested, true);
    fundHolder(world, ADDR.alice, 100n * WAD, 1_000n * WAD, [ADDR.vestedLinear]);
  });

  it("streams the exercised underlying behind a cliff", () => {
    world.ledger.mint(ADDR.underlyingToken, ADDR.vestedLinear, 10n * WAD);

    expect(exercise(ADDR.vestedLinear, 10n * WAD, 5000n)).toEqual({
      paymentAmount: 50n * WAD,
      data0: ADDR.streaming,
      data1: 1n,
      data2: 0n,
    });
    expect(world.ledger.balanceOf(ADDR.underlyingToken, ADDR.bob)).toBe(0n);

    world.clock.advance(99n);
    expect(world.streaming.streamedAmountOf(1n)).toBe(0n);
    world.clock.advance(1n);
    expect(world.streaming.streamedAmountOf(1n)).toBe(WAD);
    world.clock.advance(900n);
    expect(world.streaming.streamedAmountOf(1n)).toBe(10n * WAD);

    world.streaming.withdraw(ADDR.bob, 1n, ADDR.bob, 10n * WAD);
    expect(world.ledger.balanceOf(ADDR.underlyingToken, ADDR.bob)).toBe(
      10n * WAD
    );
  });

  it("streams what it holds and credits the rest", () => {
    world.ledger.mint(ADDR.underlyingToken, ADDR.vestedLinear, 4n * WAD);

    expect(exercise(ADDR.vestedLinear, 10n * WAD, 8000n)).toEqual({
      paymentAmount: 80n * WAD,
      data0: ADDR.streaming,
      data1: 1n,
      data2: 6n * WAD,
    });
    expect(world.streaming.getStream(1n).amount).toBe(4n * WAD);
    expect(vested.creditOf(ADDR.bob)).toBe(6n * WAD);
  });

  it("opens no stream when nothing is deliverable", () => {
    expect(exercise(ADDR.vestedLinear, 2n * WAD, 5000n)).toEqual({
      paymentAmount: 10n * WAD,
      data0: ADDR.streaming,
      data1: 0n,
      data2: 2n * WAD,
    });
    expect(() => world.streaming.getStream(1n)).toThrow(InvalidStreamError);
  });

  it("rejects a multiplier outside the range", () => {
    expect(() => exercise(ADDR.vestedLinear, WAD, 4999n)).toThrow(
      InvalidMultiplierError
    );
    expect(() => vested.getPaymentAmount(WAD, 8001n)).toThrow(
      InvalidMultiplierError
    );
  });

  it("lets the owner change the vesting schedule", () => {
    expect(() => vested.setVestingSchedule(ADDR.owner, 1001n, 1000n)).toThrow(
      InvalidVestingScheduleError
    );
    expect(() => vested.setVestingSchedule(ADDR.owner, 0n, 0n)).toThrow(
      InvalidVestingScheduleError
    );
    expect(() => vested.setVestingSchedule(ADDR.bob, 0n, 10n)).toThrow(
      NotOwnerError
    );

    vested.setVestingSchedule(ADDR.owner, 0n, 10n);
    expect(vested.vestingSchedule).toEqual({
      cliffDuration: 0n,
      totalDuration: 10n,
    });

    world.ledger.mint(ADDR.underlyingToken, ADDR.vestedLinear, 10n);
    exercise(ADDR.vestedLinear, 10n, 5000n);
    world.clock.advance(3n);
    expect(world.streaming.streamedAmountOf(1n)).toBe(3n);
  });
});

describe("SegmentedVestedExercise", () => {
  let vested: SegmentedVestedExercise;

  beforeEach(() => {
    vested = createSegmentedVestedExercise(world);
    world.gateway.setExerciseContract(ADDR.owner, vested, true);
    world.ledger.mint(ADDR.underlyingToken, ADDR.vestedSegmented, 10n * WAD);
    fundHolder(world, ADDR.alice, 100n * WAD, 1_000n * WAD, [
      ADDR.vestedSegmented,
    ]);
  });

  it("refuses to exercise before segments are configured", () => {
    expect(vested.segments).toEqual([]);
    expect(() => exercise(ADDR.vestedSegmented, WAD, 5000n)).toThrow(
      SegmentsNotConfiguredError
    );
    // checked before the multiplier
    expect(() => exercise(ADDR.vestedSegmented, WAD, 1n)).toThrow(
      SegmentsNotConfiguredError
    );
  });

  it("releases along the configured curve", () => {
    vested.setSegments(ADDR.owner, [WAD, 2n * WAD], [100n, 100n]);
    expect(vested.streamDuration).toBe(200n);

    expect(exercise(ADDR.vestedSegmented, 10n * WAD, 8000n)).toEqual({
      paymentAmount: 80n * WAD,
      data0: ADDR.streaming,
      data1: 1n,
      data2: 0n,
    });

    world.clock.advance(50n);
    expect(world.streaming.streamedAmountOf(1n)).toBe(25n * WAD / 10n);
    world.clock.advance(100n);
    expect(world.streaming.streamedAmountOf(1n)).toBe(625n * WAD / 100n);
    world.clock.advance(50n);
    expect(world.streaming.streamedAmountOf(1n)).toBe(10n * WAD);
  });

  it("validates segment updates and records them", () => {
    expect(() => vested.setSegments(ADDR.owner, [WAD], [100n, 100n])).toThrow(
      InvalidSegmentsError
    );
    expect(() => vested.setSegments(ADDR.bob, [WAD], [100n])).toThrow(
      NotOwnerError
    );

    vested.setSegments(ADDR.owner, [WAD], [100n]);
    expect(vested.segments).toEqual([{ exponent: WAD, duration: 100n }]);
    expect(world.events.ofType("config.changed").at(-1)).toEqual({
      type: "config.changed",
      contract: ADDR.vestedSegmented,
      setting: "segments",
      values: { exponents: [WAD.toString()], durations: ["100"] },
    });
  });
});
