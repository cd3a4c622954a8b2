// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/packages/exercise-core/locked-lp-exercise`
 * Purpose: Discount-for-lock exercise: payment, LP creation at the pool ratio and the locked LP stream.
 * Scope: LockedLpExercise with the in-memory router, pair and streaming service.
 * Invariants: Out-of-range multipliers fail with no state change; deeper discounts lock longer.
 * Side-effects: none
 * @internal
 */

import {
  encodeMultiplierExerciseParams,
  InsufficientBalanceError,
  InvalidLockDurationsError,
  InvalidMultiplierError,
  type LockedLpExercise,
  MultiplierOutOfRangeError,
  NotOwnerError,
  WAD,
} from "@optex/exercise-core";
import {
  ADDR,
  createLockedLpExercise,
  createWorld,
  fundHolder,
  seedPricedPool,
  type TestWorld,
} from "@tests/_fakes";
import { beforeEach, describe, expect, it } from "vitest";

const YEAR_LOCK = 31_449_600n;
const WEEK_LOCK = 604_800n;

let world: TestWorld;
let lockedLp: LockedLpExercise;

function exercise(amount: bigint, multiplier: bigint, maxPaymentAmount = 1_000n * WAD) {
  return world.gateway.exercise(ADDR.alice, {
    amount,
    recipient: ADDR.bob,
    module: ADDR.lockedLp,
    params: encodeMultiplierExerciseParams({
      maxPaymentAmount,
      deadline: world.clock.now(),
      multiplier,
    }),
  });
}

function state() {
  const { ledger, gateway, events } = world;
  return {
    options: gateway.balanceOf(ADDR.alice),
    payment: ledger.balanceOf(ADDR.paymentToken, ADDR.alice),
    moduleUnderlying: ledger.balanceOf(ADDR.underlyingToken, ADDR.lockedLp),
    lpSupply: world.pair.totalSupply(),
    reserves: world.pair.getReserves(),
    events: events.all().length,
  };
}

beforeEach(() => {
  world = createWorld();
  // 400 payment / 100 underlying: price 4e18, LP supply 200e18
  seedPricedPool(world, 400n * WAD, 100n * WAD);
  lockedLp = createLockedLpExercise(world);
  world.gateway.setExerciseContract(ADDR.owner, lockedLp, true);
  world.ledger.mint(ADDR.underlyingToken, ADDR.lockedLp, 50n * WAD);
  fundHolder(world, ADDR.alice, 50n * WAD, 1_000n * WAD, [ADDR.lockedLp]);
});

describe("LockedLpExercise", () => {
  it("pays the discounted price, adds liquidity and locks the LP for the recipient", () => {
    const result = exercise(10n * WAD, 5000n);

    expect(result).toEqual({
      paymentAmount: 20n * WAD,
      data0: ADDR.pair,
      data1: YEAR_LOCK,
      data2: 1n,
    });
    // fee leg 20e18 plus the 40e18 paired into the pool
    expect(world.ledger.balanceOf(ADDR.paymentToken, ADDR.alice)).toBe(
      940n * WAD
    );
    expect(world.ledger.balanceOf(ADDR.paymentToken, ADDR.treasury)).toBe(
      2n * WAD
    );
    expect(world.ledger.balanceOf(ADDR.paymentToken, ADDR.team)).toBe(
      18n * WAD
    );
    expect(world.pair.getReserves()).toMatchObject({
      reserve0: 440n * WAD,
      reserve1: 110n * WAD,
    });
    expect(world.pair.totalSupply()).toBe(220n * WAD);
    expect(world.ledger.balanceOf(ADDR.pair, ADDR.streaming)).toBe(20n * WAD);

    expect(world.streaming.getStream(1n)).toMatchObject({
      sender: ADDR.lockedLp,
      recipient: ADDR.bob,
      token: ADDR.pair,
      amount: 20n * WAD,
    });
  });

  it("keeps the LP locked until the lock duration has passed", () => {
    exercise(10n * WAD, 8000n, 100n * WAD);

    world.clock.advance(WEEK_LOCK - 1n);
    expect(world.streaming.streamedAmountOf(1n)).toBe(0n);

    world.clock.advance(2n);
    expect(world.streaming.streamedAmountOf(1n)).toBe(20n * WAD);
    world.streaming.withdraw(ADDR.bob, 1n, ADDR.bob, 20n * WAD);
    expect(world.ledger.balanceOf(ADDR.pair, ADDR.bob)).toBe(20n * WAD);
  });

  it("accepts both multiplier bounds", () => {
    expect(lockedLp.getPaymentAmount(10n * WAD, 5000n)).toBe(20n * WAD);
    expect(lockedLp.getPaymentAmount(10n * WAD, 8000n)).toBe(32n * WAD);
    expect(exercise(WAD, 8000n).data1).toBe(WEEK_LOCK);
    expect(exercise(WAD, 5000n).data1).toBe(YEAR_LOCK);
  });

  it("rejects a multiplier outside the range with no state change", () => {
    const before = state();
    expect(() => exercise(WAD, 4999n)).toThrow(InvalidMultiplierError);
    expect(() => exercise(WAD, 8001n)).toThrow(InvalidMultiplierError);
    expect(state()).toEqual(before);
  });

  it("rolls back payment and burn when the module lacks underlying", () => {
    world.ledger.burn(ADDR.underlyingToken, ADDR.lockedLp, 45n * WAD);
    const before = state();
    expect(() => exercise(10n * WAD, 5000n)).toThrow(InsufficientBalanceError);
    expect(state()).toEqual(before);
  });

  it("maps discount to lock duration linearly", () => {
    expect(lockedLp.getLockDurationForDiscount(6500n)).toBe(16_027_200n);
  });

  describe("owner configuration", () => {
    it("validates multiplier and lock duration ranges", () => {
      expect(() => lockedLp.setMultipliers(ADDR.owner, 8000n, 5000n)).toThrow(
        MultiplierOutOfRangeError
      );
      expect(() => lockedLp.setMultipliers(ADDR.owner, 5000n, 10_001n)).toThrow(
        MultiplierOutOfRangeError
      );
      expect(() =>
        lockedLp.setLockDurations(ADDR.owner, 2n, 1n)
      ).toThrow(InvalidLockDurationsError);

      lockedLp.setMultipliers(ADDR.owner, 4000n, 9000n);
      lockedLp.setLockDurations(ADDR.owner, 0n, 500n);
      expect(lockedLp.multipliers).toEqual({
        minMultiplier: 4000n,
        maxMultiplier: 9000n,
      });
      expect(lockedLp.getLockDurationForDiscount(4000n)).toBe(500n);
      expect(lockedLp.getLockDurationForDiscount(9000n)).toBe(0n);
    });

    it("is owner-only", () => {
      expect(() => lockedLp.setMultipliers(ADDR.bob, 1n, 2n)).toThrow(
        NotOwnerError
      );
      expect(() => lockedLp.setLockDurations(ADDR.bob, 1n, 2n)).toThrow(
        NotOwnerError
      );
    });
  });
});
