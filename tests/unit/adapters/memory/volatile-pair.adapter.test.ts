// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/memory/volatile-pair`
 * Purpose: Verifies LP minting, constant-product swaps, cumulative reserves and observation spacing of the in-memory pair.
 * Scope: VolatilePair through the test world; oracle math is covered elsewhere.
 * Side-effects: none
 * Links: src/adapters/memory/volatile-pair.adapter.ts
 * @public
 */

import { InsufficientLiquidityError, WAD } from "@optex/exercise-core";
import { ADDR, createWorld, seedPool, type TestWorld } from "@tests/_fakes";
import { zeroAddress } from "viem";
import { beforeEach, describe, expect, it } from "vitest";

import { MINIMUM_LIQUIDITY, PERIOD_SIZE, sqrt } from "@/adapters/memory";

let world: TestWorld;
let t0: bigint;

beforeEach(() => {
  world = createWorld();
  t0 = world.clock.now();
});

describe("VolatilePair", () => {
  it("orders tokens and reports itself volatile", () => {
    expect(world.pair.token0()).toBe(ADDR.paymentToken);
    expect(world.pair.token1()).toBe(ADDR.underlyingToken);
    expect(world.pair.stable()).toBe(false);
  });

  describe("mint", () => {
    it("burns MINIMUM_LIQUIDITY on the first deposit", () => {
      const minted = seedPool(world, 400n * WAD, 100n * WAD);
      expect(minted).toBe(200n * WAD - MINIMUM_LIQUIDITY);
      expect(world.ledger.balanceOf(ADDR.pair, zeroAddress)).toBe(1000n);
      expect(world.pair.totalSupply()).toBe(200n * WAD);
      expect(world.pair.getReserves()).toEqual({
        reserve0: 400n * WAD,
        reserve1: 100n * WAD,
        blockTimestampLast: t0,
      });
    });

    it("mints pro rata afterwards, taking the smaller side", () => {
      seedPool(world, 400n * WAD, 100n * WAD);
      world.ledger.mint(ADDR.paymentToken, ADDR.pair, 40n * WAD);
      world.ledger.mint(ADDR.underlyingToken, ADDR.pair, 20n * WAD);
      expect(world.pair.mint(ADDR.bob)).toBe(20n * WAD);
      expect(world.ledger.balanceOf(ADDR.pair, ADDR.bob)).toBe(20n * WAD);
    });

    it("fails when nothing was deposited", () => {
      seedPool(world, 400n * WAD, 100n * WAD);
      expect(() => world.pair.mint(ADDR.bob)).toThrow(
        InsufficientLiquidityError
      );
    });
  });

  describe("swap", () => {
    beforeEach(() => {
      seedPool(world, 400n * WAD, 100n * WAD);
      world.ledger.mint(ADDR.underlyingToken, ADDR.trader, 10n * WAD);
    });

    it("pays out after the 0.3% input fee", () => {
      const expected = 36_264_435_755_205_965_263n;
      expect(world.pair.getAmountOut(10n * WAD, ADDR.underlyingToken)).toBe(
        expected
      );
      expect(
        world.pair.swapExactIn(ADDR.trader, ADDR.underlyingToken, 10n * WAD, ADDR.trader)
      ).toBe(expected);
      expect(world.ledger.balanceOf(ADDR.paymentToken, ADDR.trader)).toBe(
        expected
      );
      expect(world.pair.getReserves()).toMatchObject({
        reserve0: 400n * WAD - expected,
        reserve1: 110n * WAD,
      });
    });

    it("rejects an output that breaks the invariant and rolls back", () => {
      world.ledger.transfer(ADDR.underlyingToken, ADDR.trader, ADDR.pair, 1n);
      expect(() => world.pair.swap(WAD, 0n, ADDR.trader)).toThrow(
        InsufficientLiquidityError
      );
      expect(world.ledger.balanceOf(ADDR.paymentToken, ADDR.trader)).toBe(0n);
      expect(world.pair.getReserves().reserve0).toBe(400n * WAD);
    });

    it("rejects outputs at or above the reserves", () => {
      expect(() => world.pair.swap(400n * WAD, 0n, ADDR.trader)).toThrow(
        InsufficientLiquidityError
      );
      expect(() => world.pair.swap(0n, 0n, ADDR.trader)).toThrow(
        InsufficientLiquidityError
      );
    });
  });

  describe("accumulators", () => {
    beforeEach(() => {
      seedPool(world, 400n * WAD, 100n * WAD);
    });

    it("projects cumulatives to now without writing state", () => {
      world.clock.advance(100n);
      expect(world.pair.currentCumulativePrices()).toEqual({
        reserve0Cumulative: 400n * WAD * 100n,
        reserve1Cumulative: 100n * WAD * 100n,
        blockTimestamp: t0 + 100n,
      });
      expect(world.pair.getReserves().blockTimestampLast).toBe(t0);
    });

    it("records an observation only after more than a period", () => {
      expect(world.pair.observationLength()).toBe(1);

      world.clock.advance(PERIOD_SIZE);
      world.pair.sync();
      expect(world.pair.observationLength()).toBe(1);

      world.clock.advance(1n);
      world.pair.sync();
      expect(world.pair.observationLength()).toBe(2);
      expect(world.pair.lastObservation()).toEqual({
        timestamp: t0 + 1801n,
        reserve0Cumulative: 400n * WAD * 1801n,
        reserve1Cumulative: 100n * WAD * 1801n,
      });
      expect(() => world.pair.observations(2)).toThrow(RangeError);
    });
  });
});

describe("sqrt", () => {
  it.each([
    [0n, 0n],
    [1n, 1n],
    [15n, 3n],
    [16n, 4n],
    [10n ** 36n, 10n ** 18n],
  ])("sqrt(%s) = %s", (value, root) => {
    expect(sqrt(value)).toBe(root);
  });

  it("rejects negatives", () => {
    expect(() => sqrt(-1n)).toThrow(RangeError);
  });
});
