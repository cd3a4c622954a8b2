// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/packages/exercise-core/options-token`
 * Purpose: Gateway behaviour: admin mint, module allow-list, burn-on-exercise, atomic rollback and reentrancy.
 * Scope: OptionsToken with a discount module and the in-memory ledger.
 * Invariants: totalSupply equals the sum of balances; a failed module call restores the burn.
 * Side-effects: none
 * @internal
 */

import {
  type DiscountExercise,
  encodeDiscountExerciseParams,
  InsufficientBalanceError,
  NotActiveModuleError,
  NotOwnerError,
  NotTokenAdminError,
  ReentrantCallError,
  SlippageTooHighError,
  type TokenLedger,
  WAD,
} from "@optex/exercise-core";
import {
  ADDR,
  createDiscountExercise,
  createWorld,
  fundHolder,
  seedDefaultPool,
  type TestWorld,
} from "@tests/_fakes";
import type { Address } from "viem";
import { beforeEach, describe, expect, it } from "vitest";

let world: TestWorld;
let discount: DiscountExercise;

function exerciseInput(amount: bigint) {
  return {
    amount,
    recipient: ADDR.alice,
    module: ADDR.discount,
    params: encodeDiscountExerciseParams({
      maxPaymentAmount: 1_000n * WAD,
      deadline: world.clock.now(),
    }),
  };
}

beforeEach(() => {
  world = createWorld();
  seedDefaultPool(world);
  discount = createDiscountExercise(world);
  world.gateway.setExerciseContract(ADDR.owner, discount, true);
  world.ledger.mint(ADDR.underlyingToken, ADDR.discount, 100n * WAD);
});

describe("OptionsToken", () => {
  it("exposes its metadata", () => {
    expect(world.gateway.name).toBe("Test Options");
    expect(world.gateway.symbol).toBe("oTEST");
    expect(world.gateway.owner).toBe(ADDR.owner);
    expect(world.gateway.tokenAdmin).toBe(ADDR.tokenAdmin);
  });

  describe("mint", () => {
    it("lets only the token admin mint", () => {
      world.gateway.mint(ADDR.tokenAdmin, ADDR.alice, 5n);
      expect(world.gateway.balanceOf(ADDR.alice)).toBe(5n);
      expect(world.gateway.totalSupply()).toBe(5n);
      expect(world.events.ofType("gateway.minted")).toEqual([
        { type: "gateway.minted", to: ADDR.alice, amount: 5n },
      ]);

      expect(() => world.gateway.mint(ADDR.owner, ADDR.alice, 5n)).toThrow(
        NotTokenAdminError
      );
      expect(world.gateway.totalSupply()).toBe(5n);
    });
  });

  describe("transfer", () => {
    it("moves options between holders without changing supply", () => {
      world.gateway.mint(ADDR.tokenAdmin, ADDR.alice, 10n);
      world.gateway.transfer(ADDR.alice, ADDR.bob, 4n);
      expect(world.gateway.balanceOf(ADDR.alice)).toBe(6n);
      expect(world.gateway.balanceOf(ADDR.bob)).toBe(4n);
      expect(world.gateway.totalSupply()).toBe(10n);
      expect(() => world.gateway.transfer(ADDR.bob, ADDR.alice, 5n)).toThrow(
        InsufficientBalanceError
      );
    });
  });

  describe("allow-list", () => {
    it("is owner-managed and event-logged", () => {
      expect(world.gateway.isExerciseContract(ADDR.discount)).toBe(true);
      expect(() =>
        world.gateway.setExerciseContract(ADDR.alice, discount, false)
      ).toThrow(NotOwnerError);

      world.gateway.setExerciseContract(ADDR.owner, discount, false);
      expect(world.gateway.isExerciseContract(ADDR.discount)).toBe(false);
      expect(world.events.ofType("gateway.exercise_contract_set")).toEqual([
        {
          type: "gateway.exercise_contract_set",
          module: ADDR.discount,
          isActive: true,
        },
        {
          type: "gateway.exercise_contract_set",
          module: ADDR.discount,
          isActive: false,
        },
      ]);
    });

    it("refuses unknown modules", () => {
      fundHolder(world, ADDR.alice, WAD, 100n * WAD, [ADDR.discount]);
      expect(() =>
        world.gateway.exercise(ADDR.alice, {
          ...exerciseInput(WAD),
          module: ADDR.stranger,
        })
      ).toThrow(NotActiveModuleError);
    });
  });

  describe("exercise", () => {
    beforeEach(() => {
      fundHolder(world, ADDR.alice, 10n * WAD, 100n * WAD, [ADDR.discount]);
    });

    it("burns the exercised options and records the settlement", () => {
      const result = world.gateway.exercise(ADDR.alice, exerciseInput(3n * WAD));

      expect(world.gateway.balanceOf(ADDR.alice)).toBe(7n * WAD);
      expect(world.gateway.totalSupply()).toBe(7n * WAD);
      expect(world.events.ofType("gateway.exercised")).toEqual([
        {
          type: "gateway.exercised",
          sender: ADDR.alice,
          recipient: ADDR.alice,
          module: ADDR.discount,
          amount: 3n * WAD,
          data0: result.data0,
          data1: 3n * WAD,
          data2: 0n,
        },
      ]);
    });

    it("rejects exercising more than the caller holds", () => {
      expect(() =>
        world.gateway.exercise(ADDR.alice, exerciseInput(11n * WAD))
      ).toThrow(InsufficientBalanceError);
    });

    it("restores the burn when the module fails", () => {
      const eventsBefore = world.events.all().length;
      expect(() =>
        world.gateway.exercise(ADDR.alice, {
          ...exerciseInput(WAD),
          params: encodeDiscountExerciseParams({
            maxPaymentAmount: WAD,
            deadline: world.clock.now(),
          }),
        })
      ).toThrow(SlippageTooHighError);
      expect(world.gateway.balanceOf(ADDR.alice)).toBe(10n * WAD);
      expect(world.gateway.totalSupply()).toBe(10n * WAD);
      expect(world.events.all()).toHaveLength(eventsBefore);
    });
  });

  describe("reentrancy", () => {
    class ReenteringLedger implements TokenLedger {
      onTransferFrom: (() => void) | undefined;

      constructor(private readonly inner: TokenLedger) {}

      balanceOf(token: Address, account: Address): bigint {
        return this.inner.balanceOf(token, account);
      }

      allowance(token: Address, owner: Address, spender: Address): bigint {
        return this.inner.allowance(token, owner, spender);
      }

      approve(token: Address, owner: Address, spender: Address, amount: bigint) {
        this.inner.approve(token, owner, spender, amount);
      }

      transfer(token: Address, from: Address, to: Address, amount: bigint) {
        this.inner.transfer(token, from, to, amount);
      }

      transferFrom(
        token: Address,
        spender: Address,
        from: Address,
        to: Address,
        amount: bigint
      ) {
        const hook = this.onTransferFrom;
        this.onTransferFrom = undefined;
        hook?.();
        this.inner.transferFrom(token, spender, from, to, amount);
      }
    }

    let ledger: ReenteringLedger;
    let module: DiscountExercise;

    beforeEach(() => {
      world.gateway.setExerciseContract(ADDR.owner, discount, false);
      ledger = new ReenteringLedger(world.ledger);
      module = createDiscountExercise(world, { ledger });
      world.gateway.setExerciseContract(ADDR.owner, module, true);
      fundHolder(world, ADDR.alice, 10n * WAD, 100n * WAD, [ADDR.discount]);
    });

    it("blocks a nested gateway exercise and rolls everything back", () => {
      ledger.onTransferFrom = () => {
        world.gateway.exercise(ADDR.alice, exerciseInput(WAD));
      };
      expect(() =>
        world.gateway.exercise(ADDR.alice, exerciseInput(WAD))
      ).toThrow(ReentrantCallError);
      expect(world.gateway.balanceOf(ADDR.alice)).toBe(10n * WAD);
      expect(world.ledger.balanceOf(ADDR.paymentToken, ADDR.alice)).toBe(
        100n * WAD
      );
    });

    it("blocks a nested claim on the settling module", () => {
      ledger.onTransferFrom = () => {
        module.claim(ADDR.alice, ADDR.alice);
      };
      expect(() =>
        world.gateway.exercise(ADDR.alice, exerciseInput(WAD))
      ).toThrow(ReentrantCallError);
    });

    it("releases the lock after a failed call", () => {
      ledger.onTransferFrom = () => {
        world.gateway.exercise(ADDR.alice, exerciseInput(WAD));
      };
      expect(() =>
        world.gateway.exercise(ADDR.alice, exerciseInput(WAD))
      ).toThrow(ReentrantCallError);
      expect(world.gateway.exercise(ADDR.alice, exerciseInput(WAD)).data1).toBe(
        WAD
      );
    });
  });
});
