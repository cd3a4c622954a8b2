// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@optex/exercise-core/exercise/discount-exercise`
 * Purpose: Immediate delivery of underlying at a fixed multiple of the oracle price.
 * Scope: Discount pricing and owner config. Delivery and credit come from CreditedExercise.
 * Invariants:
 * - Multiplier stays in [1000, 20000] bps (10%..200% of oracle price).
 * - Result: data0 = zero address, data1 = delivered, data2 = credited.
 * Side-effects: IO (payment pull, underlying transfer, events)
 * @public
 */

import { type Address, zeroAddress } from "viem";

import { MultiplierOutOfRangeError } from "../errors";
import { JournaledValue } from "../journal";
import type { ExerciseRequest, ExerciseResult } from "../model";
import type { Oracle } from "../oracle/oracle";
import { decodeDiscountExerciseParams } from "../params";
import type { BaseExerciseConfig } from "./base-exercise";
import { CreditedExercise } from "./credited-exercise";
import { OracleSlot, paymentForMultiplier } from "./pricing";

export const MIN_DISCOUNT_MULTIPLIER = 1_000n;
export const MAX_DISCOUNT_MULTIPLIER = 20_000n;

export interface DiscountExerciseConfig extends BaseExerciseConfig {
  readonly oracle: Oracle;
  /** Basis points of the oracle price the holder pays */
  readonly multiplier: bigint;
}

export class DiscountExercise extends CreditedExercise {
  readonly kind = "discount" as const;

  private readonly oracleSlot: OracleSlot;
  private readonly multiplierSlot: JournaledValue<bigint>;

  constructor(config: DiscountExerciseConfig) {
    super(config);
    assertDiscountMultiplier(config.multiplier);
    this.oracleSlot = new OracleSlot(config.journal, this.tokens, config.oracle);
    this.multiplierSlot = new JournaledValue(config.journal, config.multiplier);
  }

  get oracle(): Oracle {
    return this.oracleSlot.get();
  }

  get multiplier(): bigint {
    return this.multiplierSlot.get();
  }

  getPaymentAmount(amount: bigint): bigint {
    return paymentForMultiplier(amount, this.oracle.getPrice(), this.multiplier);
  }

  setOracle(caller: Address, oracle: Oracle): void {
    this.configure(caller, "oracle", { oracle: oracle.address }, () => {
      this.oracleSlot.set(oracle);
    });
  }

  setMultiplier(caller: Address, multiplier: bigint): void {
    this.configure(caller, "multiplier", { multiplier }, () => {
      assertDiscountMultiplier(multiplier);
      this.multiplierSlot.set(multiplier);
    });
  }

  protected settle(request: ExerciseRequest): ExerciseResult {
    const params = decodeDiscountExerciseParams(request.params);
    this.requireBeforeDeadline(params.deadline);

    const paymentAmount = this.getPaymentAmount(request.amount);
    this.collectPayment(request.from, paymentAmount, params.maxPaymentAmount);

    const { deliverable, credited } = this.deliverNow(
      request.recipient,
      request.amount
    );
    return {
      paymentAmount,
      data0: zeroAddress,
      data1: deliverable,
      data2: credited,
    };
  }
}

function assertDiscountMultiplier(multiplier: bigint): void {
  if (
    multiplier < MIN_DISCOUNT_MULTIPLIER ||
    multiplier > MAX_DISCOUNT_MULTIPLIER
  ) {
    throw new MultiplierOutOfRangeError("multiplier", multiplier);
  }
}
