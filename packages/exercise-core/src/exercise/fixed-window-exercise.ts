// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@optex/exercise-core/exercise/fixed-window-exercise`
 * Purpose: Immediate delivery at an owner-fixed strike price, only inside [startTime, endTime].
 * Scope: Window and fixed price; no oracle. Delivery and credit come from CreditedExercise.
 * Invariants:
 * - startTime < endTime; both bounds are inclusive.
 * - price > 0.
 * Side-effects: IO (payment pull, underlying transfer, events)
 * @public
 */

import { type Address, zeroAddress } from "viem";

import {
  ExerciseWindowClosedError,
  ExerciseWindowNotOpenError,
  InvalidExerciseWindowError,
  MultiplierOutOfRangeError,
} from "../errors";
import { JournaledValue } from "../journal";
import { mulWadUp } from "../math";
import type { ExerciseRequest, ExerciseResult } from "../model";
import { decodeDiscountExerciseParams } from "../params";
import type { BaseExerciseConfig } from "./base-exercise";
import { CreditedExercise } from "./credited-exercise";

export interface ExerciseWindow {
  readonly startTime: bigint;
  readonly endTime: bigint;
}

export interface FixedWindowExerciseConfig extends BaseExerciseConfig {
  /** 18-decimal payment tokens per underlying token */
  readonly price: bigint;
  readonly startTime: bigint;
  readonly endTime: bigint;
}

export class FixedWindowExercise extends CreditedExercise {
  readonly kind = "fixed-window" as const;

  private readonly priceSlot: JournaledValue<bigint>;
  private readonly windowSlot: JournaledValue<ExerciseWindow>;

  constructor(config: FixedWindowExerciseConfig) {
    super(config);
    assertPrice(config.price);
    const window = { startTime: config.startTime, endTime: config.endTime };
    this.assertWindow(window);
    this.priceSlot = new JournaledValue(config.journal, config.price);
    this.windowSlot = new JournaledValue(config.journal, window);
  }

  get price(): bigint {
    return this.priceSlot.get();
  }

  get window(): ExerciseWindow {
    return this.windowSlot.get();
  }

  getPaymentAmount(amount: bigint): bigint {
    return mulWadUp(amount, this.price);
  }

  setPrice(caller: Address, price: bigint): void {
    this.configure(caller, "price", { price }, () => {
      assertPrice(price);
      this.priceSlot.set(price);
    });
  }

  setTimes(caller: Address, startTime: bigint, endTime: bigint): void {
    this.configure(caller, "times", { startTime, endTime }, () => {
      const window = { startTime, endTime };
      this.assertWindow(window);
      this.windowSlot.set(window);
    });
  }

  protected settle(request: ExerciseRequest): ExerciseResult {
    const params = decodeDiscountExerciseParams(request.params);
    this.requireBeforeDeadline(params.deadline);

    const now = this.clock.now();
    const { startTime, endTime } = this.window;
    if (now < startTime) {
      throw new ExerciseWindowNotOpenError(startTime, now);
    }
    if (now > endTime) {
      throw new ExerciseWindowClosedError(endTime, now);
    }

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

  private assertWindow(window: ExerciseWindow): void {
    const now = this.clock.now();
    if (window.startTime < now || window.endTime <= window.startTime) {
      throw new InvalidExerciseWindowError(
        window.startTime,
        window.endTime,
        now
      );
    }
  }
}

function assertPrice(price: bigint): void {
  if (price <= 0n) {
    throw new MultiplierOutOfRangeError("price", price);
  }
}
