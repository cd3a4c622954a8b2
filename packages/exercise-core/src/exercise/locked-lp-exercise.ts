// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@optex/exercise-core/exercise/locked-lp-exercise`
 * Purpose: Pair the exercised underlying with payment tokens as AMM liquidity and lock the LP tokens for the recipient.
 * Scope: Discount-for-lock pricing, LP creation through LiquidityRouter and the lock stream through StreamingService.
 * Invariants:
 * - A lower multiplier (deeper discount) locks longer; see getLockDurationForDiscount.
 * - The LP stream has cliff = lockDuration and total = lockDuration + 1, so nothing unlocks before the cliff.
 * - Result: data0 = LP token, data1 = lockDuration, data2 = streamId.
 * Side-effects: IO (payment pull, liquidity add, stream creation, events)
 * Notes: The payment leg added to the pool is pulled on top of paymentAmount and is not covered by maxPaymentAmount.
 *   Tokens the router leaves unused stay with the module.
 * @public
 */

import type { Address } from "viem";

import {
  InsufficientLiquidityError,
  InvalidLockDurationsError,
} from "../errors";
import { JournaledValue } from "../journal";
import {
  getLockDurationForDiscount,
  type LockDurationBounds,
} from "../lock-duration";
import { mulDivDown } from "../math";
import type { ExerciseRequest, ExerciseResult } from "../model";
import type { Oracle } from "../oracle/oracle";
import { decodeMultiplierExerciseParams } from "../params";
import type { LiquidityRouter, StreamingService } from "../ports";
import type { BaseExerciseConfig } from "./base-exercise";
import { BaseExercise } from "./base-exercise";
import {
  MultiplierBounds,
  type MultiplierRange,
  OracleSlot,
  paymentForMultiplier,
} from "./pricing";

export interface LockDurationRange {
  /** Seconds */
  readonly minLockDuration: bigint;
  /** Seconds */
  readonly maxLockDuration: bigint;
}

export interface LockedLpExerciseConfig
  extends BaseExerciseConfig,
    MultiplierRange,
    LockDurationRange {
  readonly oracle: Oracle;
  readonly router: LiquidityRouter;
  readonly streaming: StreamingService;
}

export class LockedLpExercise extends BaseExercise {
  readonly kind = "locked-lp" as const;

  readonly router: LiquidityRouter;
  readonly streaming: StreamingService;

  private readonly oracleSlot: OracleSlot;
  private readonly bounds: MultiplierBounds;
  private readonly lockSlot: JournaledValue<LockDurationRange>;

  constructor(config: LockedLpExerciseConfig) {
    super(config);
    this.router = config.router;
    this.streaming = config.streaming;
    this.oracleSlot = new OracleSlot(config.journal, this.tokens, config.oracle);
    this.bounds = new MultiplierBounds(config.journal, {
      minMultiplier: config.minMultiplier,
      maxMultiplier: config.maxMultiplier,
    });
    const lock = {
      minLockDuration: config.minLockDuration,
      maxLockDuration: config.maxLockDuration,
    };
    assertLockDurations(lock);
    this.lockSlot = new JournaledValue(config.journal, lock);
  }

  get oracle(): Oracle {
    return this.oracleSlot.get();
  }

  get multipliers(): MultiplierRange {
    return this.bounds.range;
  }

  get lockDurations(): LockDurationRange {
    return this.lockSlot.get();
  }

  /** Address of the LP token minted by exercises */
  get lpToken(): Address {
    return this.router.pairFor(this.underlyingToken, this.paymentToken, false);
  }

  getLockDurationForDiscount(multiplier: bigint): bigint {
    return getLockDurationForDiscount(multiplier, this.lockBounds());
  }

  getPaymentAmount(amount: bigint, multiplier: bigint): bigint {
    this.bounds.assertWithin(multiplier);
    return paymentForMultiplier(amount, this.oracle.getPrice(), multiplier);
  }

  setOracle(caller: Address, oracle: Oracle): void {
    this.configure(caller, "oracle", { oracle: oracle.address }, () => {
      this.oracleSlot.set(oracle);
    });
  }

  setMultipliers(
    caller: Address,
    minMultiplier: bigint,
    maxMultiplier: bigint
  ): void {
    this.configure(
      caller,
      "multipliers",
      { minMultiplier, maxMultiplier },
      () => {
        this.bounds.set({ minMultiplier, maxMultiplier });
      }
    );
  }

  setLockDurations(
    caller: Address,
    minLockDuration: bigint,
    maxLockDuration: bigint
  ): void {
    this.configure(
      caller,
      "lock_durations",
      { minLockDuration, maxLockDuration },
      () => {
        const lock = { minLockDuration, maxLockDuration };
        assertLockDurations(lock);
        this.lockSlot.set(lock);
      }
    );
  }

  protected settle(request: ExerciseRequest): ExerciseResult {
    const params = decodeMultiplierExerciseParams(request.params);
    this.requireBeforeDeadline(params.deadline);

    const paymentAmount = this.getPaymentAmount(
      request.amount,
      params.multiplier
    );
    this.collectPayment(request.from, paymentAmount, params.maxPaymentAmount);

    const { reserveA: underlyingReserve, reserveB: paymentReserve } =
      this.router.getReserves(this.underlyingToken, this.paymentToken, false);
    if (underlyingReserve === 0n) {
      throw new InsufficientLiquidityError("pool has no underlying reserve");
    }
    const paymentAmountToAdd = mulDivDown(
      request.amount,
      paymentReserve,
      underlyingReserve
    );
    this.ledger.transferFrom(
      this.paymentToken,
      this.address,
      request.from,
      this.address,
      paymentAmountToAdd
    );

    this.ledger.approve(
      this.underlyingToken,
      this.address,
      this.router.address,
      request.amount
    );
    this.ledger.approve(
      this.paymentToken,
      this.address,
      this.router.address,
      paymentAmountToAdd
    );
    const { liquidity } = this.router.addLiquidity(this.address, {
      tokenA: this.underlyingToken,
      tokenB: this.paymentToken,
      stable: false,
      amountADesired: request.amount,
      amountBDesired: paymentAmountToAdd,
      amountAMin: 1n,
      amountBMin: 1n,
      to: this.address,
      deadline: params.deadline,
    });

    const lockDuration = this.getLockDurationForDiscount(params.multiplier);
    const lpToken = this.lpToken;
    this.ledger.approve(
      lpToken,
      this.address,
      this.streaming.address,
      liquidity
    );
    const streamId = this.streaming.createLinearStream(this.address, {
      recipient: request.recipient,
      token: lpToken,
      amount: liquidity,
      cliffDuration: lockDuration,
      totalDuration: lockDuration + 1n,
    });

    return {
      paymentAmount,
      data0: lpToken,
      data1: lockDuration,
      data2: streamId,
    };
  }

  private lockBounds(): LockDurationBounds {
    return { ...this.bounds.range, ...this.lockSlot.get() };
  }
}

function assertLockDurations(lock: LockDurationRange): void {
  if (
    lock.minLockDuration < 0n ||
    lock.minLockDuration > lock.maxLockDuration
  ) {
    throw new InvalidLockDurationsError(
      lock.minLockDuration,
      lock.maxLockDuration
    );
  }
}
