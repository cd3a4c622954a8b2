// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@optex/exercise-core/exercise/vested-exercise`
 * Purpose: Deliver exercised underlying as a vesting stream instead of an immediate transfer.
 * Scope: Shared vested pipeline plus the linear (cliff) and segmented (curve) variants.
 * Invariants:
 * - The stream carries min(amount, module balance); the shortfall is credited to the recipient.
 * - No stream is created when nothing is deliverable; data1 is then 0.
 * - Result: data0 = streaming service, data1 = streamId, data2 = credited.
 * Side-effects: IO (payment pull, stream creation, events)
 * @public
 */

import type { Address } from "viem";

import {
  InvalidVestingScheduleError,
  SegmentsNotConfiguredError,
} from "../errors";
import { JournaledValue } from "../journal";
import type { ExerciseRequest, ExerciseResult, SegmentConfig } from "../model";
import type { Oracle } from "../oracle/oracle";
import { decodeMultiplierExerciseParams } from "../params";
import type { StreamingService } from "../ports";
import {
  constructSegments,
  toSegmentSchedule,
  totalSegmentDuration,
} from "../segments";
import type { BaseExerciseConfig } from "./base-exercise";
import { CreditedExercise } from "./credited-exercise";
import {
  MultiplierBounds,
  type MultiplierRange,
  OracleSlot,
  paymentForMultiplier,
} from "./pricing";

export interface VestedExerciseConfig extends BaseExerciseConfig, MultiplierRange {
  readonly oracle: Oracle;
  readonly streaming: StreamingService;
}

export abstract class VestedExercise extends CreditedExercise {
  readonly streaming: StreamingService;

  private readonly oracleSlot: OracleSlot;
  private readonly bounds: MultiplierBounds;

  protected constructor(config: VestedExerciseConfig) {
    super(config);
    this.streaming = config.streaming;
    this.oracleSlot = new OracleSlot(config.journal, this.tokens, config.oracle);
    this.bounds = new MultiplierBounds(config.journal, {
      minMultiplier: config.minMultiplier,
      maxMultiplier: config.maxMultiplier,
    });
  }

  get oracle(): Oracle {
    return this.oracleSlot.get();
  }

  get multipliers(): MultiplierRange {
    return this.bounds.range;
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

  protected settle(request: ExerciseRequest): ExerciseResult {
    const params = decodeMultiplierExerciseParams(request.params);
    this.requireBeforeDeadline(params.deadline);
    this.assertStreamConfigured();

    const paymentAmount = this.getPaymentAmount(
      request.amount,
      params.multiplier
    );
    this.collectPayment(request.from, paymentAmount, params.maxPaymentAmount);

    const { deliverable, credited } = this.splitDelivery(
      request.recipient,
      request.amount
    );
    let streamId = 0n;
    if (deliverable > 0n) {
      this.ledger.approve(
        this.underlyingToken,
        this.address,
        this.streaming.address,
        deliverable
      );
      streamId = this.createStream(request.recipient, deliverable);
    }

    return {
      paymentAmount,
      data0: this.streaming.address,
      data1: streamId,
      data2: credited,
    };
  }

  /** Throws before pricing when the release schedule cannot be built. */
  protected assertStreamConfigured(): void {}

  protected abstract createStream(recipient: Address, amount: bigint): bigint;
}

// ---------------------------------------------------------------------------
// Linear
// ---------------------------------------------------------------------------

export interface VestingSchedule {
  /** Seconds */
  readonly cliffDuration: bigint;
  /** Seconds */
  readonly totalDuration: bigint;
}

export interface LinearVestedExerciseConfig
  extends VestedExerciseConfig,
    VestingSchedule {}

export class LinearVestedExercise extends VestedExercise {
  readonly kind = "vested-linear" as const;

  private readonly scheduleSlot: JournaledValue<VestingSchedule>;

  constructor(config: LinearVestedExerciseConfig) {
    super(config);
    const schedule = {
      cliffDuration: config.cliffDuration,
      totalDuration: config.totalDuration,
    };
    assertVestingSchedule(schedule);
    this.scheduleSlot = new JournaledValue(config.journal, schedule);
  }

  get vestingSchedule(): VestingSchedule {
    return this.scheduleSlot.get();
  }

  setVestingSchedule(
    caller: Address,
    cliffDuration: bigint,
    totalDuration: bigint
  ): void {
    this.configure(
      caller,
      "vesting_schedule",
      { cliffDuration, totalDuration },
      () => {
        const schedule = { cliffDuration, totalDuration };
        assertVestingSchedule(schedule);
        this.scheduleSlot.set(schedule);
      }
    );
  }

  protected createStream(recipient: Address, amount: bigint): bigint {
    return this.streaming.createLinearStream(this.address, {
      recipient,
      token: this.underlyingToken,
      amount,
      ...this.vestingSchedule,
    });
  }
}

function assertVestingSchedule(schedule: VestingSchedule): void {
  if (
    schedule.totalDuration <= 0n ||
    schedule.cliffDuration < 0n ||
    schedule.cliffDuration > schedule.totalDuration
  ) {
    throw new InvalidVestingScheduleError(
      schedule.cliffDuration,
      schedule.totalDuration
    );
  }
}

// ---------------------------------------------------------------------------
// Segmented
// ---------------------------------------------------------------------------

export interface SegmentedVestedExerciseConfig extends VestedExerciseConfig {
  /** Optional at construction; exercising is refused until set */
  readonly segments?: readonly SegmentConfig[];
}

export class SegmentedVestedExercise extends VestedExercise {
  readonly kind = "vested-segmented" as const;

  private readonly segmentSlot: JournaledValue<readonly SegmentConfig[]>;

  constructor(config: SegmentedVestedExerciseConfig) {
    super(config);
    const initial = config.segments
      ? toSegmentSchedule(
          config.segments.map((s) => s.exponent),
          config.segments.map((s) => s.duration)
        )
      : [];
    this.segmentSlot = new JournaledValue<readonly SegmentConfig[]>(
      config.journal,
      initial
    );
  }

  get segments(): readonly SegmentConfig[] {
    return this.segmentSlot.get();
  }

  /** Seconds from stream start until everything is released */
  get streamDuration(): bigint {
    return totalSegmentDuration(this.segments);
  }

  setSegments(
    caller: Address,
    exponents: readonly bigint[],
    durations: readonly bigint[]
  ): void {
    this.configure(
      caller,
      "segments",
      { exponents: exponents.map(String), durations: durations.map(String) },
      () => {
        this.segmentSlot.set(toSegmentSchedule(exponents, durations));
      }
    );
  }

  protected override assertStreamConfigured(): void {
    if (this.segments.length === 0) {
      throw new SegmentsNotConfiguredError();
    }
  }

  protected createStream(recipient: Address, amount: bigint): bigint {
    return this.streaming.createSegmentedStream(this.address, {
      recipient,
      token: this.underlyingToken,
      amount,
      segments: constructSegments(amount, this.segments),
    });
  }
}
