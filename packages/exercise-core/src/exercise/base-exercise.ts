// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@optex/exercise-core/exercise/base-exercise`
 * Purpose: Shared exercise pipeline: caller authentication, deadline and slippage checks, fee pull and the settlement event.
 * Scope: Abstract base for every module kind. Subclasses price and deliver in `settle`.
 * Invariants:
 * - Check order: gateway caller → active module → (subclass) deadline/window/multiplier → price → slippage → fees → delivery.
 * - Slippage is checked after pricing and before any transfer.
 * - Each entry point is non-reentrant and atomic; owner setters are atomic.
 * Side-effects: IO (token transfers via TokenLedger, events)
 * @public
 */

import type { Address } from "viem";

import { Ownable, ReentrancyLock } from "../access";
import {
  NotActiveModuleError,
  NotGatewayError,
  PastDeadlineError,
  SlippageTooHighError,
} from "../errors";
import type { ConfigChangedEvent, EventSink } from "../events";
import { distributeFeesFrom, toFeeSchedule } from "../fees";
import type { Journal } from "../journal";
import { JournaledValue } from "../journal";
import {
  type ExerciseModuleKind,
  type ExerciseRequest,
  type ExerciseResult,
  type FeeSchedule,
  sameAddress,
  type TokenPair,
} from "../model";
import type { Clock, ExerciseGateway, TokenLedger } from "../ports";
import type { ExerciseModule } from "./exercise-module";

export interface BaseExerciseConfig {
  readonly address: Address;
  readonly gateway: ExerciseGateway;
  readonly owner: Address;
  readonly paymentToken: Address;
  readonly underlyingToken: Address;
  readonly feeRecipients: readonly Address[];
  readonly feeBps: readonly bigint[];
  readonly ledger: TokenLedger;
  readonly clock: Clock;
  readonly journal: Journal;
  readonly events: EventSink;
}

export abstract class BaseExercise implements ExerciseModule {
  abstract readonly kind: ExerciseModuleKind;

  readonly address: Address;
  readonly gateway: ExerciseGateway;
  readonly paymentToken: Address;
  readonly underlyingToken: Address;

  protected readonly ledger: TokenLedger;
  protected readonly clock: Clock;
  protected readonly journal: Journal;
  protected readonly events: EventSink;

  private readonly ownable: Ownable;
  private readonly lock: ReentrancyLock;
  private readonly feeSlot: JournaledValue<FeeSchedule>;

  protected constructor(config: BaseExerciseConfig) {
    this.address = config.address;
    this.gateway = config.gateway;
    this.paymentToken = config.paymentToken;
    this.underlyingToken = config.underlyingToken;
    this.ledger = config.ledger;
    this.clock = config.clock;
    this.journal = config.journal;
    this.events = config.events;
    this.ownable = new Ownable(
      config.address,
      config.owner,
      config.journal,
      config.events
    );
    this.lock = new ReentrancyLock(config.address);
    this.feeSlot = new JournaledValue(
      config.journal,
      toFeeSchedule(config.feeRecipients, config.feeBps)
    );
  }

  get owner(): Address {
    return this.ownable.owner;
  }

  get feeSchedule(): FeeSchedule {
    return this.feeSlot.get();
  }

  get tokens(): TokenPair {
    return {
      paymentToken: this.paymentToken,
      underlyingToken: this.underlyingToken,
    };
  }

  exercise(caller: Address, request: ExerciseRequest): ExerciseResult {
    if (!sameAddress(caller, this.gateway.address)) {
      throw new NotGatewayError(caller);
    }
    if (!this.gateway.isExerciseContract(this.address)) {
      throw new NotActiveModuleError(this.address);
    }

    return this.guarded(() => {
      const result = this.settle(request);
      this.events.emit({
        type: "exercise.exercised",
        module: this.address,
        kind: this.kind,
        from: request.from,
        recipient: request.recipient,
        amount: request.amount,
        paymentAmount: result.paymentAmount,
        data0: result.data0,
        data1: result.data1,
        data2: result.data2,
      });
      return result;
    });
  }

  setFees(
    caller: Address,
    recipients: readonly Address[],
    bps: readonly bigint[]
  ): void {
    this.configure(
      caller,
      "fees",
      { recipients: [...recipients], bps: bps.map(String) },
      () => {
        this.feeSlot.set(toFeeSchedule(recipients, bps));
      }
    );
  }

  transferOwnership(caller: Address, newOwner: Address): void {
    this.ownable.transferOwnership(caller, newOwner);
  }

  /** Price, validate and deliver one exercise. Runs inside the atomic, non-reentrant frame. */
  protected abstract settle(request: ExerciseRequest): ExerciseResult;

  protected guarded<T>(fn: () => T): T {
    return this.lock.run(() => this.journal.atomic(fn));
  }

  /** Owner-only, atomic configuration change with a config.changed event. */
  protected configure(
    caller: Address,
    setting: ConfigChangedEvent["setting"],
    values: ConfigChangedEvent["values"],
    apply: () => void
  ): void {
    this.journal.atomic(() => {
      this.ownable.requireOwner(caller);
      apply();
      this.events.emit({
        type: "config.changed",
        contract: this.address,
        setting,
        values,
      });
    });
  }

  protected requireBeforeDeadline(deadline: bigint): void {
    const now = this.clock.now();
    if (now > deadline) {
      throw new PastDeadlineError(deadline, now);
    }
  }

  /**
   * Enforce the holder's slippage bound, then pull `paymentAmount` to the fee recipients.
   */
  protected collectPayment(
    from: Address,
    paymentAmount: bigint,
    maxPaymentAmount: bigint
  ): void {
    if (paymentAmount > maxPaymentAmount) {
      throw new SlippageTooHighError(paymentAmount, maxPaymentAmount);
    }
    distributeFeesFrom({
      ledger: this.ledger,
      events: this.events,
      spender: this.address,
      token: this.paymentToken,
      from,
      totalAmount: paymentAmount,
      schedule: this.feeSlot.get(),
    });
  }
}
