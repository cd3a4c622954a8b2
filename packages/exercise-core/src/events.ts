// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@optex/exercise-core/events`
 * Purpose: Protocol events emitted by oracles, exercise modules and the gateway, plus a journaled event log.
 * Scope: Event shapes and the default EventSink. Does not log or forward events anywhere.
 * Invariants: Events emitted inside a failed atomic call are removed with the rest of its state.
 * Side-effects: none
 * @public
 */

import type { Address } from "viem";

import type { Journal } from "./journal";
import { JournaledList } from "./journal";
import type { ExerciseModuleKind } from "./model";

export interface ExercisedEvent {
  readonly type: "exercise.exercised";
  readonly module: Address;
  readonly kind: ExerciseModuleKind;
  readonly from: Address;
  readonly recipient: Address;
  readonly amount: bigint;
  readonly paymentAmount: bigint;
  readonly data0: Address;
  readonly data1: bigint;
  readonly data2: bigint;
}

export interface FeesDistributedEvent {
  readonly type: "fees.distributed";
  readonly module: Address;
  readonly token: Address;
  readonly recipients: readonly Address[];
  readonly bps: readonly bigint[];
  readonly totalAmount: bigint;
}

export interface CreditRecordedEvent {
  readonly type: "credit.recorded";
  readonly module: Address;
  readonly account: Address;
  readonly amount: bigint;
}

export interface CreditClaimedEvent {
  readonly type: "credit.claimed";
  readonly module: Address;
  readonly account: Address;
  readonly to: Address;
  readonly amount: bigint;
}

export interface ConfigChangedEvent {
  readonly type: "config.changed";
  readonly contract: Address;
  readonly setting:
    | "oracle"
    | "multiplier"
    | "multipliers"
    | "price"
    | "times"
    | "fees"
    | "segments"
    | "lock_durations"
    | "vesting_schedule"
    | "oracle_params"
    | "owner";
  readonly values: Readonly<Record<string, bigint | string | readonly string[]>>;
}

export interface GatewayExercisedEvent {
  readonly type: "gateway.exercised";
  readonly sender: Address;
  readonly recipient: Address;
  readonly module: Address;
  readonly amount: bigint;
  readonly data0: Address;
  readonly data1: bigint;
  readonly data2: bigint;
}

export interface ExerciseContractSetEvent {
  readonly type: "gateway.exercise_contract_set";
  readonly module: Address;
  readonly isActive: boolean;
}

export interface MintedEvent {
  readonly type: "gateway.minted";
  readonly to: Address;
  readonly amount: bigint;
}

export type ProtocolEvent =
  | ExercisedEvent
  | FeesDistributedEvent
  | CreditRecordedEvent
  | CreditClaimedEvent
  | ConfigChangedEvent
  | GatewayExercisedEvent
  | ExerciseContractSetEvent
  | MintedEvent;

export type ProtocolEventType = ProtocolEvent["type"];

export interface EventSink {
  emit(event: ProtocolEvent): void;
}

/**
 * Append-only event log sharing the chain's journal.
 */
export class JournaledEventLog implements EventSink {
  private readonly events: JournaledList<ProtocolEvent>;

  constructor(journal: Journal) {
    this.events = new JournaledList(journal);
  }

  emit(event: ProtocolEvent): void {
    this.events.push(event);
  }

  all(): readonly ProtocolEvent[] {
    return this.events.toArray();
  }

  ofType<T extends ProtocolEventType>(
    type: T
  ): Extract<ProtocolEvent, { type: T }>[] {
    return this.events
      .toArray()
      .filter((e): e is Extract<ProtocolEvent, { type: T }> => e.type === type);
  }
}
