// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/logging/events`
 * Purpose: Event name registry and payload shapes for structured engine logs.
 * Scope: Define valid event names and their fields. Does not emit anything.
 * Invariants: Every event carries reqId; amounts are decimal strings so JSON output never loses precision.
 * Side-effects: none
 * Notes: Use EVENT_NAMES.* with logEvent(); ad-hoc event strings do not type-check.
 * @public
 */

export const EVENT_NAMES = {
  EXERCISE_SETTLED: "exercise.settled",
  EXERCISE_FAILED: "exercise.failed",
  CREDIT_CLAIMED: "credit.claimed",
  DEPLOYMENT_READY: "deployment.ready",
} as const;

export type EventName = (typeof EVENT_NAMES)[keyof typeof EVENT_NAMES];

export interface EventBase {
  reqId: string;
}

export interface ExerciseSettledEvent extends EventBase {
  module: string;
  kind: string;
  amount: string;
  paymentAmount: string;
  data0: string;
  data1: string;
  data2: string;
  durationMs: number;
}

export interface ExerciseFailedEvent extends EventBase {
  module: string;
  amount: string;
  errorCode: string;
  durationMs: number;
}

export interface CreditClaimedEvent extends EventBase {
  module: string;
  account: string;
  to: string;
  amount: string;
}

export interface DeploymentReadyEvent extends EventBase {
  gateway: string;
  modules: string[];
}
