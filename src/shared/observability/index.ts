// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability`
 * Purpose: Cross-cutting observability - logging and operation context.
 * Scope: Unified entry point for observability utilities. Does not implement logic.
 * Invariants: No imports from bootstrap or features.
 * Side-effects: none
 * @public
 */

export type { OperationContext } from "./context";
export { createOperationContext } from "./context";
export type {
  CreditClaimedEvent,
  DeploymentReadyEvent,
  EventBase,
  EventName,
  ExerciseFailedEvent,
  ExerciseSettledEvent,
  Logger,
} from "./logging";
export {
  EVENT_NAMES,
  logEvent,
  logOperationError,
  makeLogger,
  makeNoopLogger,
  REDACT_PATHS,
  stringifyBigints,
} from "./logging";
