// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/logging`
 * Purpose: Public API for structured logging across the engine.
 * Scope: Re-export logger factory, helpers, event registry and Logger type. Does not implement logging transport.
 * Invariants: none
 * Side-effects: none
 * Notes: Import from this module, not from submodules.
 * @public
 */

export type {
  CreditClaimedEvent,
  DeploymentReadyEvent,
  EventBase,
  EventName,
  ExerciseFailedEvent,
  ExerciseSettledEvent,
} from "./events";
export { EVENT_NAMES } from "./events";
export { logEvent, logOperationError } from "./helpers";
export type { Logger } from "./logger";
export { makeLogger, makeNoopLogger, stringifyBigints } from "./logger";
export { REDACT_PATHS } from "./redact";
