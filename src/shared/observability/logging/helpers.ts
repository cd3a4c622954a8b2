// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/logging/helpers`
 * Purpose: Type-safe event logging that enforces the event name registry and base fields.
 * Scope: logEvent and the failure helper. Does not create loggers.
 * Invariants: reqId MUST be present (throws under Vitest, logs an invariant error elsewhere).
 * Side-effects: IO (emits structured log entries via provided logger)
 * @public
 */

import type { Logger } from "pino";

import type { EventBase, EventName } from "./events";

/**
 * @param logger - Pino logger instance
 * @param eventName - Event name from EVENT_NAMES registry
 * @param fields - Event-specific fields (MUST include reqId)
 * @param message - Human-readable message (defaults to event name)
 */
export function logEvent(
  logger: Logger,
  eventName: EventName,
  fields: EventBase & Record<string, unknown>,
  message?: string
): void {
  if (!fields.reqId) {
    if (process.env.VITEST === "true") {
      throw new Error(
        `INVARIANT VIOLATION: logEvent("${eventName}") called without reqId`
      );
    }
    logger.error(
      { event: eventName, missingField: "reqId" },
      "inv_missing_reqId_in_logEvent"
    );
    return;
  }

  logger.info({ event: eventName, ...fields }, message ?? eventName);
}

/**
 * Log a failed operation with consistent fields: err, errorCode.
 *
 * @param errorCode - Stable error code for classification
 */
export function logOperationError(
  log: Logger,
  error: unknown,
  errorCode: string
): void {
  log.error({ err: error, errorCode }, "operation failed");
}
