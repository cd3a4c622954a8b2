// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/context/types`
 * Purpose: Operation-scoped context for passing logger, correlation id and clock through layers.
 * Scope: Define OperationContext. Does not implement context creation.
 * Invariants: log is a child logger with reqId and operation bound.
 * Side-effects: none
 * @public
 */

import type { Logger } from "pino";

import type { Clock } from "@/ports";

export interface OperationContext {
  log: Logger; // Child logger with reqId, operation
  reqId: string;
  clock: Clock;
}
