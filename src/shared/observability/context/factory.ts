// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/context/factory`
 * Purpose: Factory for operation-scoped context with a sanitized correlation id.
 * Scope: Create OperationContext with child logger. Does not manage context lifecycle.
 * Invariants: reqId is validated (max 64 chars, alphanumeric + _-), otherwise replaced by a random UUID.
 * Side-effects: none
 * @public
 */

import type { Logger } from "pino";

import type { Clock } from "@/ports";

import type { OperationContext } from "./types";

const MAX_REQ_ID_LENGTH = 64;
const REQ_ID_PATTERN = /^[a-zA-Z0-9_-]+$/;

function sanitizeReqId(incoming: string | undefined): string {
  if (
    incoming &&
    incoming.length <= MAX_REQ_ID_LENGTH &&
    REQ_ID_PATTERN.test(incoming)
  ) {
    return incoming;
  }
  return crypto.randomUUID();
}

export function createOperationContext(
  deps: { baseLog: Logger; clock: Clock },
  meta: { operation: string; reqId?: string | undefined }
): OperationContext {
  const reqId = sanitizeReqId(meta.reqId);

  return {
    log: deps.baseLog.child({ reqId, operation: meta.operation }),
    reqId,
    clock: deps.clock,
  };
}
