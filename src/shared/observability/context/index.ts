// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/context`
 * Purpose: Public API for operation-scoped context.
 * Scope: Re-export OperationContext type and factory.
 * Side-effects: none
 * @public
 */

export { createOperationContext } from "./factory";
export type { OperationContext } from "./types";
