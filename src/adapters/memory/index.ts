// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/memory`
 * Purpose: Hex entry file for in-memory collaborator simulations - canonical import surface.
 * Scope: Re-exports the token ledger, AMM pair, router and streaming service. Does not export test fakes.
 * Invariants: Named exports only, no export *; every adapter writes through the shared Journal.
 * Side-effects: none (at import time)
 * Links: Used by bootstrap for simulated deployments and by tests
 * @public
 */

export { InMemoryRouter, type InMemoryRouterConfig, quote, sortTokens } from "./router.adapter";
export {
  InMemoryStreamingService,
  type InMemoryStreamingServiceConfig,
  powWad,
  type Stream,
  type StreamShape,
} from "./streaming.adapter";
export { InMemoryTokenLedger } from "./token-ledger.adapter";
export {
  MINIMUM_LIQUIDITY,
  PERIOD_SIZE,
  sqrt,
  VolatilePair,
  type VolatilePairConfig,
} from "./volatile-pair.adapter";
