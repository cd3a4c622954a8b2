// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@optex/exercise-core/ports/liquidity-router`
 * Purpose: External AMM router used to read pool reserves and mint LP positions.
 * Scope: Interface only.
 * Invariants:
 * - Reserves are returned in the (tokenA, tokenB) order the caller asked for.
 * - addLiquidity pulls tokens from `caller` by allowance granted to the router and throws InsufficientLiquidityError when a minimum is not met.
 * Side-effects: none (interface only)
 * @public
 */

import type { Address } from "viem";

export interface RouterReserves {
  readonly reserveA: bigint;
  readonly reserveB: bigint;
}

export interface AddLiquidityParams {
  readonly tokenA: Address;
  readonly tokenB: Address;
  readonly stable: boolean;
  readonly amountADesired: bigint;
  readonly amountBDesired: bigint;
  readonly amountAMin: bigint;
  readonly amountBMin: bigint;
  readonly to: Address;
  readonly deadline: bigint;
}

export interface AddLiquidityResult {
  readonly amountA: bigint;
  readonly amountB: bigint;
  readonly liquidity: bigint;
}

export interface LiquidityRouter {
  readonly address: Address;

  /** LP token (pair) address for the pool */
  pairFor(tokenA: Address, tokenB: Address, stable: boolean): Address;

  getReserves(tokenA: Address, tokenB: Address, stable: boolean): RouterReserves;

  addLiquidity(caller: Address, params: AddLiquidityParams): AddLiquidityResult;
}
