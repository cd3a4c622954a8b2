// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/memory/router`
 * Purpose: AMM router over VolatilePair pools: pool registry, ordered reserve reads and optimal-ratio liquidity adds.
 * Scope: Implements LiquidityRouter. Volatile pools only; stable lookups fail.
 * Invariants:
 * - Pools are keyed by their sorted token pair; reserves come back in the caller's (tokenA, tokenB) order.
 * - addLiquidity deposits at the pool's current ratio and never uses more than either desired amount.
 * Side-effects: none (in-memory state)
 * Links: Implements LiquidityRouter port
 * @public
 */

import {
  addressKey,
  InsufficientLiquidityError,
  type Journal,
  JournaledMap,
  PastDeadlineError,
  sameAddress,
} from "@optex/exercise-core";
import type { Address } from "viem";

import type {
  AddLiquidityParams,
  AddLiquidityResult,
  Clock,
  LiquidityRouter,
  RouterReserves,
} from "@/ports";

import type { InMemoryTokenLedger } from "./token-ledger.adapter";
import { VolatilePair } from "./volatile-pair.adapter";

export interface InMemoryRouterConfig {
  readonly address: Address;
  readonly ledger: InMemoryTokenLedger;
  readonly clock: Clock;
  readonly journal: Journal;
}

export class InMemoryRouter implements LiquidityRouter {
  readonly address: Address;
  private readonly pools: JournaledMap<string, VolatilePair>;

  constructor(private readonly config: InMemoryRouterConfig) {
    this.address = config.address;
    this.pools = new JournaledMap(config.journal);
  }

  /** Deploy a volatile pool for (tokenA, tokenB) at `pairAddress`. */
  createPair(tokenA: Address, tokenB: Address, pairAddress: Address): VolatilePair {
    const [token0, token1] = sortTokens(tokenA, tokenB);
    const key = poolKey(token0, token1);
    if (this.pools.has(key)) {
      throw new Error(`Pool for ${token0}/${token1} already exists`);
    }
    const pair = new VolatilePair({
      address: pairAddress,
      token0,
      token1,
      ledger: this.config.ledger,
      clock: this.config.clock,
      journal: this.config.journal,
    });
    this.pools.set(key, pair);
    return pair;
  }

  getPair(tokenA: Address, tokenB: Address, stable: boolean): VolatilePair {
    const [token0, token1] = sortTokens(tokenA, tokenB);
    const pair = stable ? undefined : this.pools.get(poolKey(token0, token1));
    if (!pair) {
      throw new InsufficientLiquidityError(
        `no ${stable ? "stable" : "volatile"} pool for ${token0}/${token1}`
      );
    }
    return pair;
  }

  pairFor(tokenA: Address, tokenB: Address, stable: boolean): Address {
    return this.getPair(tokenA, tokenB, stable).address;
  }

  getReserves(tokenA: Address, tokenB: Address, stable: boolean): RouterReserves {
    const pair = this.getPair(tokenA, tokenB, stable);
    const { reserve0, reserve1 } = pair.getReserves();
    return sameAddress(tokenA, pair.token0())
      ? { reserveA: reserve0, reserveB: reserve1 }
      : { reserveA: reserve1, reserveB: reserve0 };
  }

  /**
   * Pull the optimal amounts from `caller` (by allowance to the router) into the pool and mint LP to `params.to`.
   *
   * @throws PastDeadlineError when the deadline has passed
   * @throws InsufficientLiquidityError when an optimal amount falls below its minimum
   */
  addLiquidity(caller: Address, params: AddLiquidityParams): AddLiquidityResult {
    return this.config.journal.atomic(() => {
      const now = this.config.clock.now();
      if (now > params.deadline) {
        throw new PastDeadlineError(params.deadline, now);
      }

      const pair = this.getPair(params.tokenA, params.tokenB, params.stable);
      const { amountA, amountB } = this.quoteAmounts(params);

      const ledger = this.config.ledger;
      ledger.transferFrom(params.tokenA, this.address, caller, pair.address, amountA);
      ledger.transferFrom(params.tokenB, this.address, caller, pair.address, amountB);
      const liquidity = pair.mint(params.to);

      return { amountA, amountB, liquidity };
    });
  }

  private quoteAmounts(params: AddLiquidityParams): {
    amountA: bigint;
    amountB: bigint;
  } {
    const { reserveA, reserveB } = this.getReserves(
      params.tokenA,
      params.tokenB,
      params.stable
    );
    if (reserveA === 0n && reserveB === 0n) {
      return { amountA: params.amountADesired, amountB: params.amountBDesired };
    }

    const amountBOptimal = quote(params.amountADesired, reserveA, reserveB);
    if (amountBOptimal <= params.amountBDesired) {
      if (amountBOptimal < params.amountBMin) {
        throw new InsufficientLiquidityError(
          `tokenB amount ${amountBOptimal} below minimum ${params.amountBMin}`
        );
      }
      return { amountA: params.amountADesired, amountB: amountBOptimal };
    }

    const amountAOptimal = quote(params.amountBDesired, reserveB, reserveA);
    if (amountAOptimal < params.amountAMin) {
      throw new InsufficientLiquidityError(
        `tokenA amount ${amountAOptimal} below minimum ${params.amountAMin}`
      );
    }
    return { amountA: amountAOptimal, amountB: params.amountBDesired };
  }
}

/** amountA priced in tokenB at the pool ratio, rounded down */
export function quote(amountA: bigint, reserveA: bigint, reserveB: bigint): bigint {
  if (reserveA === 0n || reserveB === 0n) {
    throw new InsufficientLiquidityError("pool has an empty reserve");
  }
  return (amountA * reserveB) / reserveA;
}

export function sortTokens(tokenA: Address, tokenB: Address): [Address, Address] {
  if (sameAddress(tokenA, tokenB)) {
    throw new Error(`Identical tokens ${tokenA}`);
  }
  return addressKey(tokenA) < addressKey(tokenB)
    ? [tokenA, tokenB]
    : [tokenB, tokenA];
}

function poolKey(token0: Address, token1: Address): string {
  return `${addressKey(token0)}:${addressKey(token1)}`;
}
