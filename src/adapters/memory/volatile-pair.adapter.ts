// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/memory/volatile-pair`
 * Purpose: Constant-product AMM pair with cumulative reserve accumulators and periodic observations.
 * Scope: Implements TwapPairSource plus mint/swap/sync. LP balances live in the shared ledger under the pair's own address.
 * Invariants:
 * - Cumulatives accrue the reserves held before each update, times the seconds they were held.
 * - An observation is appended when more than PERIOD_SIZE seconds passed since the last one.
 * - Swaps keep (reserve0 * reserve1) non-decreasing after the 0.3% input fee.
 * - All state is journaled; a failed swap or mint leaves the pair unchanged.
 * Side-effects: none (in-memory state)
 * Links: Implements TwapPairSource port
 * @public
 */

import {
  InsufficientLiquidityError,
  type Journal,
  JournaledList,
  JournaledValue,
  minBigint,
  sameAddress,
} from "@optex/exercise-core";
import { type Address, zeroAddress } from "viem";

import type {
  Clock,
  CumulativeReserves,
  PairObservation,
  PairReserves,
  TwapPairSource,
} from "@/ports";

import type { InMemoryTokenLedger } from "./token-ledger.adapter";

/** Seconds between stored observations */
export const PERIOD_SIZE = 1800n;

/** LP tokens burned to the zero address on the first mint */
export const MINIMUM_LIQUIDITY = 1000n;

/** Input fee in parts per thousand */
const FEE_PER_MILLE = 3n;

export interface VolatilePairConfig {
  readonly address: Address;
  readonly token0: Address;
  readonly token1: Address;
  readonly ledger: InMemoryTokenLedger;
  readonly clock: Clock;
  readonly journal: Journal;
}

interface PairState {
  readonly reserve0: bigint;
  readonly reserve1: bigint;
  readonly blockTimestampLast: bigint;
  readonly reserve0CumulativeLast: bigint;
  readonly reserve1CumulativeLast: bigint;
}

export class VolatilePair implements TwapPairSource {
  readonly address: Address;
  private readonly ledger: InMemoryTokenLedger;
  private readonly clock: Clock;
  private readonly state: JournaledValue<PairState>;
  private readonly history: JournaledList<PairObservation>;

  constructor(private readonly config: VolatilePairConfig) {
    this.address = config.address;
    this.ledger = config.ledger;
    this.clock = config.clock;
    const now = config.clock.now();
    this.state = new JournaledValue<PairState>(config.journal, {
      reserve0: 0n,
      reserve1: 0n,
      blockTimestampLast: now,
      reserve0CumulativeLast: 0n,
      reserve1CumulativeLast: 0n,
    });
    this.history = new JournaledList(config.journal);
    this.history.push({
      timestamp: now,
      reserve0Cumulative: 0n,
      reserve1Cumulative: 0n,
    });
  }

  token0(): Address {
    return this.config.token0;
  }

  token1(): Address {
    return this.config.token1;
  }

  stable(): boolean {
    return false;
  }

  totalSupply(): bigint {
    return this.ledger.totalSupply(this.address);
  }

  getReserves(): PairReserves {
    const { reserve0, reserve1, blockTimestampLast } = this.state.get();
    return { reserve0, reserve1, blockTimestampLast };
  }

  currentCumulativePrices(): CumulativeReserves {
    const blockTimestamp = this.clock.now();
    const s = this.state.get();
    let reserve0Cumulative = s.reserve0CumulativeLast;
    let reserve1Cumulative = s.reserve1CumulativeLast;
    if (s.blockTimestampLast !== blockTimestamp) {
      const elapsed = blockTimestamp - s.blockTimestampLast;
      reserve0Cumulative += s.reserve0 * elapsed;
      reserve1Cumulative += s.reserve1 * elapsed;
    }
    return { reserve0Cumulative, reserve1Cumulative, blockTimestamp };
  }

  observationLength(): number {
    return this.history.length;
  }

  observations(index: number): PairObservation {
    const observation = this.history.at(index);
    if (!observation) {
      throw new RangeError(
        `Observation ${index} out of range (length ${this.history.length})`
      );
    }
    return observation;
  }

  lastObservation(): PairObservation {
    return this.observations(this.history.length - 1);
  }

  /**
   * Mint LP tokens to `to` for whatever token balances the pair holds above its reserves.
   */
  mint(to: Address): bigint {
    return this.config.journal.atomic(() => this.mintLiquidity(to));
  }

  /**
   * Send the requested outputs to `to`; the inputs must already sit in the pair.
   */
  swap(amount0Out: bigint, amount1Out: bigint, to: Address): void {
    this.config.journal.atomic(() => {
      this.swapOut(amount0Out, amount1Out, to);
    });
  }

  private mintLiquidity(to: Address): bigint {
    const { reserve0, reserve1 } = this.state.get();
    const [balance0, balance1] = this.balances();
    const amount0 = balance0 - reserve0;
    const amount1 = balance1 - reserve1;
    const supply = this.totalSupply();

    let liquidity: bigint;
    if (supply === 0n) {
      liquidity = sqrt(amount0 * amount1) - MINIMUM_LIQUIDITY;
      if (liquidity > 0n) {
        this.ledger.mint(this.address, zeroAddress, MINIMUM_LIQUIDITY);
      }
    } else {
      liquidity = minBigint(
        (amount0 * supply) / reserve0,
        (amount1 * supply) / reserve1
      );
    }
    if (liquidity <= 0n) {
      throw new InsufficientLiquidityError("insufficient liquidity minted");
    }

    this.ledger.mint(this.address, to, liquidity);
    this.update(balance0, balance1);
    return liquidity;
  }

  private swapOut(amount0Out: bigint, amount1Out: bigint, to: Address): void {
    if (amount0Out <= 0n && amount1Out <= 0n) {
      throw new InsufficientLiquidityError("insufficient output amount");
    }
    const { reserve0, reserve1 } = this.state.get();
    if (amount0Out >= reserve0 || amount1Out >= reserve1) {
      throw new InsufficientLiquidityError("output exceeds reserves");
    }

    if (amount0Out > 0n) {
      this.ledger.transfer(this.config.token0, this.address, to, amount0Out);
    }
    if (amount1Out > 0n) {
      this.ledger.transfer(this.config.token1, this.address, to, amount1Out);
    }

    const [balance0, balance1] = this.balances();
    const amount0In =
      balance0 > reserve0 - amount0Out ? balance0 - (reserve0 - amount0Out) : 0n;
    const amount1In =
      balance1 > reserve1 - amount1Out ? balance1 - (reserve1 - amount1Out) : 0n;
    if (amount0In === 0n && amount1In === 0n) {
      throw new InsufficientLiquidityError("insufficient input amount");
    }

    const adjusted0 = balance0 * 1000n - amount0In * FEE_PER_MILLE;
    const adjusted1 = balance1 * 1000n - amount1In * FEE_PER_MILLE;
    if (adjusted0 * adjusted1 < reserve0 * reserve1 * 1_000_000n) {
      throw new InsufficientLiquidityError("constant product violated");
    }

    this.update(balance0, balance1);
  }

  /** Output for an exact input, after the 0.3% fee. */
  getAmountOut(amountIn: bigint, tokenIn: Address): bigint {
    const { reserve0, reserve1 } = this.state.get();
    const [reserveIn, reserveOut] = sameAddress(tokenIn, this.config.token0)
      ? [reserve0, reserve1]
      : [reserve1, reserve0];
    const amountInWithFee = amountIn * (1000n - FEE_PER_MILLE);
    return (
      (amountInWithFee * reserveOut) / (reserveIn * 1000n + amountInWithFee)
    );
  }

  /**
   * Trader-side convenience: move `amountIn` of `tokenIn` into the pair and swap it for the other token.
   */
  swapExactIn(
    trader: Address,
    tokenIn: Address,
    amountIn: bigint,
    to: Address
  ): bigint {
    return this.config.journal.atomic(() => {
      const amountOut = this.getAmountOut(amountIn, tokenIn);
      this.ledger.transfer(tokenIn, trader, this.address, amountIn);
      const inIsToken0 = sameAddress(tokenIn, this.config.token0);
      this.swapOut(inIsToken0 ? 0n : amountOut, inIsToken0 ? amountOut : 0n, to);
      return amountOut;
    });
  }

  /** Force reserves to match balances. */
  sync(): void {
    const [balance0, balance1] = this.balances();
    this.update(balance0, balance1);
  }

  private balances(): [bigint, bigint] {
    return [
      this.ledger.balanceOf(this.config.token0, this.address),
      this.ledger.balanceOf(this.config.token1, this.address),
    ];
  }

  private update(balance0: bigint, balance1: bigint): void {
    const now = this.clock.now();
    const s = this.state.get();
    let reserve0CumulativeLast = s.reserve0CumulativeLast;
    let reserve1CumulativeLast = s.reserve1CumulativeLast;

    const elapsed = now - s.blockTimestampLast;
    if (elapsed > 0n && s.reserve0 !== 0n && s.reserve1 !== 0n) {
      reserve0CumulativeLast += s.reserve0 * elapsed;
      reserve1CumulativeLast += s.reserve1 * elapsed;
    }

    if (now - this.lastObservation().timestamp > PERIOD_SIZE) {
      this.history.push({
        timestamp: now,
        reserve0Cumulative: reserve0CumulativeLast,
        reserve1Cumulative: reserve1CumulativeLast,
      });
    }

    this.state.set({
      reserve0: balance0,
      reserve1: balance1,
      blockTimestampLast: now,
      reserve0CumulativeLast,
      reserve1CumulativeLast,
    });
  }
}

/** Integer square root (floor), Babylonian method */
export function sqrt(value: bigint): bigint {
  if (value < 0n) {
    throw new RangeError(`sqrt of negative value ${value}`);
  }
  if (value < 2n) return value;
  let x = value;
  let y = (x + 1n) / 2n;
  while (y < x) {
    x = y;
    y = (x + value / x) / 2n;
  }
  return x;
}
