// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@optex/exercise-core/oracle/pair-twap-oracle`
 * Purpose: Time-weighted average price over a volatile AMM pair's cumulative reserves, with a price floor.
 * Scope: Reads the pair through TwapPairSource; owner may change window and floor. Does not trade or write pair state.
 * Invariants:
 * - Averages over at least `secs` when the pair has an old enough observation (falls back one observation otherwise).
 * - Average reserves must fit in 112 bits, else OverflowError.
 * - A price below `minPrice` is never returned (BelowMinPriceError).
 * - Stable pairs are rejected at construction.
 * Side-effects: none on reads; config.changed events on owner updates
 * Notes: A swap in the current second does not move the price: cumulatives only accrue reserves held before the latest update.
 * @public
 */

import type { Address } from "viem";

import { Ownable } from "../access";
import {
  BelowMinPriceError,
  InsufficientLiquidityError,
  InsufficientObservationsError,
  OverflowError,
  StablePairsUnsupportedError,
} from "../errors";
import type { EventSink } from "../events";
import type { Journal } from "../journal";
import { JournaledValue } from "../journal";
import { divWadDown } from "../math";
import type { TokenPair } from "../model";
import type { PairObservation, TwapPairSource } from "../ports";
import { type Oracle, orientPair } from "./oracle";

/** Reserve averages must stay below 2^112 */
export const MAX_RESERVE = 2n ** 112n;

export interface PairTwapOracleConfig {
  readonly address: Address;
  readonly pair: TwapPairSource;
  readonly underlyingToken: Address;
  readonly owner: Address;
  /** TWAP window in seconds */
  readonly secs: bigint;
  readonly minPrice: bigint;
  readonly journal: Journal;
  readonly events: EventSink;
}

export class PairTwapOracle implements Oracle {
  readonly address: Address;
  readonly pair: TwapPairSource;
  readonly underlyingIsToken0: boolean;
  private readonly tokens: TokenPair;
  private readonly ownable: Ownable;
  private readonly secsSlot: JournaledValue<bigint>;
  private readonly minPriceSlot: JournaledValue<bigint>;

  constructor(private readonly config: PairTwapOracleConfig) {
    if (config.pair.stable()) {
      throw new StablePairsUnsupportedError(config.pair.address);
    }
    this.address = config.address;
    this.pair = config.pair;
    const orientation = orientPair(config.pair, config.underlyingToken);
    this.underlyingIsToken0 = orientation.underlyingIsToken0;
    this.tokens = orientation.tokens;
    this.ownable = new Ownable(
      config.address,
      config.owner,
      config.journal,
      config.events
    );
    this.secsSlot = new JournaledValue(config.journal, config.secs);
    this.minPriceSlot = new JournaledValue(config.journal, config.minPrice);
  }

  get owner(): Address {
    return this.ownable.owner;
  }

  get secs(): bigint {
    return this.secsSlot.get();
  }

  get minPrice(): bigint {
    return this.minPriceSlot.get();
  }

  getTokens(): TokenPair {
    return this.tokens;
  }

  getPrice(): bigint {
    const current = this.pair.currentCumulativePrices();
    let observation = this.observationAt(this.pair.observationLength() - 1);
    let elapsed = current.blockTimestamp - observation.timestamp;

    if (elapsed < this.secs) {
      observation = this.observationAt(this.pair.observationLength() - 2);
      elapsed = current.blockTimestamp - observation.timestamp;
    }
    if (elapsed <= 0n) {
      throw new InsufficientObservationsError(this.pair.address);
    }

    const reserve0 = safeReserve(
      (current.reserve0Cumulative - observation.reserve0Cumulative) / elapsed
    );
    const reserve1 = safeReserve(
      (current.reserve1Cumulative - observation.reserve1Cumulative) / elapsed
    );

    const [underlyingReserve, paymentReserve] = this.underlyingIsToken0
      ? [reserve0, reserve1]
      : [reserve1, reserve0];
    if (underlyingReserve === 0n) {
      throw new InsufficientLiquidityError(
        `pair ${this.pair.address} has no average underlying reserve`
      );
    }

    const price = divWadDown(paymentReserve, underlyingReserve);

    if (price < this.minPrice) {
      throw new BelowMinPriceError(price, this.minPrice);
    }
    return price;
  }

  setParams(caller: Address, secs: bigint, minPrice: bigint): void {
    this.config.journal.atomic(() => {
      this.ownable.requireOwner(caller);
      this.secsSlot.set(secs);
      this.minPriceSlot.set(minPrice);
      this.config.events.emit({
        type: "config.changed",
        contract: this.address,
        setting: "oracle_params",
        values: { secs, minPrice },
      });
    });
  }

  transferOwnership(caller: Address, newOwner: Address): void {
    this.ownable.transferOwnership(caller, newOwner);
  }

  private observationAt(index: number): PairObservation {
    if (index < 0) {
      throw new InsufficientObservationsError(this.pair.address);
    }
    return this.pair.observations(index);
  }
}

function safeReserve(value: bigint): bigint {
  if (value >= MAX_RESERVE) {
    throw new OverflowError(value, MAX_RESERVE);
  }
  return value;
}
