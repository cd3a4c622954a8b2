// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@optex/exercise-core/oracle/reserve-ratio-oracle`
 * Purpose: Spot price from a pair's current reserve ratio, guarded by the same price floor as the TWAP oracle.
 * Scope: Read-only pricing plus owner-managed floor. Offers no manipulation dampening beyond the floor.
 * Invariants: Never returns a price below `minPrice`; an empty underlying reserve is InsufficientLiquidityError.
 * Side-effects: none on reads
 * @public
 */

import type { Address } from "viem";

import { Ownable } from "../access";
import { BelowMinPriceError, InsufficientLiquidityError } from "../errors";
import type { EventSink } from "../events";
import type { Journal } from "../journal";
import { JournaledValue } from "../journal";
import { divWadDown } from "../math";
import type { TokenPair } from "../model";
import type { TwapPairSource } from "../ports";
import { type Oracle, orientPair } from "./oracle";

export interface ReserveRatioOracleConfig {
  readonly address: Address;
  readonly pair: TwapPairSource;
  readonly underlyingToken: Address;
  readonly owner: Address;
  readonly minPrice: bigint;
  readonly journal: Journal;
  readonly events: EventSink;
}

export class ReserveRatioOracle implements Oracle {
  readonly address: Address;
  private readonly underlyingIsToken0: boolean;
  private readonly tokens: TokenPair;
  private readonly ownable: Ownable;
  private readonly minPriceSlot: JournaledValue<bigint>;

  constructor(private readonly config: ReserveRatioOracleConfig) {
    this.address = config.address;
    const orientation = orientPair(config.pair, config.underlyingToken);
    this.underlyingIsToken0 = orientation.underlyingIsToken0;
    this.tokens = orientation.tokens;
    this.ownable = new Ownable(
      config.address,
      config.owner,
      config.journal,
      config.events
    );
    this.minPriceSlot = new JournaledValue(config.journal, config.minPrice);
  }

  get minPrice(): bigint {
    return this.minPriceSlot.get();
  }

  getTokens(): TokenPair {
    return this.tokens;
  }

  getPrice(): bigint {
    const { reserve0, reserve1 } = this.config.pair.getReserves();
    const [underlyingReserve, paymentReserve] = this.underlyingIsToken0
      ? [reserve0, reserve1]
      : [reserve1, reserve0];
    if (underlyingReserve === 0n) {
      throw new InsufficientLiquidityError(
        `pair ${this.config.pair.address} has no underlying reserve`
      );
    }
    const price = divWadDown(paymentReserve, underlyingReserve);
    if (price < this.minPrice) {
      throw new BelowMinPriceError(price, this.minPrice);
    }
    return price;
  }

  setMinPrice(caller: Address, minPrice: bigint): void {
    this.config.journal.atomic(() => {
      this.ownable.requireOwner(caller);
      this.minPriceSlot.set(minPrice);
      this.config.events.emit({
        type: "config.changed",
        contract: this.address,
        setting: "oracle_params",
        values: { minPrice },
      });
    });
  }
}
