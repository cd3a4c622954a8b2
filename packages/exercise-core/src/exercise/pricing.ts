// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@optex/exercise-core/exercise/pricing`
 * Purpose: Oracle slot and multiplier bounds shared by oracle-priced modules.
 * Scope: Journaled config holders plus the payment formula. Owner checks happen in the module.
 * Invariants:
 * - A module's oracle always prices the module's own (payment, underlying) pair.
 * - Multiplier bounds satisfy 0 < min < max <= 10000 and are inclusive at both ends.
 * Side-effects: none
 * @public
 */

import {
  InvalidMultiplierError,
  InvalidOracleError,
  MultiplierOutOfRangeError,
} from "../errors";
import type { Journal } from "../journal";
import { JournaledValue } from "../journal";
import { applyMultiplier, BPS_DENOMINATOR, mulWadUp } from "../math";
import type { TokenPair } from "../model";
import { type Oracle, oracleMatchesTokens } from "../oracle/oracle";

/** paymentAmount = amount * ceil(oraclePrice * multiplier / 10000) / 1e18, rounded up */
export function paymentForMultiplier(
  amount: bigint,
  oraclePrice: bigint,
  multiplier: bigint
): bigint {
  return mulWadUp(amount, applyMultiplier(oraclePrice, multiplier));
}

export class OracleSlot {
  private readonly slot: JournaledValue<Oracle>;

  constructor(
    journal: Journal,
    private readonly tokens: TokenPair,
    oracle: Oracle
  ) {
    OracleSlot.assertMatches(oracle, tokens);
    this.slot = new JournaledValue(journal, oracle);
  }

  get(): Oracle {
    return this.slot.get();
  }

  set(oracle: Oracle): void {
    OracleSlot.assertMatches(oracle, this.tokens);
    this.slot.set(oracle);
  }

  private static assertMatches(oracle: Oracle, tokens: TokenPair): void {
    if (!oracleMatchesTokens(oracle, tokens)) {
      const actual = oracle.getTokens();
      throw new InvalidOracleError(
        `oracle ${oracle.address} prices ${actual.paymentToken}/${actual.underlyingToken}, expected ${tokens.paymentToken}/${tokens.underlyingToken}`
      );
    }
  }
}

export interface MultiplierRange {
  readonly minMultiplier: bigint;
  readonly maxMultiplier: bigint;
}

export class MultiplierBounds {
  private readonly slot: JournaledValue<MultiplierRange>;

  constructor(journal: Journal, range: MultiplierRange) {
    MultiplierBounds.validate(range);
    this.slot = new JournaledValue(journal, range);
  }

  get range(): MultiplierRange {
    return this.slot.get();
  }

  set(range: MultiplierRange): void {
    MultiplierBounds.validate(range);
    this.slot.set(range);
  }

  assertWithin(multiplier: bigint): void {
    const { minMultiplier, maxMultiplier } = this.slot.get();
    if (multiplier < minMultiplier || multiplier > maxMultiplier) {
      throw new InvalidMultiplierError(multiplier, minMultiplier, maxMultiplier);
    }
  }

  private static validate(range: MultiplierRange): void {
    if (range.minMultiplier <= 0n) {
      throw new MultiplierOutOfRangeError("minMultiplier", range.minMultiplier);
    }
    if (
      range.maxMultiplier <= range.minMultiplier ||
      range.maxMultiplier > BPS_DENOMINATOR
    ) {
      throw new MultiplierOutOfRangeError("maxMultiplier", range.maxMultiplier);
    }
  }
}
