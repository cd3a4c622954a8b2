// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@optex/exercise-core/oracle/oracle`
 * Purpose: Price-source capability consumed by exercise modules.
 * Scope: Interface plus the orientation helper shared by pair-backed oracles.
 * Invariants: getPrice() is 18-decimal payment-token per 1 underlying-token and never below the oracle's floor.
 * Side-effects: none
 * @public
 */

import type { Address } from "viem";

import { InvalidOracleError } from "../errors";
import { sameAddress, type TokenPair } from "../model";
import type { TwapPairSource } from "../ports";

export interface Oracle {
  readonly address: Address;

  /** @throws BelowMinPriceError when the computed price is under the floor */
  getPrice(): bigint;

  getTokens(): TokenPair;
}

export interface PairOrientation {
  /** True when the underlying token is the pair's token0 */
  readonly underlyingIsToken0: boolean;
  readonly tokens: TokenPair;
}

export function orientPair(
  pair: TwapPairSource,
  underlyingToken: Address
): PairOrientation {
  const token0 = pair.token0();
  const token1 = pair.token1();
  if (sameAddress(token0, underlyingToken)) {
    return {
      underlyingIsToken0: true,
      tokens: { paymentToken: token1, underlyingToken: token0 },
    };
  }
  if (sameAddress(token1, underlyingToken)) {
    return {
      underlyingIsToken0: false,
      tokens: { paymentToken: token0, underlyingToken: token1 },
    };
  }
  throw new InvalidOracleError(
    `underlying ${underlyingToken} is not a token of pair ${pair.address}`
  );
}

/** True when `oracle` prices the same (payment, underlying) pair as `expected`. */
export function oracleMatchesTokens(oracle: Oracle, expected: TokenPair): boolean {
  const tokens = oracle.getTokens();
  return (
    sameAddress(tokens.paymentToken, expected.paymentToken) &&
    sameAddress(tokens.underlyingToken, expected.underlyingToken)
  );
}
