// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@optex/exercise-core/params`
 * Purpose: ABI encoding of per-module exercise params carried opaquely by the gateway.
 * Scope: Pure encode/decode. Does not validate values against module configuration.
 * Invariants:
 * - Discount / fixed-window layout: (uint256 maxPaymentAmount, uint256 deadline)
 * - Locked-LP / vested layout: (uint256 maxPaymentAmount, uint256 deadline, uint256 multiplier)
 * - Undecodable bytes throw InvalidParamsError.
 * Side-effects: none
 * @public
 */

import {
  decodeAbiParameters,
  encodeAbiParameters,
  type Hex,
  parseAbiParameters,
} from "viem";

import { InvalidParamsError } from "./errors";

export interface DiscountExerciseParams {
  readonly maxPaymentAmount: bigint;
  /** Unix seconds */
  readonly deadline: bigint;
}

export interface MultiplierExerciseParams extends DiscountExerciseParams {
  /** Basis points, 10000 = 100% of oracle price */
  readonly multiplier: bigint;
}

const DISCOUNT_PARAMS_ABI = parseAbiParameters(
  "uint256 maxPaymentAmount, uint256 deadline"
);

const MULTIPLIER_PARAMS_ABI = parseAbiParameters(
  "uint256 maxPaymentAmount, uint256 deadline, uint256 multiplier"
);

export function encodeDiscountExerciseParams(
  params: DiscountExerciseParams
): Hex {
  return encodeAbiParameters(DISCOUNT_PARAMS_ABI, [
    params.maxPaymentAmount,
    params.deadline,
  ]);
}

export function decodeDiscountExerciseParams(
  data: Hex
): DiscountExerciseParams {
  try {
    const [maxPaymentAmount, deadline] = decodeAbiParameters(
      DISCOUNT_PARAMS_ABI,
      data
    );
    return { maxPaymentAmount, deadline };
  } catch (error) {
    throw new InvalidParamsError("discount", error);
  }
}

export function encodeMultiplierExerciseParams(
  params: MultiplierExerciseParams
): Hex {
  return encodeAbiParameters(MULTIPLIER_PARAMS_ABI, [
    params.maxPaymentAmount,
    params.deadline,
    params.multiplier,
  ]);
}

export function decodeMultiplierExerciseParams(
  data: Hex
): MultiplierExerciseParams {
  try {
    const [maxPaymentAmount, deadline, multiplier] = decodeAbiParameters(
      MULTIPLIER_PARAMS_ABI,
      data
    );
    return { maxPaymentAmount, deadline, multiplier };
  } catch (error) {
    throw new InvalidParamsError("multiplier", error);
  }
}
