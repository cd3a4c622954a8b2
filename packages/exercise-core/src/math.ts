// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@optex/exercise-core/math`
 * Purpose: 18-decimal fixed-point multiply/divide with explicit rounding direction.
 * Scope: Pure bigint arithmetic over unsigned 256-bit operands. Does not know about tokens or prices.
 * Invariants:
 * - Amounts a holder must PAY round up; proportional and informational results round down.
 * - Operands are uint256: negative input is a RangeError, an intermediate product above 2^256-1 is an OverflowError.
 * Side-effects: none
 * @public
 */

import { OverflowError } from "./errors";

/** Fixed-point unit for prices and amounts (18 decimals). */
export const WAD = 10n ** 18n;

/** Basis-point unit: 10_000 = 100%. */
export const BPS_DENOMINATOR = 10_000n;

export const MAX_UINT256 = 2n ** 256n - 1n;

function assertUint(value: bigint, label: string): void {
  if (value < 0n) {
    throw new RangeError(`${label} must be non-negative, got ${value}`);
  }
}

function checkedProduct(x: bigint, y: bigint, denominator: bigint): bigint {
  assertUint(x, "x");
  assertUint(y, "y");
  if (denominator <= 0n) {
    throw new RangeError(`denominator must be positive, got ${denominator}`);
  }
  const product = x * y;
  if (product > MAX_UINT256) {
    throw new OverflowError(product, MAX_UINT256);
  }
  return product;
}

/** floor(x * y / denominator) */
export function mulDivDown(x: bigint, y: bigint, denominator: bigint): bigint {
  return checkedProduct(x, y, denominator) / denominator;
}

/** ceil(x * y / denominator) */
export function mulDivUp(x: bigint, y: bigint, denominator: bigint): bigint {
  const product = checkedProduct(x, y, denominator);
  if (product === 0n) return 0n;
  return (product - 1n) / denominator + 1n;
}

export function mulWadDown(x: bigint, y: bigint): bigint {
  return mulDivDown(x, y, WAD);
}

/**
 * Payment for `amount` underlying at `price` (payment per 1e18 underlying).
 * Rounds up so the treasury is never short-changed by truncation.
 */
export function mulWadUp(x: bigint, y: bigint): bigint {
  return mulDivUp(x, y, WAD);
}

export function divWadDown(x: bigint, y: bigint): bigint {
  return mulDivDown(x, WAD, y);
}

export function divWadUp(x: bigint, y: bigint): bigint {
  return mulDivUp(x, WAD, y);
}

/** Applies a basis-point multiplier to a price, rounding up. */
export function applyMultiplier(price: bigint, multiplier: bigint): bigint {
  return mulDivUp(price, multiplier, BPS_DENOMINATOR);
}

export function minBigint(a: bigint, b: bigint): bigint {
  return a < b ? a : b;
}

export function absBigint(value: bigint): bigint {
  return value < 0n ? -value : value;
}
