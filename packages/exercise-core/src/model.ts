// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@optex/exercise-core/model`
 * Purpose: Domain types shared by oracles, exercise modules and the gateway.
 * Scope: Pure types, constants and address helpers. Does not contain business logic.
 * Invariants: All amounts, prices, timestamps and basis points are bigint; timestamps are unix seconds.
 * Side-effects: none
 * @public
 */

import { type Address, getAddress, type Hex, isAddressEqual } from "viem";

/** Module kinds, one per delivery strategy */
export const EXERCISE_MODULE_KINDS = [
  "discount",
  "fixed-window",
  "locked-lp",
  "vested-linear",
  "vested-segmented",
] as const;
export type ExerciseModuleKind = (typeof EXERCISE_MODULE_KINDS)[number];

export interface TokenPair {
  readonly paymentToken: Address;
  readonly underlyingToken: Address;
}

/** Ordered (recipient, basis points) pairs */
export interface FeeSchedule {
  readonly recipients: readonly Address[];
  readonly bps: readonly bigint[];
}

/** What the gateway hands to a module */
export interface ExerciseRequest {
  readonly from: Address;
  readonly amount: bigint;
  readonly recipient: Address;
  /** ABI-encoded module-specific params; opaque to the gateway */
  readonly params: Hex;
}

/** Settlement receipt; the meaning of data0..2 is module-specific */
export interface ExerciseResult {
  readonly paymentAmount: bigint;
  readonly data0: Address;
  readonly data1: bigint;
  readonly data2: bigint;
}

/** Owner-configured piece of a release curve */
export interface SegmentConfig {
  /** 18-decimal exponent of the segment's release curve (1e18 = linear) */
  readonly exponent: bigint;
  /** Seconds */
  readonly duration: bigint;
}

/** Segment handed to the streaming service */
export interface StreamSegment extends SegmentConfig {
  readonly amount: bigint;
}

/** Key for address-indexed maps; comparison is case-insensitive */
export function addressKey(address: Address): string {
  return address.toLowerCase();
}

export function sameAddress(a: Address, b: Address): boolean {
  return isAddressEqual(a, b);
}

/** Checksums raw input; throws on malformed addresses. */
export function toAddress(raw: string): Address {
  return getAddress(raw);
}
