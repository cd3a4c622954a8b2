// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@optex/exercise-core/ports/streaming`
 * Purpose: External time-release service that locks or vests delivered tokens.
 * Scope: Interface only. The core only creates streams; withdraw/cancel belong to recipients and senders.
 * Invariants:
 * - Creation pulls `amount` of `token` from `sender` by allowance granted to the service.
 * - Segmented streams release the sum of their segment amounts, which must equal `amount`.
 * Side-effects: none (interface only)
 * @public
 */

import type { Address } from "viem";

import type { StreamSegment } from "../model";

export interface CreateLinearStreamParams {
  readonly recipient: Address;
  readonly token: Address;
  readonly amount: bigint;
  /** Seconds from creation until anything is withdrawable */
  readonly cliffDuration: bigint;
  /** Seconds from creation until everything is withdrawable */
  readonly totalDuration: bigint;
}

export interface CreateSegmentedStreamParams {
  readonly recipient: Address;
  readonly token: Address;
  readonly amount: bigint;
  readonly segments: readonly StreamSegment[];
}

export interface StreamingService {
  readonly address: Address;

  createLinearStream(sender: Address, params: CreateLinearStreamParams): bigint;

  createSegmentedStream(
    sender: Address,
    params: CreateSegmentedStreamParams
  ): bigint;

  withdrawableAmountOf(streamId: bigint): bigint;

  withdraw(caller: Address, streamId: bigint, to: Address, amount: bigint): void;

  /** Refunds the unstreamed remainder to the sender; returns the refund */
  cancel(caller: Address, streamId: bigint): bigint;
}
