// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@optex/exercise-core/fees`
 * Purpose: Split an exercise payment across fee recipients by basis-point weight and pull it from the payer.
 * Scope: Schedule validation, share computation and the pull. Does not escrow; each share moves payer → recipient directly.
 * Invariants:
 * - Each share is floor(total * bps / 10000).
 * - When the weights total exactly 10000 the rounding dust goes to the last recipient, so shares sum to `total`.
 * - Weights never total more than 10000, so the payer is never pulled for more than `total`.
 * - A failing transfer aborts the surrounding exercise.
 * Side-effects: IO (token transfers via TokenLedger, one fees.distributed event)
 * @public
 */

import type { Address } from "viem";

import {
  FeeArrayLengthMismatchError,
  InvalidFeeScheduleError,
} from "./errors";
import type { EventSink } from "./events";
import { BPS_DENOMINATOR, mulDivDown } from "./math";
import type { FeeSchedule } from "./model";
import type { TokenLedger } from "./ports";

export interface FeeShare {
  readonly recipient: Address;
  readonly amount: bigint;
}

/**
 * Validate raw recipient/weight arrays and freeze them into a FeeSchedule.
 */
export function toFeeSchedule(
  recipients: readonly Address[],
  bps: readonly bigint[]
): FeeSchedule {
  if (recipients.length !== bps.length) {
    throw new FeeArrayLengthMismatchError(recipients.length, bps.length);
  }
  if (recipients.length === 0) {
    throw new InvalidFeeScheduleError("at least one recipient is required");
  }

  let total = 0n;
  for (const weight of bps) {
    if (weight < 0n || weight > BPS_DENOMINATOR) {
      throw new InvalidFeeScheduleError(`weight ${weight} is outside [0, 10000]`);
    }
    total += weight;
  }
  if (total > BPS_DENOMINATOR) {
    throw new InvalidFeeScheduleError(`weights total ${total}, above 10000`);
  }

  return { recipients: [...recipients], bps: [...bps] };
}

export function feeScheduleTotalBps(schedule: FeeSchedule): bigint {
  return schedule.bps.reduce((sum, weight) => sum + weight, 0n);
}

export function splitFees(
  totalAmount: bigint,
  schedule: FeeSchedule
): FeeShare[] {
  const shares = schedule.recipients.map((recipient, i) => ({
    recipient,
    amount: mulDivDown(totalAmount, schedule.bps[i] ?? 0n, BPS_DENOMINATOR),
  }));

  if (feeScheduleTotalBps(schedule) === BPS_DENOMINATOR && shares.length > 0) {
    const distributed = shares.reduce((sum, s) => sum + s.amount, 0n);
    const last = shares.length - 1;
    const lastShare = shares[last];
    if (lastShare) {
      shares[last] = {
        recipient: lastShare.recipient,
        amount: lastShare.amount + (totalAmount - distributed),
      };
    }
  }

  return shares;
}

export interface DistributeFeesInput {
  readonly ledger: TokenLedger;
  readonly events: EventSink;
  /** Module pulling the payment (holds the payer's allowance) */
  readonly spender: Address;
  readonly token: Address;
  readonly from: Address;
  readonly totalAmount: bigint;
  readonly schedule: FeeSchedule;
}

export function distributeFeesFrom(input: DistributeFeesInput): FeeShare[] {
  const shares = splitFees(input.totalAmount, input.schedule);
  for (const share of shares) {
    if (share.amount === 0n) continue;
    input.ledger.transferFrom(
      input.token,
      input.spender,
      input.from,
      share.recipient,
      share.amount
    );
  }
  input.events.emit({
    type: "fees.distributed",
    module: input.spender,
    token: input.token,
    recipients: input.schedule.recipients,
    bps: input.schedule.bps,
    totalAmount: input.totalAmount,
  });
  return shares;
}
