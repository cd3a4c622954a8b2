// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@optex/exercise-core/exercise/credited-exercise`
 * Purpose: Base for modules that deliver from their own underlying balance and owe the shortfall as claimable credit.
 * Scope: Delivery split, credit bookkeeping and the manual `claim`. Pricing stays in subclasses.
 * Invariants:
 * - delivered + credited == amount for every exercise.
 * - Credit is written before any transfer in the same call.
 * - `claim` pays the caller's whole credit or nothing.
 * Side-effects: IO (underlying transfers, credit events)
 * @public
 */

import type { Address } from "viem";

import { CreditLedger } from "../credit-ledger";
import { minBigint } from "../math";
import { BaseExercise, type BaseExerciseConfig } from "./base-exercise";

export interface DeliverySplit {
  readonly deliverable: bigint;
  readonly credited: bigint;
}

export abstract class CreditedExercise extends BaseExercise {
  private readonly credits: CreditLedger;

  protected constructor(config: BaseExerciseConfig) {
    super(config);
    this.credits = new CreditLedger(config.address, config.journal, config.events);
  }

  creditOf(account: Address): bigint {
    return this.credits.creditOf(account);
  }

  /** Pay the caller's full credit to `to`. Returns 0 without transferring when there is none. */
  claim(caller: Address, to: Address): bigint {
    return this.guarded(() => {
      const amount = this.credits.take(caller);
      if (amount === 0n) return 0n;
      this.ledger.transfer(this.underlyingToken, this.address, to, amount);
      this.events.emit({
        type: "credit.claimed",
        module: this.address,
        account: caller,
        to,
        amount,
      });
      return amount;
    });
  }

  /**
   * Cap `amount` at the module's underlying balance and credit the rest to `recipient`.
   */
  protected splitDelivery(recipient: Address, amount: bigint): DeliverySplit {
    const balance = this.ledger.balanceOf(this.underlyingToken, this.address);
    const deliverable = minBigint(amount, balance);
    const credited = amount - deliverable;
    this.credits.add(recipient, credited);
    return { deliverable, credited };
  }

  /** Immediate delivery used by the discount and fixed-window modules. */
  protected deliverNow(recipient: Address, amount: bigint): DeliverySplit {
    const split = this.splitDelivery(recipient, amount);
    if (split.deliverable > 0n) {
      this.ledger.transfer(
        this.underlyingToken,
        this.address,
        recipient,
        split.deliverable
      );
    }
    return split;
  }
}
