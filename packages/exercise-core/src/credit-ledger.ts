// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@optex/exercise-core/credit-ledger`
 * Purpose: Per-account record of underlying owed by a module that could not deliver in full.
 * Scope: Journaled bookkeeping only; the owning module moves the tokens.
 * Invariants: Credit only grows by `add` and only drops to zero by `take`.
 * Side-effects: credit.recorded events
 * @public
 */

import type { Address } from "viem";

import type { EventSink } from "./events";
import type { Journal } from "./journal";
import { JournaledMap } from "./journal";
import { addressKey } from "./model";

export class CreditLedger {
  private readonly credits: JournaledMap<string, bigint>;

  constructor(
    private readonly module: Address,
    journal: Journal,
    private readonly events: EventSink
  ) {
    this.credits = new JournaledMap(journal);
  }

  creditOf(account: Address): bigint {
    return this.credits.get(addressKey(account)) ?? 0n;
  }

  add(account: Address, amount: bigint): void {
    if (amount === 0n) return;
    this.credits.set(addressKey(account), this.creditOf(account) + amount);
    this.events.emit({
      type: "credit.recorded",
      module: this.module,
      account,
      amount,
    });
  }

  /** Zero the account's credit and return what it was. */
  take(account: Address): bigint {
    const amount = this.creditOf(account);
    if (amount > 0n) {
      this.credits.delete(addressKey(account));
    }
    return amount;
  }
}
