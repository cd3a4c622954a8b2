// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@optex/exercise-core/access`
 * Purpose: Owner checks and the non-reentrant lock shared by oracles, modules and the gateway.
 * Scope: Access-control helpers. Does not hold business state.
 * Invariants:
 * - The owner lives in a journaled value, so a reverted ownership transfer leaves the old owner in place.
 * - The reentrancy lock is released on both success and failure.
 * Side-effects: none
 * @public
 */

import type { Address } from "viem";

import { NotOwnerError, ReentrantCallError } from "./errors";
import type { EventSink } from "./events";
import type { Journal } from "./journal";
import { JournaledValue } from "./journal";
import { sameAddress } from "./model";

export class Ownable {
  private readonly ownerSlot: JournaledValue<Address>;

  constructor(
    private readonly contract: Address,
    owner: Address,
    private readonly journal: Journal,
    private readonly events: EventSink
  ) {
    this.ownerSlot = new JournaledValue(journal, owner);
  }

  get owner(): Address {
    return this.ownerSlot.get();
  }

  requireOwner(caller: Address): void {
    if (!sameAddress(caller, this.ownerSlot.get())) {
      throw new NotOwnerError(caller, this.contract);
    }
  }

  transferOwnership(caller: Address, newOwner: Address): void {
    this.journal.atomic(() => {
      this.requireOwner(caller);
      this.ownerSlot.set(newOwner);
      this.events.emit({
        type: "config.changed",
        contract: this.contract,
        setting: "owner",
        values: { owner: newOwner },
      });
    });
  }
}

export class ReentrancyLock {
  private entered = false;

  constructor(private readonly contract: Address) {}

  run<T>(fn: () => T): T {
    if (this.entered) {
      throw new ReentrantCallError(this.contract);
    }
    this.entered = true;
    try {
      return fn();
    } finally {
      this.entered = false;
    }
  }
}
