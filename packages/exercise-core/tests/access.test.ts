// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@optex/exercise-core/tests/access`
 * Purpose: Ownership checks, ownership transfer rollback, the reentrancy lock and the credit ledger.
 * Scope: Access helpers and CreditLedger with a real Journal.
 * Side-effects: none
 * @internal
 */

import { getAddress } from "viem";
import { describe, expect, it } from "vitest";

import { Ownable, ReentrancyLock } from "../src/access";
import { CreditLedger } from "../src/credit-ledger";
import { NotOwnerError, ReentrantCallError } from "../src/errors";
import { JournaledEventLog } from "../src/events";
import { Journal } from "../src/journal";

const CONTRACT = getAddress("0x0000000000000000000000000000000000003002");
const OWNER = getAddress("0x0000000000000000000000000000000000000001");
const ALICE = getAddress("0x0000000000000000000000000000000000000003");

describe("Ownable", () => {
  it("lets only the owner transfer ownership", () => {
    const journal = new Journal();
    const events = new JournaledEventLog(journal);
    const ownable = new Ownable(CONTRACT, OWNER, journal, events);

    expect(() => ownable.transferOwnership(ALICE, ALICE)).toThrow(NotOwnerError);
    ownable.transferOwnership(OWNER, ALICE);

    expect(ownable.owner).toBe(ALICE);
    expect(() => ownable.requireOwner(OWNER)).toThrow(NotOwnerError);
    expect(events.ofType("config.changed")).toEqual([
      {
        type: "config.changed",
        contract: CONTRACT,
        setting: "owner",
        values: { owner: ALICE },
      },
    ]);
  });

  it("restores the previous owner when the surrounding frame fails", () => {
    const journal = new Journal();
    const ownable = new Ownable(CONTRACT, OWNER, journal, new JournaledEventLog(journal));
    expect(() =>
      journal.atomic(() => {
        ownable.transferOwnership(OWNER, ALICE);
        throw new Error("later failure");
      })
    ).toThrow("later failure");
    expect(ownable.owner).toBe(OWNER);
  });
});

describe("ReentrancyLock", () => {
  it("rejects a nested entry and releases after failure", () => {
    const lock = new ReentrancyLock(CONTRACT);
    expect(() => lock.run(() => lock.run(() => 1))).toThrow(ReentrantCallError);
    expect(() =>
      lock.run(() => {
        throw new Error("inner");
      })
    ).toThrow("inner");
    expect(lock.run(() => 42)).toBe(42);
  });
});

describe("CreditLedger", () => {
  it("accumulates credit and zeroes it on take", () => {
    const journal = new Journal();
    const events = new JournaledEventLog(journal);
    const credits = new CreditLedger(CONTRACT, journal, events);

    credits.add(ALICE, 60n);
    credits.add(ALICE, 0n);
    credits.add(ALICE, 5n);

    expect(credits.creditOf(ALICE)).toBe(65n);
    expect(events.ofType("credit.recorded").map((e) => e.amount)).toEqual([
      60n,
      5n,
    ]);
    expect(credits.take(ALICE)).toBe(65n);
    expect(credits.creditOf(ALICE)).toBe(0n);
    expect(credits.take(ALICE)).toBe(0n);
  });
});
