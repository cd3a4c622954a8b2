// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/memory/token-ledger`
 * Purpose: Multi-token balance and allowance book for simulated deployments and tests.
 * Scope: Implements TokenLedger plus mint/burn/totalSupply. Does not model fees on transfer or rebasing.
 * Invariants:
 * - Every write goes through the shared Journal, so a failed exercise restores balances and allowances.
 * - Sum of balances per token equals totalSupply(token).
 * - An allowance of MAX_UINT256 is never decremented.
 * Side-effects: none (in-memory state)
 * Links: Implements TokenLedger port
 * @public
 */

import {
  addressKey,
  InsufficientAllowanceError,
  InsufficientBalanceError,
  type Journal,
  JournaledMap,
  MAX_UINT256,
} from "@optex/exercise-core";
import type { Address } from "viem";

import type { TokenLedger } from "@/ports";

export class InMemoryTokenLedger implements TokenLedger {
  private readonly balances: JournaledMap<string, bigint>;
  private readonly allowances: JournaledMap<string, bigint>;
  private readonly supplies: JournaledMap<string, bigint>;

  constructor(journal: Journal) {
    this.balances = new JournaledMap(journal);
    this.allowances = new JournaledMap(journal);
    this.supplies = new JournaledMap(journal);
  }

  balanceOf(token: Address, account: Address): bigint {
    return this.balances.get(balanceKey(token, account)) ?? 0n;
  }

  allowance(token: Address, owner: Address, spender: Address): bigint {
    return this.allowances.get(allowanceKey(token, owner, spender)) ?? 0n;
  }

  totalSupply(token: Address): bigint {
    return this.supplies.get(addressKey(token)) ?? 0n;
  }

  approve(
    token: Address,
    owner: Address,
    spender: Address,
    amount: bigint
  ): void {
    assertAmount(amount);
    this.allowances.set(allowanceKey(token, owner, spender), amount);
  }

  transfer(token: Address, from: Address, to: Address, amount: bigint): void {
    assertAmount(amount);
    this.debit(token, from, amount);
    this.credit(token, to, amount);
  }

  transferFrom(
    token: Address,
    spender: Address,
    from: Address,
    to: Address,
    amount: bigint
  ): void {
    assertAmount(amount);
    const allowed = this.allowance(token, from, spender);
    if (allowed < amount) {
      throw new InsufficientAllowanceError(token, from, spender, allowed, amount);
    }
    this.debit(token, from, amount);
    if (allowed !== MAX_UINT256) {
      this.allowances.set(allowanceKey(token, from, spender), allowed - amount);
    }
    this.credit(token, to, amount);
  }

  mint(token: Address, to: Address, amount: bigint): void {
    assertAmount(amount);
    this.credit(token, to, amount);
    this.supplies.set(addressKey(token), this.totalSupply(token) + amount);
  }

  burn(token: Address, from: Address, amount: bigint): void {
    assertAmount(amount);
    this.debit(token, from, amount);
    this.supplies.set(addressKey(token), this.totalSupply(token) - amount);
  }

  private credit(token: Address, account: Address, amount: bigint): void {
    this.balances.set(
      balanceKey(token, account),
      this.balanceOf(token, account) + amount
    );
  }

  private debit(token: Address, account: Address, amount: bigint): void {
    const balance = this.balanceOf(token, account);
    if (balance < amount) {
      throw new InsufficientBalanceError(token, account, balance, amount);
    }
    this.balances.set(balanceKey(token, account), balance - amount);
  }
}

function balanceKey(token: Address, account: Address): string {
  return `${addressKey(token)}:${addressKey(account)}`;
}

function allowanceKey(token: Address, owner: Address, spender: Address): string {
  return `${addressKey(token)}:${addressKey(owner)}:${addressKey(spender)}`;
}

function assertAmount(amount: bigint): void {
  if (amount < 0n) {
    throw new RangeError(`Token amount must be non-negative, got ${amount}`);
  }
}
