// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@optex/exercise-core/ports/token-ledger`
 * Purpose: Fungible token balances as an injected capability instead of globally reachable state.
 * Scope: Multi-token balance, allowance and transfer interface. Does not mint or burn (adapters may).
 * Invariants:
 * - Transfers are all-or-nothing; a short balance throws InsufficientBalanceError, a short allowance InsufficientAllowanceError.
 * - `transfer` moves the caller's own tokens; `transferFrom` spends an allowance granted to `spender`.
 * Side-effects: none (interface only)
 * Notes: Tokens are fixed 18-decimal with no transfer fee or rebasing.
 * @public
 */

import type { Address } from "viem";

export interface TokenLedger {
  balanceOf(token: Address, account: Address): bigint;

  allowance(token: Address, owner: Address, spender: Address): bigint;

  approve(token: Address, owner: Address, spender: Address, amount: bigint): void;

  transfer(token: Address, from: Address, to: Address, amount: bigint): void;

  transferFrom(
    token: Address,
    spender: Address,
    from: Address,
    to: Address,
    amount: bigint
  ): void;
}
