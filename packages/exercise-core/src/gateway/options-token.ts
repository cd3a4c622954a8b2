// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@optex/exercise-core/gateway/options-token`
 * Purpose: The options token: holders burn it through an allow-listed exercise module to buy the underlying.
 * Scope: Option balances, admin mint, the module allow-list and exercise routing. Pricing and delivery live in the modules.
 * Invariants:
 * - totalSupply grows only by mint and shrinks only by the burn inside exercise.
 * - Burn, module call and events commit together or not at all.
 * - A module removed from the allow-list can no longer be exercised, even by direct call.
 * Side-effects: IO (events; module calls move collaborator tokens)
 * @public
 */

import type { Address, Hex } from "viem";

import { Ownable, ReentrancyLock } from "../access";
import {
  InsufficientBalanceError,
  NotActiveModuleError,
  NotTokenAdminError,
} from "../errors";
import type { EventSink } from "../events";
import type { ExerciseModule } from "../exercise/exercise-module";
import type { Journal } from "../journal";
import { JournaledMap, JournaledValue } from "../journal";
import { addressKey, type ExerciseResult, sameAddress } from "../model";
import type { ExerciseGateway } from "../ports";

export interface OptionsTokenConfig {
  readonly address: Address;
  readonly name: string;
  readonly symbol: string;
  readonly owner: Address;
  /** Only account allowed to mint */
  readonly tokenAdmin: Address;
  readonly journal: Journal;
  readonly events: EventSink;
}

export interface ExerciseOptionsInput {
  readonly amount: bigint;
  readonly recipient: Address;
  readonly module: Address;
  readonly params: Hex;
}

export class OptionsToken implements ExerciseGateway {
  readonly address: Address;
  readonly name: string;
  readonly symbol: string;
  readonly tokenAdmin: Address;

  private readonly journal: Journal;
  private readonly events: EventSink;
  private readonly ownable: Ownable;
  private readonly lock: ReentrancyLock;
  private readonly balances: JournaledMap<string, bigint>;
  private readonly supply: JournaledValue<bigint>;
  private readonly modules: JournaledMap<string, ExerciseModule>;

  constructor(config: OptionsTokenConfig) {
    this.address = config.address;
    this.name = config.name;
    this.symbol = config.symbol;
    this.tokenAdmin = config.tokenAdmin;
    this.journal = config.journal;
    this.events = config.events;
    this.ownable = new Ownable(
      config.address,
      config.owner,
      config.journal,
      config.events
    );
    this.lock = new ReentrancyLock(config.address);
    this.balances = new JournaledMap(config.journal);
    this.supply = new JournaledValue(config.journal, 0n);
    this.modules = new JournaledMap(config.journal);
  }

  get owner(): Address {
    return this.ownable.owner;
  }

  totalSupply(): bigint {
    return this.supply.get();
  }

  balanceOf(account: Address): bigint {
    return this.balances.get(addressKey(account)) ?? 0n;
  }

  isExerciseContract(module: Address): boolean {
    return this.modules.has(addressKey(module));
  }

  mint(caller: Address, to: Address, amount: bigint): void {
    this.journal.atomic(() => {
      if (!sameAddress(caller, this.tokenAdmin)) {
        throw new NotTokenAdminError(caller);
      }
      this.credit(to, amount);
      this.supply.set(this.supply.get() + amount);
      this.events.emit({ type: "gateway.minted", to, amount });
    });
  }

  transfer(caller: Address, to: Address, amount: bigint): void {
    this.journal.atomic(() => {
      this.debit(caller, amount);
      this.credit(to, amount);
    });
  }

  setExerciseContract(
    caller: Address,
    module: ExerciseModule,
    isActive: boolean
  ): void {
    this.journal.atomic(() => {
      this.ownable.requireOwner(caller);
      const key = addressKey(module.address);
      if (isActive) {
        this.modules.set(key, module);
      } else {
        this.modules.delete(key);
      }
      this.events.emit({
        type: "gateway.exercise_contract_set",
        module: module.address,
        isActive,
      });
    });
  }

  /**
   * Burn `amount` options from `caller` and settle them through `input.module`.
   *
   * @throws NotActiveModuleError when the module is not allow-listed
   * @throws InsufficientBalanceError when the caller holds fewer options
   */
  exercise(caller: Address, input: ExerciseOptionsInput): ExerciseResult {
    return this.lock.run(() =>
      this.journal.atomic(() => {
        const module = this.modules.get(addressKey(input.module));
        if (!module) {
          throw new NotActiveModuleError(input.module);
        }

        this.debit(caller, input.amount);
        this.supply.set(this.supply.get() - input.amount);

        const result = module.exercise(this.address, {
          from: caller,
          amount: input.amount,
          recipient: input.recipient,
          params: input.params,
        });

        this.events.emit({
          type: "gateway.exercised",
          sender: caller,
          recipient: input.recipient,
          module: module.address,
          amount: input.amount,
          data0: result.data0,
          data1: result.data1,
          data2: result.data2,
        });
        return result;
      })
    );
  }

  transferOwnership(caller: Address, newOwner: Address): void {
    this.ownable.transferOwnership(caller, newOwner);
  }

  private credit(account: Address, amount: bigint): void {
    assertAmount(amount);
    this.balances.set(addressKey(account), this.balanceOf(account) + amount);
  }

  private debit(account: Address, amount: bigint): void {
    assertAmount(amount);
    const balance = this.balanceOf(account);
    if (balance < amount) {
      throw new InsufficientBalanceError(this.address, account, balance, amount);
    }
    this.balances.set(addressKey(account), balance - amount);
  }
}

function assertAmount(amount: bigint): void {
  if (amount < 0n) {
    throw new RangeError(`Option amount must be non-negative, got ${amount}`);
  }
}
