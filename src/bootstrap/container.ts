// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bootstrap/container`
 * Purpose: Composition root: wires the TWAP oracle, the options token and a discount exercise module against injected collaborators.
 * Scope: Build one deployment and allow-list its module. Does not fund modules or seed liquidity.
 * Invariants:
 * - The module is allow-listed on the gateway before createDeployment returns.
 * - Gateway, oracle and module share the caller's journal and event sink.
 * Side-effects: IO (emits the deployment.ready log)
 * Notes: Mirrors the deploy order: oracle, options token, discount module, setExerciseContract.
 * Links: deploymentConfigFromEnv maps serverEnv() onto DeploymentConfig; createLocalDeployment wires the in-memory collaborators.
 * @public
 */

import {
  DiscountExercise,
  type EventSink,
  Journal,
  JournaledEventLog,
  OptionsToken,
  PairTwapOracle,
} from "@optex/exercise-core";
import type { Address } from "viem";

import {
  InMemoryRouter,
  InMemoryStreamingService,
  InMemoryTokenLedger,
  type VolatilePair,
} from "@/adapters/memory";
import { SystemClock } from "@/adapters/server";
import type { Clock, TokenLedger, TwapPairSource } from "@/ports";
import { type ServerEnv, serverEnv } from "@/shared/env";
import {
  createOperationContext,
  EVENT_NAMES,
  type Logger,
  logEvent,
  makeLogger,
} from "@/shared/observability";

/** Addresses the simulated contracts are deployed at */
export interface DeploymentAddresses {
  readonly gateway: Address;
  readonly oracle: Address;
  readonly discountExercise: Address;
}

export interface DeploymentConfig {
  readonly name: string;
  readonly symbol: string;
  readonly owner: Address;
  readonly tokenAdmin: Address;
  readonly paymentToken: Address;
  readonly underlyingToken: Address;
  readonly oracleSecs: bigint;
  readonly oracleMinPrice: bigint;
  readonly multiplier: bigint;
  readonly feeRecipients: readonly Address[];
  readonly feeBps: readonly bigint[];
  readonly addresses: DeploymentAddresses;
}

export interface DeploymentDeps {
  readonly ledger: TokenLedger;
  readonly clock: Clock;
  readonly journal: Journal;
  readonly events: EventSink;
  /** Volatile payment/underlying pair the oracle reads */
  readonly pair: TwapPairSource;
  readonly log: Logger;
}

export interface Deployment {
  readonly oracle: PairTwapOracle;
  readonly gateway: OptionsToken;
  readonly discountExercise: DiscountExercise;
}

export function deploymentConfigFromEnv(
  env: ServerEnv,
  addresses: DeploymentAddresses
): DeploymentConfig {
  return {
    name: env.OT_NAME,
    symbol: env.OT_SYMBOL,
    owner: env.OWNER,
    tokenAdmin: env.OT_TOKEN_ADMIN,
    paymentToken: env.OT_PAYMENT_TOKEN,
    underlyingToken: env.OT_UNDERLYING_TOKEN,
    oracleSecs: env.ORACLE_SECS,
    oracleMinPrice: env.ORACLE_MIN_PRICE,
    multiplier: env.MULTIPLIER,
    feeRecipients: env.FEE_RECIPIENTS,
    feeBps: env.FEE_BPS,
    addresses,
  };
}

export function createDeployment(
  config: DeploymentConfig,
  deps: DeploymentDeps
): Deployment {
  const { journal, events } = deps;

  const oracle = new PairTwapOracle({
    address: config.addresses.oracle,
    pair: deps.pair,
    underlyingToken: config.underlyingToken,
    owner: config.owner,
    secs: config.oracleSecs,
    minPrice: config.oracleMinPrice,
    journal,
    events,
  });

  const gateway = new OptionsToken({
    address: config.addresses.gateway,
    name: config.name,
    symbol: config.symbol,
    owner: config.owner,
    tokenAdmin: config.tokenAdmin,
    journal,
    events,
  });

  const discountExercise = new DiscountExercise({
    address: config.addresses.discountExercise,
    gateway,
    owner: config.owner,
    paymentToken: config.paymentToken,
    underlyingToken: config.underlyingToken,
    feeRecipients: config.feeRecipients,
    feeBps: config.feeBps,
    oracle,
    multiplier: config.multiplier,
    ledger: deps.ledger,
    clock: deps.clock,
    journal,
    events,
  });

  gateway.setExerciseContract(config.owner, discountExercise, true);

  const ctx = createOperationContext(
    { baseLog: deps.log, clock: deps.clock },
    { operation: "deploy" }
  );
  logEvent(ctx.log, EVENT_NAMES.DEPLOYMENT_READY, {
    reqId: ctx.reqId,
    gateway: gateway.address,
    modules: [discountExercise.address],
  });

  return { oracle, gateway, discountExercise };
}

/** Fixed addresses of a local simulated deployment */
export const LOCAL_ADDRESSES = {
  gateway: "0x0000000000000000000000000000000000000a01",
  oracle: "0x0000000000000000000000000000000000000a02",
  discountExercise: "0x0000000000000000000000000000000000000a03",
  router: "0x0000000000000000000000000000000000000a04",
  pair: "0x0000000000000000000000000000000000000a05",
  streaming: "0x0000000000000000000000000000000000000a06",
} as const satisfies Record<string, Address>;

export interface LocalDeployment extends Deployment {
  readonly journal: Journal;
  readonly events: JournaledEventLog;
  readonly ledger: InMemoryTokenLedger;
  readonly router: InMemoryRouter;
  readonly pair: VolatilePair;
  readonly streaming: InMemoryStreamingService;
  readonly clock: Clock;
  readonly log: Logger;
}

/**
 * Deployment over in-memory collaborators, configured from the environment.
 * The pool starts empty; its TWAP is readable once seeded and observed.
 */
export function createLocalDeployment(
  env: ServerEnv = serverEnv(),
  clock: Clock = new SystemClock(),
  log: Logger = makeLogger()
): LocalDeployment {
  const journal = new Journal();
  const events = new JournaledEventLog(journal);
  const ledger = new InMemoryTokenLedger(journal);
  const router = new InMemoryRouter({
    address: LOCAL_ADDRESSES.router,
    ledger,
    clock,
    journal,
  });
  const pair = router.createPair(
    env.OT_PAYMENT_TOKEN,
    env.OT_UNDERLYING_TOKEN,
    LOCAL_ADDRESSES.pair
  );
  const streaming = new InMemoryStreamingService({
    address: LOCAL_ADDRESSES.streaming,
    ledger,
    clock,
    journal,
  });

  const deployment = createDeployment(
    deploymentConfigFromEnv(env, LOCAL_ADDRESSES),
    { ledger, clock, journal, events, pair, log }
  );
  return {
    ...deployment,
    journal,
    events,
    ledger,
    router,
    pair,
    streaming,
    clock,
    log,
  };
}
