// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/_fakes`
 * Purpose: Test fakes and builders for deterministic exercise tests.
 * Scope: Re-exports fakes. Does NOT export real implementations.
 * Side-effects: none
 * Notes: Import fakes from here to replace wall-clock time and wire simulated chains.
 * Links: tests/setup.ts
 * @public
 */

export { ADDR, testAddress } from "./addresses";
export { FakeClock, TEST_START_TIME } from "./fake-clock";
export {
  type CapturedLogs,
  captureLogs,
  type LogLine,
  makeTestCtx,
  TEST_REQ_ID,
  type TestCtxOptions,
} from "./test-context";
export {
  createDiscountExercise,
  createFixedWindowExercise,
  createLinearVestedExercise,
  createLockedLpExercise,
  createOracle,
  createSegmentedVestedExercise,
  createWorld,
  fundHolder,
  seedDefaultPool,
  seedPool,
  seedPricedPool,
  type TestWorld,
} from "./world";
