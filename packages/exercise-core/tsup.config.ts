// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@optex/exercise-core/tsup.config`
 * Purpose: Build configuration for the exercise-core package.
 * Scope: Build tooling only. Does not contain runtime code.
 * Invariants: Output is ESM; consumers inside the workspace import the TypeScript sources directly.
 * Side-effects: IO
 * @internal
 */

import { defineConfig } from "tsup";

export const tsupConfig = defineConfig({
  entry: ["src/index.ts"],
  format: ["esm"],
  dts: true,
  clean: true,
  sourcemap: true,
  platform: "neutral",
});

export default tsupConfig;
