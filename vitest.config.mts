// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `vitest.config`
 * Purpose: Vitest runner configuration for the core package tests and the app-layer tests.
 * Scope: Single in-process run; no infrastructure, network or timers.
 * Invariants: Coverage disabled by default; v8 provider when enabled.
 * Side-effects: file system (coverage reports written to ./coverage/ when enabled)
 * Notes: vite-tsconfig-paths resolves `@/`, `@tests/` and `@optex/exercise-core` from tsconfig.json; tests import describe/it/expect explicitly.
 * @public
 */

import tsconfigPaths from "vite-tsconfig-paths";
import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    setupFiles: ["./tests/setup.ts"],
    include: [
      "tests/**/*.{test,spec}.ts",
      "packages/*/tests/**/*.{test,spec}.ts",
    ],
    exclude: ["node_modules", "dist", "tests/_fakes/**"],
    coverage: {
      enabled: false,
      provider: "v8",
      reporter: ["text", "json-summary", "html"],
      reportsDirectory: "coverage",
      exclude: [
        "node_modules/",
        "tests/",
        "dist/",
        "**/*.d.ts",
        "**/*.config.*",
        "**/index.ts",
      ],
    },
    // everything runs synchronously against in-memory state
    testTimeout: 5_000,
  },
  plugins: [tsconfigPaths()],
});
