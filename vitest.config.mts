// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `vitest.config`
 * Purpose: Vitest runner configuration for every workspace's unit tests.
 * Scope: Discovers package and service tests. No infrastructure required (no DB, no network).
 * Invariants: Tests import describe/it/expect/vi from "vitest" (globals off); fixtures are never collected as tests.
 * Side-effects: none
 * Links: packages/<pkg>/tests/**, services/<svc>/tests/**
 * @public
 */

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: false,
    environment: "node",
    include: [
      "packages/*/tests/**/*.test.ts",
      "services/*/tests/**/*.test.ts",
    ],
    exclude: ["node_modules", "dist", "**/fixtures.ts", "**/_fakes/**"],
    testTimeout: 10_000,
    hookTimeout: 10_000,
  },
});
