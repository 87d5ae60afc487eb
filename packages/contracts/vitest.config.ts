/**
 * Vitest Configuration: @rowguard/contracts
 *
 * Pure TypeScript tests. No DOM, no database, no network.
 * These tests validate the configuration schema and operation helpers.
 */

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@rowguard/contracts",
    globals: true,
    environment: "node",
    include: ["src/**/*.test.ts"],
  },
});
