/**
 * Vitest Configuration: @rowguard/platform
 *
 * Unit tests for the engine plus Fastify inject() tests for the adapter.
 * Nothing here opens a socket or touches a database.
 */

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@rowguard/platform",
    globals: true,
    environment: "node",
    include: ["src/**/*.test.ts"],
  },
});
