/**
 * Vitest Configuration: @rowguard/api
 *
 * API integration tests using Fastify's inject() method.
 * Tests the full request/response cycle without a real HTTP server.
 */

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@rowguard/api",
    globals: true,
    environment: "node",
    include: ["src/**/*.test.ts"],
  },
});
