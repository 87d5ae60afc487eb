/**
 * Application Configuration: Test Suite
 */

import { describe, it, expect } from "vitest";
import { loadConfig } from "./index.js";

describe("loadConfig", () => {
  it("applies defaults for an empty environment", () => {
    expect(loadConfig({})).toEqual({
      environment: "development",
      runtimeConfigPath: "config/runtime-config.json",
      metadataPath: "config/metadata.json",
      roleHeader: "x-api-role",
      auth: { jwtSecret: undefined, issuer: undefined, audience: undefined },
      api: { port: 4000, host: "0.0.0.0" },
    });
  });

  it("reads every variable", () => {
    const config = loadConfig({
      NODE_ENV: "production",
      RUNTIME_CONFIG_PATH: "/etc/rowguard/runtime.json",
      METADATA_PATH: "/etc/rowguard/metadata.json",
      ROLE_HEADER: "X-Role",
      JWT_SECRET: "test-secret",
      JWT_ISSUER: "https://issuer.test",
      JWT_AUDIENCE: "rowguard",
      API_PORT: "8080",
      API_HOST: "127.0.0.1",
    });

    expect(config).toEqual({
      environment: "production",
      runtimeConfigPath: "/etc/rowguard/runtime.json",
      metadataPath: "/etc/rowguard/metadata.json",
      roleHeader: "x-role",
      auth: { jwtSecret: "test-secret", issuer: "https://issuer.test", audience: "rowguard" },
      api: { port: 8080, host: "127.0.0.1" },
    });
  });

  it("treats blank values as unset", () => {
    const config = loadConfig({ JWT_SECRET: "   ", API_PORT: "" });
    expect(config.auth.jwtSecret).toBeUndefined();
    expect(config.api.port).toBe(4000);
  });

  it.each(["abc", "0", "70000", "80.5"])("rejects API_PORT=%s", (port) => {
    expect(() => loadConfig({ API_PORT: port })).toThrow(
      `API_PORT must be an integer between 1 and 65535, got "${port}".`
    );
  });
});
