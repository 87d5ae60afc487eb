/**
 * Auth Module Tests
 *
 * Tests DevAuthProvider, JwtAuthProvider against locally signed tokens,
 * and initAuthProvider configuration-based selection.
 */

import { describe, it, expect, afterEach } from "vitest";
import { SignJWT, type JWTPayload } from "jose";
import { DevAuthProvider, DEV_USER_ID } from "./dev-provider.js";
import { JwtAuthProvider } from "./jwt-provider.js";
import { initAuthProvider, getAuthProvider, setAuthProvider, resetAuthProvider } from "./index.js";

const SECRET = "test-secret-with-enough-length-for-hs256";

async function sign(
  payload: JWTPayload,
  options: { secret?: string; issuer?: string; expiresAt?: number } = {}
): Promise<string> {
  let jwt = new SignJWT(payload)
    .setProtectedHeader({ alg: "HS256" })
    .setIssuedAt()
    .setExpirationTime(options.expiresAt ?? "5m");
  if (options.issuer) jwt = jwt.setIssuer(options.issuer);
  return jwt.sign(new TextEncoder().encode(options.secret ?? SECRET));
}

describe("DevAuthProvider", () => {
  const provider = new DevAuthProvider(["admin", "Writer"]);

  it("verifyToken returns the dev identity for any token", async () => {
    const identity = await provider.verifyToken("any-token");
    expect(identity).toEqual({
      authenticationType: "dev",
      claims: [
        { type: "sub", value: DEV_USER_ID, valueType: "string" },
        { type: "roles", value: "admin", valueType: "string" },
        { type: "roles", value: "Writer", valueType: "string" },
      ],
    });
  });

  it("verifyToken returns null for an empty token", async () => {
    expect(await provider.verifyToken("")).toBeNull();
  });

  it("getPublicConfig returns dev provider info", () => {
    const config = provider.getPublicConfig();
    expect(config.provider).toBe("dev");
    expect(config.message).toContain("Development mode");
  });
});

describe("JwtAuthProvider", () => {
  const provider = new JwtAuthProvider({ secret: SECRET });

  it("flattens a valid token into a verified identity", async () => {
    const token = await sign({ sub: "u1", roles: ["Writer", "Reader"], email_verified: true });
    const identity = await provider.verifyToken(token);

    expect(identity?.authenticationType).toBe("Bearer");
    const claims = identity?.claims ?? [];
    expect(claims.filter((c) => c.type === "roles").map((c) => c.value)).toEqual(["Writer", "Reader"]);
    expect(claims.find((c) => c.type === "sub")).toEqual({ type: "sub", value: "u1", valueType: "string" });
    expect(claims.find((c) => c.type === "email_verified")).toEqual({
      type: "email_verified",
      value: "true",
      valueType: "boolean",
    });
    expect(claims.find((c) => c.type === "exp")?.valueType).toBe("number");
  });

  it("rejects a token signed with another secret", async () => {
    const token = await sign({ sub: "u1" }, { secret: "other-test-secret-with-enough-length" });
    expect(await provider.verifyToken(token)).toBeNull();
  });

  it("rejects an expired token", async () => {
    const token = await sign({ sub: "u1" }, { expiresAt: Math.floor(Date.now() / 1000) - 60 });
    expect(await provider.verifyToken(token)).toBeNull();
  });

  it("rejects garbage and empty tokens", async () => {
    expect(await provider.verifyToken("not-a-jwt")).toBeNull();
    expect(await provider.verifyToken("")).toBeNull();
  });

  it("checks the issuer when configured", async () => {
    const strict = new JwtAuthProvider({ secret: SECRET, issuer: "https://issuer.test" });
    expect(await strict.verifyToken(await sign({ sub: "u1" }, { issuer: "https://issuer.test" }))).not.toBeNull();
    expect(await strict.verifyToken(await sign({ sub: "u1" }, { issuer: "https://elsewhere.test" }))).toBeNull();
  });

  it("getPublicConfig never exposes the secret", () => {
    const config = new JwtAuthProvider({ secret: SECRET, audience: "rowguard" }).getPublicConfig();
    expect(config).toEqual({ provider: "jwt", algorithm: "HS256", audience: "rowguard" });
  });
});

describe("initAuthProvider", () => {
  afterEach(() => {
    resetAuthProvider();
  });

  it("selects JwtAuthProvider when a secret is configured", () => {
    const provider = initAuthProvider({ environment: "production", auth: { jwtSecret: SECRET } });
    expect(provider).toBeInstanceOf(JwtAuthProvider);
    expect(getAuthProvider()).toBe(provider);
  });

  it("falls back to DevAuthProvider outside production", () => {
    const provider = initAuthProvider({ environment: "development", auth: {} });
    expect(provider).toBeInstanceOf(DevAuthProvider);
  });

  it("throws in production without a secret", () => {
    expect(() => initAuthProvider({ environment: "production", auth: {} })).toThrow(
      "Authentication must be configured in production"
    );
  });
});

describe("getAuthProvider / setAuthProvider", () => {
  afterEach(() => {
    resetAuthProvider();
  });

  it("throws before initialization", () => {
    expect(() => getAuthProvider()).toThrow("Auth provider not initialized");
  });

  it("returns a provider set explicitly", () => {
    const custom = new DevAuthProvider(["Reader"]);
    setAuthProvider(custom);
    expect(getAuthProvider()).toBe(custom);
  });
});
