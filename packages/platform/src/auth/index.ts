/**
 * Auth Module
 *
 * Manages the active AuthProvider instance. The provider is set at
 * startup (in bootstrap) and used by the auth middleware to verify
 * bearer tokens.
 *
 * Provider selection:
 *   - JWT_SECRET set → JwtAuthProvider
 *   - Otherwise in non-production → DevAuthProvider
 *   - In production without a secret → throws (fail fast)
 */

import type { AuthProvider } from "@rowguard/contracts";
import type { AppConfig } from "../core/config/index.js";
import { createLogger } from "../core/logging/index.js";
import { JwtAuthProvider } from "./jwt-provider.js";
import { DevAuthProvider } from "./dev-provider.js";

const logger = createLogger("auth");

let authProvider: AuthProvider | null = null;

/**
 * Initialize the auth provider from configuration.
 * Call this once at startup (in bootstrap).
 */
export function initAuthProvider(config: Pick<AppConfig, "auth" | "environment">): AuthProvider {
  const { jwtSecret, issuer, audience } = config.auth;

  if (jwtSecret) {
    authProvider = new JwtAuthProvider({ secret: jwtSecret, issuer, audience });
    logger.info("Using JWT auth provider", { issuer, audience });
  } else if (config.environment === "production") {
    throw new Error(
      "Authentication must be configured in production. Set the JWT_SECRET environment variable."
    );
  } else {
    authProvider = new DevAuthProvider();
    logger.warn("Using development auth provider: any bearer token is accepted");
  }

  return authProvider;
}

/**
 * Get the active auth provider.
 * Throws if initAuthProvider() hasn't been called.
 */
export function getAuthProvider(): AuthProvider {
  if (!authProvider) {
    throw new Error("Auth provider not initialized. Call initAuthProvider() in bootstrap.");
  }
  return authProvider;
}

/**
 * Set a custom auth provider (for testing or custom implementations).
 */
export function setAuthProvider(provider: AuthProvider): void {
  authProvider = provider;
}

/** Clear the provider (for testing only) */
export function resetAuthProvider(): void {
  authProvider = null;
}

export { JwtAuthProvider, JWT_AUTHENTICATION_TYPE } from "./jwt-provider.js";
export type { JwtAuthOptions } from "./jwt-provider.js";
export { DevAuthProvider, DEV_USER_ID } from "./dev-provider.js";
