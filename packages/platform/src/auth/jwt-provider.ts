/**
 * JWT Auth Provider
 *
 * Verifies HS256-signed bearer tokens with a shared secret and flattens
 * the payload into a claims identity. Issuer and audience are checked
 * when configured.
 */

import { jwtVerify } from "jose";
import type { AuthProvider, AuthResult } from "@rowguard/contracts";
import { identityFromTokenPayload } from "../core/authorization/claims.js";
import { createLogger } from "../core/logging/index.js";

const logger = createLogger("auth");

/** authenticationType stamped on identities from verified tokens */
export const JWT_AUTHENTICATION_TYPE = "Bearer";

export interface JwtAuthOptions {
  secret: string;
  issuer?: string;
  audience?: string;
}

export class JwtAuthProvider implements AuthProvider {
  private readonly key: Uint8Array;

  constructor(private readonly options: JwtAuthOptions) {
    this.key = new TextEncoder().encode(options.secret);
  }

  /**
   * Returns null for any token that fails signature, expiry, issuer or
   * audience checks. The reason is logged at debug level only.
   */
  async verifyToken(token: string): Promise<AuthResult> {
    if (!token) return null;

    try {
      const { payload } = await jwtVerify(token, this.key, {
        algorithms: ["HS256"],
        issuer: this.options.issuer,
        audience: this.options.audience,
      });
      return identityFromTokenPayload(payload, JWT_AUTHENTICATION_TYPE);
    } catch (err) {
      logger.debug("Bearer token rejected", {
        reason: err instanceof Error ? err.message : String(err),
      });
      return null;
    }
  }

  getPublicConfig(): Record<string, string> {
    return {
      provider: "jwt",
      algorithm: "HS256",
      ...(this.options.issuer ? { issuer: this.options.issuer } : {}),
      ...(this.options.audience ? { audience: this.options.audience } : {}),
    };
  }
}
