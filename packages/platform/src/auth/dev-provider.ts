/**
 * Development Auth Provider
 *
 * Accepts any bearer token and returns a fixed verified identity, so the
 * server can be exercised locally without minting tokens.
 *
 * NEVER use this in production: it bypasses all authentication.
 * Selected automatically when JWT_SECRET is not set and
 * NODE_ENV !== "production".
 */

import { ROLE_CLAIM_TYPE, stringClaim, type AuthProvider, type AuthResult } from "@rowguard/contracts";

export const DEV_USER_ID = "dev-user";

export class DevAuthProvider implements AuthProvider {
  /** @param roles - Role claims carried by the dev identity */
  constructor(private readonly roles: readonly string[] = ["admin"]) {}

  async verifyToken(token: string): Promise<AuthResult> {
    if (!token) return null;
    return {
      authenticationType: "dev",
      claims: [
        stringClaim("sub", DEV_USER_ID),
        ...this.roles.map((role) => stringClaim(ROLE_CLAIM_TYPE, role)),
      ],
    };
  }

  getPublicConfig(): Record<string, string> {
    return {
      provider: "dev",
      message: "Development mode: any bearer token is accepted",
    };
  }
}
