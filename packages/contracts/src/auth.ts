/**
 * Authentication Contract
 *
 * Defines the AuthProvider interface: the abstraction that decouples
 * the authorization engine from any specific token format or issuer.
 *
 * The engine depends on this interface; concrete providers (JWT, dev)
 * implement it and are injected at startup. Swapping providers requires
 * no change to middleware or resolver code.
 */

import type { ClaimsIdentity } from "./claims.js";

/**
 * The result of verifying an authentication token.
 * Either a verified identity or null (invalid/expired token).
 */
export type AuthResult = ClaimsIdentity | null;

export interface AuthProvider {
  /**
   * Verify a bearer token and turn it into a claims identity.
   *
   * @param token - The raw token from the Authorization header
   * @returns An identity with authenticationType set, or null when the token is rejected
   */
  verifyToken(token: string): Promise<AuthResult>;

  /**
   * Public configuration a client needs to obtain tokens.
   * Served by a public endpoint; never include secrets.
   */
  getPublicConfig(): Record<string, string>;
}
