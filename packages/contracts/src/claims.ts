/**
 * Claims and Principals
 *
 * The transport-neutral shape of an authenticated caller. The auth layer
 * produces a Principal; the authorization engine only reads it.
 */

// ---------------------------------------------------------------------------
// Well-known names
// ---------------------------------------------------------------------------

/** System role given to requests without a verified identity */
export const ROLE_ANONYMOUS = "anonymous";

/** System role given to any request with a verified identity */
export const ROLE_AUTHENTICATED = "authenticated";

/** Claim type holding role memberships */
export const ROLE_CLAIM_TYPE = "roles";

/** Session claim listing every role the token carried */
export const ORIGINAL_ROLES_CLAIM_TYPE = "original_roles";

/** Claim types that hold OAuth scopes; joined with spaces when multi-valued */
export const SCOPE_CLAIM_TYPES: readonly string[] = ["scope", "scp"];

/** Reserved header carrying the role a client wants to act under */
export const CLIENT_ROLE_HEADER = "x-api-role";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/**
 * How a claim value can be rendered as a predicate literal.
 * Anything that is not a scalar (objects, dates) is "unsupported".
 */
export type ClaimValueType = "string" | "boolean" | "number" | "null" | "unsupported";

export interface Claim {
  type: string;
  /** Textual form of the value. JSON text for unsupported values. */
  value: string;
  valueType: ClaimValueType;
}

export interface ClaimsIdentity {
  /** Set once the identity has been verified. Absent means unauthenticated. */
  authenticationType?: string;
  /** Claim type used for role membership (defaults to "roles") */
  roleClaimType?: string;
  claims: Claim[];
}

export interface Principal {
  identities: ClaimsIdentity[];
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function isSystemRole(role: string): boolean {
  const normalized = role.toLowerCase();
  return normalized === ROLE_ANONYMOUS || normalized === ROLE_AUTHENTICATED;
}

export function isAuthenticatedIdentity(identity: ClaimsIdentity): boolean {
  return Boolean(identity.authenticationType);
}

/** Shorthand for a string-valued claim */
export function stringClaim(type: string, value: string): Claim {
  return { type, value, valueType: "string" };
}
