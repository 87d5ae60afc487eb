/**
 * Claim Extractor
 *
 * Reads the caller's claims out of a Principal and normalizes them for the
 * two consumers that need them:
 *
 *   - resolvePolicyClaims()     one scalar claim per type, for substitution
 *                               into database policies
 *   - getProcessedUserClaims()  string-valued session context handed to the
 *                               query layer, with multi-valued claims kept as
 *                               JSON array text
 *
 * Rules shared by both:
 *   - only authenticated identities contribute claims
 *   - the role claim is forced to the single role the request runs under
 */

import {
  ROLE_ANONYMOUS,
  ROLE_AUTHENTICATED,
  ROLE_CLAIM_TYPE,
  ORIGINAL_ROLES_CLAIM_TYPE,
  SCOPE_CLAIM_TYPES,
  isAuthenticatedIdentity,
  isSystemRole,
  stringClaim,
  type Claim,
  type ClaimsIdentity,
  type Principal,
} from "@rowguard/contracts";
import { AuthorizationError } from "./errors.js";

/** authenticationType given to role identities added during role resolution */
export const SYSTEM_ROLE_AUTHENTICATION_TYPE = "system-role";

// ---------------------------------------------------------------------------
// Principal helpers
// ---------------------------------------------------------------------------

function roleClaimTypeOf(identity: ClaimsIdentity): string {
  return identity.roleClaimType ?? ROLE_CLAIM_TYPE;
}

/** True when any identity of the principal has been verified */
export function isAuthenticated(principal: Principal): boolean {
  return principal.identities.some(isAuthenticatedIdentity);
}

/**
 * Role membership across every identity of the principal.
 * Case-sensitive: "Writer" and "writer" are different memberships.
 */
export function isInRole(principal: Principal, role: string): boolean {
  return principal.identities.some((identity) => {
    const roleType = roleClaimTypeOf(identity);
    return identity.claims.some((claim) => claim.type === roleType && claim.value === role);
  });
}

// ---------------------------------------------------------------------------
// Role resolution
// ---------------------------------------------------------------------------

export interface ClientRoleResolution {
  principal: Principal;
  /** Role header values after defaults and the anonymous override */
  roles: string[];
}

/**
 * Decides which role a request runs under.
 *
 *   - no header: "authenticated" for verified callers, "anonymous" otherwise
 *   - unverified callers are always "anonymous", whatever they asked for
 *   - a resolved system role the caller does not hold is granted through an
 *     extra identity, verified only when the caller is
 *
 * Multiple header values are passed through untouched; the role-context
 * check rejects them later.
 */
export function resolveClientRole(
  principal: Principal,
  headerValues: readonly string[] | undefined
): ClientRoleResolution {
  const authenticated = isAuthenticated(principal);

  let roles: string[];
  if (!headerValues || headerValues.length === 0) {
    roles = [authenticated ? ROLE_AUTHENTICATED : ROLE_ANONYMOUS];
  } else if (!authenticated) {
    roles = [ROLE_ANONYMOUS];
  } else {
    roles = [...headerValues];
  }

  const [role] = roles;
  if (roles.length !== 1 || !isSystemRole(role) || isInRole(principal, role)) {
    return { principal, roles };
  }

  const roleIdentity: ClaimsIdentity = {
    claims: [stringClaim(ROLE_CLAIM_TYPE, role)],
    ...(authenticated ? { authenticationType: SYSTEM_ROLE_AUTHENTICATION_TYPE } : {}),
  };
  return {
    principal: { identities: [...principal.identities, roleIdentity] },
    roles,
  };
}

// ---------------------------------------------------------------------------
// Token payloads
// ---------------------------------------------------------------------------

function claimFromJson(type: string, value: unknown): Claim {
  switch (typeof value) {
    case "string":
      return { type, value, valueType: "string" };
    case "number":
      return { type, value: String(value), valueType: "number" };
    case "boolean":
      return { type, value: String(value), valueType: "boolean" };
    case "undefined":
      return { type, value: "", valueType: "null" };
    default:
      if (value === null) return { type, value: "", valueType: "null" };
      return { type, value: JSON.stringify(value), valueType: "unsupported" };
  }
}

/**
 * Flattens a decoded token payload into an identity. Array claims become
 * one claim per element (so roles: ["a", "b"] yields two role claims);
 * object claims keep their JSON text and cannot be used in policies.
 */
export function identityFromTokenPayload(
  payload: Record<string, unknown>,
  authenticationType: string
): ClaimsIdentity {
  const claims: Claim[] = [];
  for (const [type, value] of Object.entries(payload)) {
    if (Array.isArray(value)) {
      for (const element of value) claims.push(claimFromJson(type, element));
    } else {
      claims.push(claimFromJson(type, value));
    }
  }
  return { authenticationType, claims };
}

// ---------------------------------------------------------------------------
// Extraction
// ---------------------------------------------------------------------------

function claimKey(claim: Claim): string {
  return JSON.stringify([claim.type, claim.valueType, claim.value]);
}

/**
 * Claims of the verified identities grouped by type, in token order.
 * Array claims keep every element. A value an earlier identity already
 * carried is not repeated. The role claim is replaced by the single
 * effective role, and only when the principal actually holds it.
 */
export function getAuthenticatedUserClaims(
  principal: Principal,
  role: string
): Map<string, Claim[]> {
  const grouped = new Map<string, Claim[]>();
  const seen = new Set<string>();

  for (const identity of principal.identities) {
    if (!isAuthenticatedIdentity(identity)) continue;
    const roleType = roleClaimTypeOf(identity);
    const contributed: string[] = [];

    for (const claim of identity.claims) {
      if (claim.type === roleType || claim.type === ROLE_CLAIM_TYPE) continue;

      const key = claimKey(claim);
      if (seen.has(key)) continue;
      contributed.push(key);

      const values = grouped.get(claim.type) ?? [];
      values.push(claim);
      grouped.set(claim.type, values);
    }

    for (const key of contributed) seen.add(key);
  }

  if (isInRole(principal, role)) {
    grouped.set(ROLE_CLAIM_TYPE, [stringClaim(ROLE_CLAIM_TYPE, role)]);
  }

  return grouped;
}

function isScopeClaim(type: string): boolean {
  return SCOPE_CLAIM_TYPES.includes(type);
}

function joinScopes(values: Claim[]): string {
  return values.map((claim) => claim.value).join(" ");
}

/** Drops repeats of the same value, keeping the first occurrence */
function distinct(claims: Claim[]): Claim[] {
  return claims.filter(
    (claim, index) =>
      claims.findIndex(
        (other) => other.value === claim.value && other.valueType === claim.valueType
      ) === index
  );
}

/**
 * One claim per type, ready for policy substitution. Repeats of the same
 * value count once.
 *
 * @throws AuthorizationError when a claim type other than role or scope
 *   carries more than one distinct value
 */
export function resolvePolicyClaims(principal: Principal, role: string): Map<string, Claim> {
  const resolved = new Map<string, Claim>();

  for (const [type, claims] of getAuthenticatedUserClaims(principal, role)) {
    const values = distinct(claims);
    if (values.length === 1) {
      resolved.set(type, values[0]);
    } else if (isScopeClaim(type)) {
      resolved.set(type, stringClaim(type, joinScopes(values)));
    } else {
      throw new AuthorizationError("Duplicate claims are not allowed within a request.");
    }
  }

  return resolved;
}

/** A claim value as a JSON array element */
function jsonElement(claim: Claim): string {
  switch (claim.valueType) {
    case "string":
      return JSON.stringify(claim.value);
    case "null":
      return "null";
    default:
      return claim.value;
  }
}

/**
 * Every role claim value carried by the verified identities, in order,
 * before the effective role replaced them.
 */
function originalRoles(principal: Principal): string[] {
  const roles: string[] = [];
  for (const identity of principal.identities) {
    if (!isAuthenticatedIdentity(identity)) continue;
    const roleType = roleClaimTypeOf(identity);
    for (const claim of identity.claims) {
      if (claim.type === roleType) roles.push(claim.value);
    }
  }
  return roles;
}

/**
 * String-valued claims for the query layer's session context.
 *
 *   roles          → the effective role
 *   original_roles → JSON array of every role the token carried
 *   scope / scp    → space-joined
 *   multi-valued   → JSON array text with typed elements
 *   null           → ""
 */
export function getProcessedUserClaims(principal: Principal, role: string): Record<string, string> {
  const processed: Record<string, string> = {};

  for (const [type, values] of getAuthenticatedUserClaims(principal, role)) {
    if (isScopeClaim(type)) {
      processed[type] = joinScopes(values);
    } else if (values.length === 1) {
      processed[type] = values[0].value;
    } else {
      processed[type] = `[${values.map(jsonElement).join(",")}]`;
    }
  }

  const roles = originalRoles(principal);
  if (roles.length > 0) {
    processed[ORIGINAL_ROLES_CLAIM_TYPE] = JSON.stringify(roles);
  }

  return processed;
}
