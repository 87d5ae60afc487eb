/**
 * Authorization Errors
 *
 * Structural and claim problems throw; permission-shape mismatches
 * (unknown role, operation or column) return false instead.
 */

/** Distinguishes the reasons a request is forbidden */
export type AuthorizationSubStatus =
  | "AuthorizationCheckFailed"
  | "UnsupportedClaimValueType";

/**
 * Raised when a request must be rejected with a 403: a policy needs a claim
 * the caller does not have, the caller presented conflicting claims, or a
 * claim cannot be rendered as a predicate literal.
 */
export class AuthorizationError extends Error {
  readonly statusCode = 403;

  constructor(
    message: string,
    public readonly subStatusCode: AuthorizationSubStatus = "AuthorizationCheckFailed"
  ) {
    super(message);
    this.name = "AuthorizationError";
  }
}

/**
 * Raised while loading configuration. Startup aborts; a reload keeps the
 * previous configuration.
 */
export class ConfigurationError extends Error {
  constructor(public readonly issues: string[]) {
    super(
      issues.length === 1
        ? `Invalid runtime configuration: ${issues[0]}`
        : `Invalid runtime configuration (${issues.length} issues):\n  - ${issues.join("\n  - ")}`
    );
    this.name = "ConfigurationError";
  }
}

/** A database policy that cannot be tokenized */
export class PolicySyntaxError extends Error {
  constructor(
    message: string,
    public readonly offset: number
  ) {
    super(`${message} (at offset ${offset})`);
    this.name = "PolicySyntaxError";
  }
}
