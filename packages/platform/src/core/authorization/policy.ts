/**
 * Policy Parameterizer
 *
 * Database policies are row predicates written against two kinds of
 * reference:
 *
 *   @claims.<type>   a claim of the caller, substituted per request
 *   @item.<column>   a column of the row, bound by the query layer
 *
 * e.g. "@claims.user_email eq @item.owner and @item.archived eq false"
 *
 * A policy is tokenized once, when the permission table is built. Each
 * request then walks the token list and writes into a single output
 * buffer: claims become literals, item references become bare column
 * names, everything else is copied through unchanged.
 */

import type { Claim } from "@rowguard/contracts";
import { AuthorizationError, PolicySyntaxError } from "./errors.js";

// ---------------------------------------------------------------------------
// Tokens
// ---------------------------------------------------------------------------

export const CLAIM_PREFIX = "@claims.";
export const FIELD_PREFIX = "@item.";

/** Tokens copied to the output exactly as written */
export type PassThroughKind =
  | "operator"
  | "paren"
  | "literal"
  | "identifier"
  | "symbol"
  | "whitespace";

export type PolicyToken =
  | { kind: "claim"; name: string; text: string; offset: number }
  | { kind: "field"; name: string; text: string; offset: number }
  | { kind: PassThroughKind; text: string; offset: number };

export const POLICY_OPERATORS: ReadonlySet<string> = new Set([
  "eq",
  "ne",
  "gt",
  "ge",
  "lt",
  "le",
  "and",
  "or",
  "not",
]);

const KEYWORD_LITERALS: ReadonlySet<string> = new Set(["true", "false", "null"]);

const WHITESPACE = /\s+/y;
const NUMBER = /-?\d+(?:\.\d+)?(?:[eE][+-]?\d+)?/y;
const WORD = /[A-Za-z_][A-Za-z0-9_]*/y;
const FIELD_NAME = /[A-Za-z0-9_]*/y;
/** A claim reference runs until whitespace or a parenthesis */
const CLAIM_REFERENCE = /[^\s()]*/y;
/** Dotted segments, e.g. "user_email" or "extension.department" */
const CLAIM_TYPE_FORMAT = /^[A-Za-z0-9_]+(?:\.[A-Za-z0-9_]+)*$/;
/** Textual forms a numeric claim may take to be emitted unquoted */
const NUMERIC_LITERAL = /^-?\d+(?:\.\d+)?(?:[eE][+-]?\d+)?$/;

function matchAt(pattern: RegExp, text: string, offset: number): string {
  pattern.lastIndex = offset;
  const match = pattern.exec(text);
  return match ? match[0] : "";
}

/** End offset of the quoted string starting at `start`; '' escapes a quote */
function scanString(policy: string, start: number): number {
  let i = start + 1;
  while (i < policy.length) {
    if (policy[i] === "'") {
      if (policy[i + 1] !== "'") return i + 1;
      i += 2;
    } else {
      i++;
    }
  }
  throw new PolicySyntaxError("Unterminated string literal.", start);
}

/**
 * Splits a policy into typed tokens. Concatenating every token's `text`
 * reproduces the input.
 *
 * @throws PolicySyntaxError on empty or malformed claim types, empty
 *   column references, a stray "@", or an unterminated string
 */
export function tokenizePolicy(policy: string): PolicyToken[] {
  const tokens: PolicyToken[] = [];
  let i = 0;

  while (i < policy.length) {
    const offset = i;
    const ch = policy[i];

    if (/\s/.test(ch)) {
      const text = matchAt(WHITESPACE, policy, i);
      tokens.push({ kind: "whitespace", text, offset });
      i += text.length;
    } else if (ch === "(" || ch === ")") {
      tokens.push({ kind: "paren", text: ch, offset });
      i++;
    } else if (ch === "'") {
      const end = scanString(policy, i);
      tokens.push({ kind: "literal", text: policy.slice(i, end), offset });
      i = end;
    } else if (policy.startsWith(CLAIM_PREFIX, i)) {
      const name = matchAt(CLAIM_REFERENCE, policy, i + CLAIM_PREFIX.length);
      if (!name) throw new PolicySyntaxError("ClaimType cannot be empty.", offset);
      if (!CLAIM_TYPE_FORMAT.test(name)) {
        throw new PolicySyntaxError(`Invalid format for claim type ${name} supplied in policy.`, offset);
      }
      const text = CLAIM_PREFIX + name;
      tokens.push({ kind: "claim", name, text, offset });
      i += text.length;
    } else if (policy.startsWith(FIELD_PREFIX, i)) {
      const name = matchAt(FIELD_NAME, policy, i + FIELD_PREFIX.length);
      if (!name) throw new PolicySyntaxError("Column name cannot be empty.", offset);
      const text = FIELD_PREFIX + name;
      tokens.push({ kind: "field", name, text, offset });
      i += text.length;
    } else if (ch === "@") {
      throw new PolicySyntaxError(
        `Unexpected "@": only ${CLAIM_PREFIX} and ${FIELD_PREFIX} references are supported.`,
        offset
      );
    } else if (matchAt(NUMBER, policy, i)) {
      const text = matchAt(NUMBER, policy, i);
      tokens.push({ kind: "literal", text, offset });
      i += text.length;
    } else if (matchAt(WORD, policy, i)) {
      const text = matchAt(WORD, policy, i);
      const word = text.toLowerCase();
      const kind = POLICY_OPERATORS.has(word)
        ? "operator"
        : KEYWORD_LITERALS.has(word)
          ? "literal"
          : "identifier";
      tokens.push({ kind, text, offset });
      i += text.length;
    } else {
      tokens.push({ kind: "symbol", text: ch, offset });
      i++;
    }
  }

  return tokens;
}

// ---------------------------------------------------------------------------
// Substitution
// ---------------------------------------------------------------------------

function unsupported(claim: Claim): AuthorizationError {
  return new AuthorizationError(
    `The claim value for claim: ${claim.type} belonging to the user has an unsupported data type.`,
    "UnsupportedClaimValueType"
  );
}

/**
 * Renders a claim as a predicate literal. Strings are quoted with embedded
 * quotes doubled; numbers and booleans are emitted bare only when their
 * text really is a number or boolean. A null claim is the empty string.
 */
export function formatClaimLiteral(claim: Claim): string {
  switch (claim.valueType) {
    case "string":
      return `'${claim.value.replace(/'/g, "''")}'`;
    case "boolean": {
      const value = claim.value.toLowerCase();
      if (value === "true" || value === "false") return value;
      throw unsupported(claim);
    }
    case "number":
      if (NUMERIC_LITERAL.test(claim.value)) return claim.value;
      throw unsupported(claim);
    case "null":
      return "''";
    case "unsupported":
      throw unsupported(claim);
  }
}

/**
 * Substitutes claims into a tokenized policy.
 *
 * @param operation - Named in the error when a claim is missing
 * @throws AuthorizationError when a referenced claim is missing or cannot
 *   be rendered as a literal
 */
export function parameterizePolicy(
  tokens: readonly PolicyToken[],
  claims: ReadonlyMap<string, Claim>,
  operation: string
): string {
  let output = "";

  for (const token of tokens) {
    if (token.kind === "claim") {
      const claim = claims.get(token.name);
      if (!claim) {
        throw new AuthorizationError(
          `User does not possess all the claims required to perform this action: ${operation}. Missing claim: ${token.name}.`
        );
      }
      output += formatClaimLiteral(claim);
    } else if (token.kind === "field") {
      output += token.name;
    } else {
      output += token.text;
    }
  }

  return output;
}

/** Column names referenced through @item., in order of appearance */
export function policyColumns(tokens: readonly PolicyToken[]): string[] {
  const columns: string[] = [];
  for (const token of tokens) {
    if (token.kind === "field" && !columns.includes(token.name)) columns.push(token.name);
  }
  return columns;
}

/**
 * Checks parenthesis nesting. Returns the offset of the first unmatched
 * parenthesis, or -1 when balanced.
 */
export function findUnbalancedParenthesis(tokens: readonly PolicyToken[]): number {
  const open: number[] = [];
  for (const token of tokens) {
    if (token.kind !== "paren") continue;
    if (token.text === "(") {
      open.push(token.offset);
    } else if (open.pop() === undefined) {
      return token.offset;
    }
  }
  return open.length > 0 ? open[0] : -1;
}
