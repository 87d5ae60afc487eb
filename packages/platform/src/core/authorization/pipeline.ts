/**
 * Request Authorization
 *
 * Runs one request through the resolver in the fixed order:
 *
 *   role context → operation → columns → database policy
 *
 * Permission mismatches come back as a denied decision; claim problems in
 * the policy step propagate as AuthorizationError.
 */

import {
  parseEntityOperation,
  type EntityOperation,
  type Principal,
} from "@rowguard/contracts";
import { createLogger } from "../logging/index.js";
import type { AuthorizationResolver } from "./resolver.js";

const logger = createLogger("authorization");

export interface AuthorizationRequest {
  entity: string;
  /** Values of the client role header after role resolution */
  role: string | readonly string[] | undefined;
  operation: string;
  /** Exposed column names. Empty or absent means "every allowed column". */
  columns?: readonly string[];
  principal: Principal;
}

export type DenialReason =
  | "unknown_operation"
  | "entity_not_found"
  | "invalid_role_context"
  | "operation_not_permitted"
  | "columns_not_permitted";

export type AuthorizationDecision =
  | {
      allowed: true;
      entity: string;
      role: string;
      operation: EntityOperation;
      /** Exposed names the query may touch */
      columns: string[];
      /** Predicate to conjoin into the WHERE clause; "" for none */
      databasePolicy: string;
    }
  | {
      allowed: false;
      reason: DenialReason;
      message: string;
    };

function deny(reason: DenialReason, message: string, data: Record<string, unknown>): AuthorizationDecision {
  logger.debug("Request denied", { reason, ...data });
  return { allowed: false, reason, message };
}

export function authorizeRequest(
  resolver: AuthorizationResolver,
  request: AuthorizationRequest
): AuthorizationDecision {
  const { entity, principal } = request;

  const operation = parseEntityOperation(request.operation);
  if (!operation) {
    return deny("unknown_operation", `Unknown operation: ${request.operation}.`, { entity });
  }

  if (!resolver.hasEntity(entity)) {
    return deny("entity_not_found", `Entity not found: ${entity}.`, { entity });
  }

  if (!resolver.isValidRoleContext(request.role, principal)) {
    return deny(
      "invalid_role_context",
      "The role header must name exactly one role held by the caller.",
      { entity, operation }
    );
  }
  const role = typeof request.role === "string" ? request.role : (request.role ?? [])[0];

  if (!resolver.areRoleAndOperationDefinedForEntity(entity, role, operation)) {
    return deny(
      "operation_not_permitted",
      `Role ${role} is not permitted to ${operation} entity ${entity}.`,
      { entity, role, operation }
    );
  }

  let columns: string[] = [];
  if (operation !== "delete") {
    const requested = request.columns ?? [];
    if (requested.length > 0) {
      if (!resolver.areColumnsAllowedForOperation(entity, role, operation, requested)) {
        return deny(
          "columns_not_permitted",
          `Role ${role} is not permitted to ${operation} one or more of the requested columns of ${entity}.`,
          { entity, role, operation, columns: requested }
        );
      }
      columns = [...requested];
    } else {
      columns = resolver.getAllowedExposedColumns(entity, role, operation);
      if (columns.length === 0 && operation === "read") {
        return deny(
          "columns_not_permitted",
          `Role ${role} has no readable columns on ${entity}.`,
          { entity, role, operation }
        );
      }
    }
  }

  const databasePolicy = resolver.processDatabasePolicy(entity, role, operation, principal);

  return { allowed: true, entity, role, operation, columns, databasePolicy };
}
