/**
 * REST Adapter
 *
 * Exposes the authorization resolver over HTTP on a Fastify instance:
 *
 *   POST /api/authorize                 decide one request
 *   GET  /api/meta/entities             configured entities and their roles
 *   GET  /api/meta/permissions/:entity  roles per operation and per column
 *   GET  /api/auth/config               public auth provider configuration
 *
 * Every failure uses the { success: false, error } envelope.
 */

import type { FastifyError, FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { z } from "zod";
import { ENTITY_OPERATIONS, type EntityOperation } from "@rowguard/contracts";
import { getAuthProvider } from "../../auth/index.js";
import { AuthorizationError } from "../../core/authorization/errors.js";
import { authorizeRequest, type DenialReason } from "../../core/authorization/pipeline.js";
import type { AuthorizationResolver } from "../../core/authorization/resolver.js";
import { createAuthMiddleware } from "./auth-middleware.js";
import { captureException } from "../../core/observability/index.js";
import { createLogger } from "../../core/logging/index.js";

const logger = createLogger("rest");

export interface AuthorizationRoutesOptions {
  resolver: AuthorizationResolver;
  /** Header carrying the client-selected role */
  roleHeader?: string;
}

// ---------------------------------------------------------------------------
// Request mapping
// ---------------------------------------------------------------------------

/** HTTP verbs accepted in place of an operation name */
export const HTTP_VERB_OPERATIONS: Readonly<Record<string, EntityOperation>> = {
  GET: "read",
  POST: "create",
  PUT: "upsert",
  PATCH: "upsert",
  DELETE: "delete",
};

const AuthorizeBodySchema = z.object({
  entity: z.string().min(1, "entity is required."),
  operation: z.string().min(1, "operation is required."),
  columns: z.array(z.string()).optional(),
});

function toOperation(value: string): string {
  return HTTP_VERB_OPERATIONS[value.toUpperCase()] ?? value;
}

const DENIAL_STATUS: Record<DenialReason, number> = {
  unknown_operation: 400,
  entity_not_found: 404,
  invalid_role_context: 403,
  operation_not_permitted: 403,
  columns_not_permitted: 403,
};

// ---------------------------------------------------------------------------
// Error handling
// ---------------------------------------------------------------------------

function handleError(error: FastifyError, request: FastifyRequest, reply: FastifyReply) {
  if (error instanceof AuthorizationError) {
    logger.debug("Request forbidden", { url: request.url, subStatusCode: error.subStatusCode });
    return reply.status(error.statusCode).send({
      success: false,
      error: error.message,
      subStatusCode: error.subStatusCode,
    });
  }

  const statusCode = error.statusCode ?? 500;
  if (statusCode < 500) {
    return reply.status(statusCode).send({ success: false, error: error.message });
  }

  captureException(error, { url: request.url });
  return reply.status(500).send({ success: false, error: "Internal server error." });
}

// ---------------------------------------------------------------------------
// Routes
// ---------------------------------------------------------------------------

export async function registerAuthorizationRoutes(
  app: FastifyInstance,
  options: AuthorizationRoutesOptions
): Promise<void> {
  const { resolver } = options;

  app.setErrorHandler(handleError);
  app.addHook("preHandler", createAuthMiddleware({ roleHeader: options.roleHeader }));

  /** Auth configuration: tells clients how to obtain tokens */
  app.get("/api/auth/config", async () => {
    return getAuthProvider().getPublicConfig();
  });

  /** Every configured entity with the roles that can touch it */
  app.get("/api/meta/entities", async () => {
    const table = resolver.getPermissionTable();
    return {
      success: true,
      data: table.entityNames().map((name) => ({
        name,
        roles: resolver.getRolesForEntity(name),
      })),
    };
  });

  /** Roles per operation and per exposed column of one entity */
  app.get<{ Params: { entity: string } }>(
    "/api/meta/permissions/:entity",
    async (request, reply) => {
      const name = request.params.entity;
      const entity = resolver.getPermissionTable().getEntity(name);
      if (!entity) {
        return reply.status(404).send({ success: false, error: `Entity not found: ${name}.` });
      }

      const operations: Record<string, string[]> = {};
      for (const operation of ENTITY_OPERATIONS) {
        operations[operation] = resolver.getRolesForOperation(name, operation);
      }

      const columns: Record<string, Record<string, string[]>> = {};
      for (const column of entity.columns) {
        const exposed = entity.backingToExposed.get(column) ?? column;
        const byOperation: Record<string, string[]> = {};
        for (const operation of ENTITY_OPERATIONS) {
          const roles = resolver.getRolesForField(name, exposed, operation);
          if (roles.length > 0) byOperation[operation] = roles;
        }
        columns[exposed] = byOperation;
      }

      return {
        success: true,
        data: { entity: name, sourceType: entity.sourceType, operations, columns },
      };
    }
  );

  /**
   * POST /api/authorize: decide one request.
   * Body: { entity, operation, columns? }. The operation may be an HTTP verb.
   */
  app.post("/api/authorize", async (request, reply) => {
    const parsed = AuthorizeBodySchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.status(400).send({
        success: false,
        error: parsed.error.issues.map((issue) => issue.message).join(" "),
      });
    }

    const { entity, operation, columns } = parsed.data;
    const decision = authorizeRequest(resolver, {
      entity,
      operation: toOperation(operation),
      columns,
      role: request.clientRole,
      principal: request.principal ?? { identities: [] },
    });

    if (!decision.allowed) {
      return reply.status(DENIAL_STATUS[decision.reason]).send({
        success: false,
        error: decision.message,
        reason: decision.reason,
      });
    }

    return {
      success: true,
      data: {
        entity: decision.entity,
        role: decision.role,
        operation: decision.operation,
        columns: decision.columns,
        databasePolicy: decision.databasePolicy,
      },
    };
  });
}
