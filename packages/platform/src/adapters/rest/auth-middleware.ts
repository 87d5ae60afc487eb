/**
 * Fastify Authentication Middleware
 *
 * Turns an incoming request into a Principal and the role it runs under:
 *
 *   1. A Bearer token, if present, is verified through the AuthProvider.
 *      A rejected token is a 401. No token means an anonymous principal.
 *   2. The client role header is resolved: defaulted from the
 *      authentication state, forced to "anonymous" for unverified callers,
 *      and backed by a role identity when it names a system role.
 *
 * Both results are attached to the request for the route handlers.
 * Public routes (health check, meta endpoints, auth config) are exempt.
 *
 * Usage: Register as a Fastify preHandler hook during bootstrap.
 */

import type { FastifyRequest, FastifyReply } from "fastify";
import { CLIENT_ROLE_HEADER, type Principal } from "@rowguard/contracts";
import { getAuthProvider } from "../../auth/index.js";
import { resolveClientRole } from "../../core/authorization/claims.js";

const PUBLIC_ROUTES = new Set(["/api/health", "/api/auth/config"]);

declare module "fastify" {
  interface FastifyRequest {
    principal?: Principal;
    /** Role header values after resolution; exactly one for a usable request */
    clientRole?: string[];
  }
}

export interface AuthMiddlewareOptions {
  /** Header carrying the client-selected role (case-insensitive) */
  roleHeader?: string;
}

/**
 * Extracts the Bearer token from the Authorization header.
 * Returns null if the header is missing or is not a Bearer credential.
 */
function extractBearerToken(request: FastifyRequest): string | null {
  const header = request.headers.authorization;
  if (!header) return null;

  const parts = header.split(" ");
  if (parts.length !== 2 || parts[0].toLowerCase() !== "bearer") return null;

  return parts[1];
}

/**
 * Every value sent for the header, one entry per occurrence. Node joins
 * repeated custom headers into one string, so the distinct form is used
 * when the raw request offers it.
 */
function headerValues(request: FastifyRequest, name: string): string[] | undefined {
  const distinct = request.raw?.headersDistinct?.[name];
  if (distinct) return distinct;

  const value = request.headers[name];
  if (value === undefined) return undefined;
  return Array.isArray(value) ? value : [value];
}

function isPublic(request: FastifyRequest): boolean {
  const path = request.url.split("?")[0];
  return PUBLIC_ROUTES.has(path) || path.startsWith("/api/meta/");
}

export function createAuthMiddleware(options: AuthMiddlewareOptions = {}) {
  const roleHeader = (options.roleHeader ?? CLIENT_ROLE_HEADER).toLowerCase();

  return async function authMiddleware(
    request: FastifyRequest,
    reply: FastifyReply
  ): Promise<FastifyReply | undefined> {
    // CORS preflight never carries credentials
    if (request.method === "OPTIONS") return undefined;
    if (isPublic(request)) return undefined;

    let principal: Principal = { identities: [] };

    const token = extractBearerToken(request);
    if (token) {
      const identity = await getAuthProvider().verifyToken(token);
      if (!identity) {
        return reply.status(401).send({
          success: false,
          error: "Invalid or expired authentication token.",
        });
      }
      principal = { identities: [identity] };
    }

    const resolution = resolveClientRole(principal, headerValues(request, roleHeader));
    request.principal = resolution.principal;
    request.clientRole = resolution.roles;
    return undefined;
  };
}

/** Middleware using the default role header */
export const authMiddleware = createAuthMiddleware();
