/**
 * HTTP Application
 *
 * Builds the Fastify instance: security headers, rate limiting, CORS,
 * the health check and the authorization routes. Listening is left to
 * the caller so tests can drive the app through inject().
 */

import Fastify, { type FastifyInstance } from "fastify";
import cors from "@fastify/cors";
import helmet from "@fastify/helmet";
import rateLimit from "@fastify/rate-limit";
import { registerAuthorizationRoutes, type AppConfig, type AuthorizationResolver } from "@rowguard/platform";

export interface BuildAppOptions {
  config: AppConfig;
  resolver: AuthorizationResolver;
  env?: NodeJS.ProcessEnv;
}

export async function buildApp({ config, resolver, env = process.env }: BuildAppOptions): Promise<FastifyInstance> {
  const isProd = config.environment === "production";

  const app = Fastify({
    logger: false, // We use our own structured logging
    // Trust proxy headers when behind a reverse proxy.
    // Required for rate limiting to use the real client IP, not the proxy's.
    trustProxy: isProd,
  });

  await app.register(helmet, {
    contentSecurityPolicy: isProd,
  });

  // Public routes (health, meta) get a much higher ceiling.
  const publicPaths = new Set(["/api/health", "/api/meta/entities"]);
  await app.register(rateLimit, {
    max: (req) => {
      if (publicPaths.has(req.url)) return 10_000;
      return Number(env.RATE_LIMIT_MAX ?? (isProd ? 100 : 1_000));
    },
    timeWindow: Number(env.RATE_LIMIT_WINDOW_MS ?? 60_000),
  });

  // In production, only allow the configured origins. In development, allow all.
  const corsOrigin = env.CORS_ORIGIN;
  await app.register(cors, {
    origin: corsOrigin ? corsOrigin.split(",").map((o) => o.trim()) : true,
    credentials: true,
    methods: ["GET", "POST", "OPTIONS"],
    allowedHeaders: ["authorization", "content-type", config.roleHeader],
  });

  app.get("/api/health", async () => ({
    status: "ok",
    timestamp: new Date().toISOString(),
    entities: resolver.getPermissionTable().size,
  }));

  await registerAuthorizationRoutes(app, { resolver, roleHeader: config.roleHeader });

  return app;
}
