/**
 * Application Configuration
 *
 * Loads process configuration from environment variables with sensible
 * defaults. Validated at startup: fail fast if misconfigured.
 *
 * The permission model itself lives in the runtime configuration file
 * (see runtime-config.ts); this only says where to find it and how to
 * run the server around it.
 */

import { CLIENT_ROLE_HEADER } from "@rowguard/contracts";

export interface AppConfig {
  environment: string;
  runtimeConfigPath: string;
  metadataPath: string;
  /** Lower-cased name of the header carrying the client-selected role */
  roleHeader: string;
  auth: {
    jwtSecret?: string;
    issuer?: string;
    audience?: string;
  };
  api: {
    port: number;
    host: string;
  };
}

function optional(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function parsePort(raw: string): number {
  const port = Number(raw);
  if (!Number.isInteger(port) || port <= 0 || port > 65535) {
    throw new Error(`API_PORT must be an integer between 1 and 65535, got "${raw}".`);
  }
  return port;
}

/**
 * Loads configuration from the environment (process.env by default).
 * Throws immediately on invalid values.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    environment: env.NODE_ENV ?? "development",
    runtimeConfigPath: optional(env.RUNTIME_CONFIG_PATH) ?? "config/runtime-config.json",
    metadataPath: optional(env.METADATA_PATH) ?? "config/metadata.json",
    roleHeader: (optional(env.ROLE_HEADER) ?? CLIENT_ROLE_HEADER).toLowerCase(),
    auth: {
      jwtSecret: optional(env.JWT_SECRET),
      issuer: optional(env.JWT_ISSUER),
      audience: optional(env.JWT_AUDIENCE),
    },
    api: {
      port: parsePort(optional(env.API_PORT) ?? "4000"),
      host: optional(env.API_HOST) ?? "0.0.0.0",
    },
  };
}
