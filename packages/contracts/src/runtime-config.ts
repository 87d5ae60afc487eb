/**
 * Runtime Configuration
 *
 * The declarative permission model: entities, the roles allowed to touch
 * them, which operations each role may perform, on which columns, and
 * under which row-level policy.
 *
 * The same shape is produced two ways:
 *   - in TypeScript, with defineRuntimeConfig() (tests, embedded setups)
 *   - from a JSON file, through RuntimeConfigSchema (the server)
 *
 * Structural validation lives here. Semantic validation (columns that
 * exist, policies that parse) needs metadata and lives in the platform.
 */

import { z } from "zod";
import { parseConfiguredOperation, type ConfiguredOperation } from "./operation.js";
import { SOURCE_TYPES, type SourceType } from "./metadata.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/**
 * Column restriction for an action. Exclusion always wins over inclusion.
 * Either list may contain the wildcard "*" (alone) to mean every column.
 */
export interface FieldsConfig {
  /** Columns the action applies to. Absent means every column. */
  include?: string[];
  /** Columns removed from the include set. Absent means none. */
  exclude?: string[];
}

export interface PolicyConfig {
  /** Reserved for request-body policies; carried but never evaluated */
  request?: string;
  /**
   * Row predicate template, e.g. "@claims.userId eq @item.ownerId".
   * Claims are substituted per request; items name entity columns.
   */
  database?: string;
}

export interface ActionConfig {
  operation: ConfiguredOperation;
  fields?: FieldsConfig;
  policy?: PolicyConfig;
}

export interface PermissionConfig {
  /** Role name, matched case-insensitively */
  role: string;
  actions: ActionConfig[];
}

export interface EntitySourceConfig {
  /** Database object name (informational for the authorization engine) */
  object: string;
  type: SourceType;
}

export interface EntityConfig {
  source: EntitySourceConfig;
  /** Backing column name → name exposed to clients */
  mappings: Record<string, string>;
  permissions: PermissionConfig[];
}

export interface RuntimeConfig {
  entities: Record<string, EntityConfig>;
}

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

const OperationSchema = z.string().transform((value, ctx): ConfiguredOperation => {
  const operation = parseConfiguredOperation(value);
  if (!operation) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Unknown operation "${value}".`,
    });
    return z.NEVER;
  }
  return operation;
});

/** null is accepted for include/exclude and means the same as absent */
const ColumnListSchema = z
  .array(z.string())
  .nullish()
  .transform((value) => value ?? undefined);

const FieldsSchema = z
  .object({
    include: ColumnListSchema,
    exclude: ColumnListSchema,
  })
  .strict();

const PolicySchema = z
  .object({
    request: z.string().optional(),
    database: z.string().optional(),
  })
  .strict();

/** An action may be written as a bare operation string: "read" */
const ActionSchema = z.preprocess(
  (value) => (typeof value === "string" ? { action: value } : value),
  z
    .object({
      action: OperationSchema,
      fields: FieldsSchema.optional(),
      policy: PolicySchema.optional(),
    })
    .strict()
    .transform(
      ({ action, fields, policy }): ActionConfig => ({
        operation: action,
        ...(fields ? { fields } : {}),
        ...(policy ? { policy } : {}),
      })
    )
);

const PermissionSchema = z.object({
  role: z.string().trim().min(1, "Role name cannot be empty."),
  actions: z.array(ActionSchema),
});

const SourceTypeSchema = z.enum(SOURCE_TYPES);

/** A source may be written as a bare object name, which implies a table */
const SourceSchema = z.preprocess(
  (value) => (typeof value === "string" ? { object: value } : value),
  z.object({
    object: z.string().min(1, "Source object cannot be empty."),
    type: SourceTypeSchema.default("table"),
  })
);

const EntitySchema = z.object({
  source: SourceSchema,
  mappings: z.record(z.string()).default({}),
  permissions: z.array(PermissionSchema),
});

export const RuntimeConfigSchema: z.ZodType<RuntimeConfig, z.ZodTypeDef, unknown> = z.object({
  entities: z.record(EntitySchema),
});

// ---------------------------------------------------------------------------
// Helper
// ---------------------------------------------------------------------------

/**
 * Helper to declare a runtime configuration in TypeScript with type checking.
 *
 * @example
 * export const config = defineRuntimeConfig({
 *   entities: {
 *     Book: {
 *       source: { object: "dbo.books", type: "table" },
 *       mappings: {},
 *       permissions: [{ role: "reader", actions: [{ operation: "read" }] }],
 *     },
 *   },
 * });
 */
export function defineRuntimeConfig(config: RuntimeConfig): RuntimeConfig {
  return config;
}
