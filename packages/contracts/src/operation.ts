/**
 * Operation Definitions
 *
 * The closed set of operations an entity permission can grant, plus the
 * wildcard sentinel used in configuration. The wildcard never survives
 * permission-table construction: it is expanded to the concrete operations
 * valid for the entity's source type.
 *
 * Three layers:
 *   - TableOperation      what a row in the permission table can hold
 *   - EntityOperation     what a request can ask for (adds "upsert")
 *   - ConfiguredOperation what a configuration action can name (adds "*")
 */

import type { SourceType } from "./metadata.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Reserved token meaning "all" in operation lists and include/exclude sets */
export const WILDCARD = "*";

/** Operations that are stored as rows in the permission table */
export const TABLE_OPERATIONS = [
  "create",
  "read",
  "update",
  "delete",
  "execute",
] as const;

/** Operations a request may ask for */
export const ENTITY_OPERATIONS = [...TABLE_OPERATIONS, "upsert"] as const;

/** CRUD operations granted by the wildcard on tables and views */
export const CRUD_OPERATIONS = ["create", "read", "update", "delete"] as const;

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type TableOperation = (typeof TABLE_OPERATIONS)[number];

export type EntityOperation = (typeof ENTITY_OPERATIONS)[number];

export type ConfiguredOperation = EntityOperation | typeof WILDCARD;

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

/**
 * Parses an operation literal as written in configuration.
 * Case-insensitive; "all" is accepted as an alias of the wildcard.
 * Returns null for anything outside the closed set.
 */
export function parseConfiguredOperation(value: string): ConfiguredOperation | null {
  const normalized = value.trim().toLowerCase();
  if (normalized === WILDCARD || normalized === "all") return WILDCARD;
  return parseEntityOperation(normalized);
}

/**
 * Parses an operation literal as sent by a request.
 * The wildcard is not a requestable operation and yields null.
 */
export function parseEntityOperation(value: string): EntityOperation | null {
  const normalized = value.trim().toLowerCase();
  for (const operation of ENTITY_OPERATIONS) {
    if (operation === normalized) return operation;
  }
  return null;
}

/**
 * Expands a configured operation into the table rows it produces for an
 * entity of the given source type.
 */
export function expandConfiguredOperation(
  operation: ConfiguredOperation,
  sourceType: SourceType
): TableOperation[] {
  if (operation === WILDCARD) {
    return sourceType === "stored-procedure" ? ["execute"] : [...CRUD_OPERATIONS];
  }
  return requiredTableOperations(operation);
}

/**
 * The table rows a requested operation needs. An upsert may insert or
 * update, so it needs both.
 */
export function requiredTableOperations(operation: EntityOperation): TableOperation[] {
  return operation === "upsert" ? ["create", "update"] : [operation];
}
