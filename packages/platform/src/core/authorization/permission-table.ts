/**
 * Permission Table
 *
 * The build-once, read-many lookup behind the authorization resolver:
 *
 *   entity → role → operation → { included, excluded, allowed, policy }
 *
 * plus two reverse indexes (operation → roles, column → operation → roles)
 * for introspection.
 *
 * Everything configuration-shaped is settled here so lookups never
 * reinterpret it:
 *   - wildcard and upsert operations are expanded to concrete rows
 *   - include/exclude wildcards are expanded to column sets
 *   - database policies are tokenized
 *   - an entity with "anonymous" but no "authenticated" permissions gets an
 *     "authenticated" copy of the anonymous rows
 *
 * A table is never modified after construction. Reconfiguration builds a
 * new table and swaps the reference.
 */

import {
  ROLE_ANONYMOUS,
  ROLE_AUTHENTICATED,
  WILDCARD,
  expandConfiguredOperation,
  type ActionConfig,
  type EntityConfig,
  type FieldsConfig,
  type MetadataProvider,
  type RuntimeConfig,
  type SourceType,
  type TableOperation,
} from "@rowguard/contracts";
import { tokenizePolicy, type PolicyToken } from "./policy.js";
import { ConfigurationError, PolicySyntaxError } from "./errors.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface OperationPermission {
  /** Columns named by the include list (all columns for absent or "*") */
  readonly included: ReadonlySet<string>;
  /** Columns named by the exclude list (all columns for "*") */
  readonly excluded: ReadonlySet<string>;
  /** included − excluded */
  readonly allowed: ReadonlySet<string>;
  readonly databasePolicy?: string;
  readonly policyTokens?: readonly PolicyToken[];
  /** Carried for completeness; never evaluated */
  readonly requestPolicy?: string;
}

export interface RolePermissions {
  /** Role name as configured */
  readonly name: string;
  readonly operations: ReadonlyMap<TableOperation, OperationPermission>;
}

export interface EntityPermissions {
  readonly name: string;
  readonly sourceType: SourceType;
  /** Backing column names in metadata order */
  readonly columns: readonly string[];
  readonly exposedToBacking: ReadonlyMap<string, string>;
  readonly backingToExposed: ReadonlyMap<string, string>;
  /** Keyed by lower-cased role name */
  readonly roles: ReadonlyMap<string, RolePermissions>;
  readonly operationRoles: ReadonlyMap<TableOperation, readonly string[]>;
  /** backing column → operation → roles allowed to touch it */
  readonly fieldRoles: ReadonlyMap<string, ReadonlyMap<TableOperation, readonly string[]>>;
}

export class PermissionTable {
  constructor(
    private readonly entities: ReadonlyMap<string, EntityPermissions>,
    readonly builtAt: Date = new Date()
  ) {}

  getEntity(name: string): EntityPermissions | undefined {
    return this.entities.get(name);
  }

  entityNames(): string[] {
    return [...this.entities.keys()];
  }

  get size(): number {
    return this.entities.size;
  }
}

// ---------------------------------------------------------------------------
// Column sets
// ---------------------------------------------------------------------------

export interface ColumnSets {
  included: Set<string>;
  excluded: Set<string>;
  allowed: Set<string>;
}

/**
 * Resolves an action's fields against the entity's columns. Exclusion
 * always wins: allowed = included − excluded.
 */
export function resolveColumnSets(
  fields: FieldsConfig | undefined,
  columns: readonly string[]
): ColumnSets {
  const include = fields?.include;
  const exclude = fields?.exclude;

  const included = new Set<string>(!include || include.includes(WILDCARD) ? columns : include);
  const excluded = new Set<string>(!exclude ? [] : exclude.includes(WILDCARD) ? columns : exclude);
  const allowed = new Set<string>([...included].filter((column) => !excluded.has(column)));

  return { included, excluded, allowed };
}

// ---------------------------------------------------------------------------
// Builder
// ---------------------------------------------------------------------------

function buildOperationPermission(
  entityName: string,
  role: string,
  action: ActionConfig,
  columns: readonly string[]
): OperationPermission {
  const { included, excluded, allowed } = resolveColumnSets(action.fields, columns);
  const databasePolicy = action.policy?.database?.trim() || undefined;
  const requestPolicy = action.policy?.request?.trim() || undefined;

  let policyTokens: PolicyToken[] | undefined;
  if (databasePolicy) {
    try {
      policyTokens = tokenizePolicy(databasePolicy);
    } catch (err) {
      if (err instanceof PolicySyntaxError) {
        throw new ConfigurationError([
          `Invalid database policy for entity:${entityName}, role:${role}, action:${action.operation}: ${err.message}`,
        ]);
      }
      throw err;
    }
  }

  return Object.freeze({
    included,
    excluded,
    allowed,
    ...(databasePolicy ? { databasePolicy, policyTokens } : {}),
    ...(requestPolicy ? { requestPolicy } : {}),
  });
}

/**
 * Create rows never carry a database policy: a "*" or "upsert" action's
 * policy applies to the other rows it expands to.
 */
function withoutDatabasePolicy(row: OperationPermission): OperationPermission {
  if (!row.databasePolicy) return row;
  return Object.freeze({
    included: row.included,
    excluded: row.excluded,
    allowed: row.allowed,
    ...(row.requestPolicy ? { requestPolicy: row.requestPolicy } : {}),
  });
}

function exposedNames(entity: EntityConfig, columns: readonly string[]) {
  const exposedToBacking = new Map<string, string>();
  const backingToExposed = new Map<string, string>();
  for (const column of columns) {
    const exposed = entity.mappings[column] ?? column;
    exposedToBacking.set(exposed, column);
    backingToExposed.set(column, exposed);
  }
  return { exposedToBacking, backingToExposed };
}

function addToIndex<K>(index: Map<K, string[]>, key: K, role: string): void {
  const roles = index.get(key) ?? [];
  if (!roles.includes(role)) roles.push(role);
  index.set(key, roles);
}

/**
 * Builds the permissions of one entity.
 *
 * Duplicate role entries are merged with later actions winning; the
 * configuration validator reports them before a build is ever attempted.
 */
export function buildEntityPermissions(
  name: string,
  entity: EntityConfig,
  columns: readonly string[]
): EntityPermissions {
  const roles = new Map<string, RolePermissions>();

  for (const permission of entity.permissions) {
    const key = permission.role.toLowerCase();
    const operations = new Map<TableOperation, OperationPermission>(
      roles.get(key)?.operations ?? []
    );

    for (const action of permission.actions) {
      const row = buildOperationPermission(name, permission.role, action, columns);
      for (const operation of expandConfiguredOperation(action.operation, entity.source.type)) {
        operations.set(operation, operation === "create" ? withoutDatabasePolicy(row) : row);
      }
    }

    roles.set(key, { name: permission.role, operations });
  }

  const anonymous = roles.get(ROLE_ANONYMOUS);
  if (anonymous && !roles.has(ROLE_AUTHENTICATED)) {
    roles.set(ROLE_AUTHENTICATED, {
      name: ROLE_AUTHENTICATED,
      operations: new Map(anonymous.operations),
    });
  }

  const operationRoles = new Map<TableOperation, string[]>();
  const fieldRoles = new Map<string, Map<TableOperation, string[]>>();

  for (const role of roles.values()) {
    for (const [operation, row] of role.operations) {
      addToIndex(operationRoles, operation, role.name);
      for (const column of row.allowed) {
        const byOperation = fieldRoles.get(column) ?? new Map<TableOperation, string[]>();
        addToIndex(byOperation, operation, role.name);
        fieldRoles.set(column, byOperation);
      }
    }
  }

  return {
    name,
    sourceType: entity.source.type,
    columns: [...columns],
    ...exposedNames(entity, columns),
    roles,
    operationRoles,
    fieldRoles,
  };
}

/**
 * Builds the full table. Entities the metadata provider does not know get
 * an empty column set, so no column check on them can succeed.
 */
export function buildPermissionTable(
  config: RuntimeConfig,
  metadata: MetadataProvider
): PermissionTable {
  const entities = new Map<string, EntityPermissions>();
  for (const [name, entity] of Object.entries(config.entities)) {
    entities.set(name, buildEntityPermissions(name, entity, metadata.getColumns(name) ?? []));
  }
  return new PermissionTable(entities);
}
