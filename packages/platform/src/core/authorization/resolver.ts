/**
 * Authorization Resolver
 *
 * The façade a request pipeline talks to. Every method is a synchronous
 * read of the current PermissionTable plus, for policies, the caller's
 * claims.
 *
 * Two failure styles, on purpose:
 *   - role, operation and column checks return false / empty
 *   - policy processing throws AuthorizationError for claim problems
 *
 * Operation names are taken as strings (case-insensitive). Anything
 * outside the closed operation set, including the wildcard, is never
 * defined.
 */

import {
  parseEntityOperation,
  requiredTableOperations,
  type MetadataProvider,
  type Principal,
  type TableOperation,
} from "@rowguard/contracts";
import type { RuntimeConfigProvider } from "../config/runtime-config.js";
import { createLogger } from "../logging/index.js";
import { isInRole, resolvePolicyClaims } from "./claims.js";
import { parameterizePolicy } from "./policy.js";
import {
  buildPermissionTable,
  type EntityPermissions,
  type OperationPermission,
  type PermissionTable,
} from "./permission-table.js";

const logger = createLogger("authorization");

interface ResolvedRows {
  entity: EntityPermissions;
  rows: OperationPermission[];
}

/** Entries present in every list, in the order of the first one */
function intersect(lists: readonly (readonly string[])[]): string[] {
  const [first = [], ...rest] = lists;
  return first.filter((item) => rest.every((list) => list.includes(item)));
}

export class AuthorizationResolver {
  private table: PermissionTable;

  constructor(table: PermissionTable) {
    this.table = table;
  }

  /**
   * Builds a resolver from the provider's current configuration and keeps
   * it current: every successful (re)load swaps in a freshly built table.
   */
  static fromConfigProvider(
    provider: RuntimeConfigProvider,
    metadata: MetadataProvider
  ): AuthorizationResolver {
    const resolver = new AuthorizationResolver(
      buildPermissionTable(provider.getConfig(), metadata)
    );
    provider.onConfigLoaded((config) => {
      resolver.setPermissionTable(buildPermissionTable(config, metadata));
    });
    return resolver;
  }

  // -------------------------------------------------------------------------
  // Table management
  // -------------------------------------------------------------------------

  getPermissionTable(): PermissionTable {
    return this.table;
  }

  /**
   * Replaces the table. Calls already running keep the table they started
   * with; later calls see the new one.
   */
  setPermissionTable(table: PermissionTable): void {
    this.table = table;
    logger.info("Permission table swapped", { entities: table.size });
  }

  // -------------------------------------------------------------------------
  // Lookups
  // -------------------------------------------------------------------------

  /**
   * Rows needed for (entity, role, operation), or null when any is
   * missing. A role with no operations at all stops the lookup early.
   */
  private resolveRows(entityName: string, role: string, operation: string): ResolvedRows | null {
    const entity = this.table.getEntity(entityName);
    if (!entity) return null;

    const permissions = entity.roles.get(role.toLowerCase());
    if (!permissions || permissions.operations.size === 0) return null;

    const requested = parseEntityOperation(operation);
    if (!requested) return null;

    const rows: OperationPermission[] = [];
    for (const tableOperation of requiredTableOperations(requested)) {
      const row = permissions.operations.get(tableOperation);
      if (!row) return null;
      rows.push(row);
    }
    return { entity, rows };
  }

  private tableOperations(operation: string): TableOperation[] {
    const requested = parseEntityOperation(operation);
    return requested ? requiredTableOperations(requested) : [];
  }

  hasEntity(entityName: string): boolean {
    return this.table.getEntity(entityName) !== undefined;
  }

  // -------------------------------------------------------------------------
  // Checks
  // -------------------------------------------------------------------------

  /**
   * The role header must carry exactly one non-empty value, and the caller
   * must hold that role (case-sensitive). Independent of the table.
   */
  isValidRoleContext(
    roleHeader: string | readonly string[] | undefined,
    principal: Principal
  ): boolean {
    if (roleHeader === undefined) return false;
    const values = typeof roleHeader === "string" ? [roleHeader] : roleHeader;
    if (values.length !== 1) return false;

    const [role] = values;
    if (role.trim() === "") return false;
    return isInRole(principal, role);
  }

  areRoleAndOperationDefinedForEntity(entityName: string, role: string, operation: string): boolean {
    return this.resolveRows(entityName, role, operation) !== null;
  }

  /**
   * Every requested column must exist on the entity (by exposed name) and
   * be allowed for the role and operation. One bad column fails the whole
   * request.
   */
  areColumnsAllowedForOperation(
    entityName: string,
    role: string,
    operation: string,
    columns: Iterable<string>
  ): boolean {
    const resolved = this.resolveRows(entityName, role, operation);
    if (!resolved) return false;

    for (const column of columns) {
      const backing = resolved.entity.exposedToBacking.get(column);
      if (backing === undefined) return false;
      if (!resolved.rows.every((row) => row.allowed.has(backing))) return false;
    }
    return true;
  }

  /** Exposed names of the columns the role may use, in metadata order */
  getAllowedExposedColumns(entityName: string, role: string, operation: string): string[] {
    const resolved = this.resolveRows(entityName, role, operation);
    if (!resolved) return [];

    const { entity, rows } = resolved;
    return entity.columns
      .filter((column) => rows.every((row) => row.allowed.has(column)))
      .map((column) => entity.backingToExposed.get(column) ?? column);
  }

  // -------------------------------------------------------------------------
  // Introspection
  // -------------------------------------------------------------------------

  /** Every role with at least one operation on the entity, as configured */
  getRolesForEntity(entityName: string): string[] {
    const entity = this.table.getEntity(entityName);
    if (!entity) return [];
    return [...entity.roles.values()]
      .filter((role) => role.operations.size > 0)
      .map((role) => role.name);
  }

  getRolesForOperation(entityName: string, operation: string): string[] {
    const entity = this.table.getEntity(entityName);
    const operations = this.tableOperations(operation);
    if (!entity || operations.length === 0) return [];
    return intersect(operations.map((op) => entity.operationRoles.get(op) ?? []));
  }

  /** Roles allowed to use the column (by exposed name) under the operation */
  getRolesForField(entityName: string, column: string, operation: string): string[] {
    const entity = this.table.getEntity(entityName);
    const operations = this.tableOperations(operation);
    if (!entity || operations.length === 0) return [];

    const backing = entity.exposedToBacking.get(column);
    const byOperation = backing === undefined ? undefined : entity.fieldRoles.get(backing);
    if (!byOperation) return [];
    return intersect(operations.map((op) => byOperation.get(op) ?? []));
  }

  // -------------------------------------------------------------------------
  // Policies
  // -------------------------------------------------------------------------

  /**
   * The row whose database policy applies. Create rows never carry one, so
   * an upsert takes the policy of its update row.
   */
  private policyRow(resolved: ResolvedRows | null): OperationPermission | undefined {
    return resolved?.rows.find((row) => row.databasePolicy !== undefined);
  }

  /** The raw policy template, or undefined when none applies */
  getDatabasePolicy(entityName: string, role: string, operation: string): string | undefined {
    return this.policyRow(this.resolveRows(entityName, role, operation))?.databasePolicy;
  }

  /**
   * The database policy for the request with the caller's claims
   * substituted, or "" when no policy is configured.
   *
   * @throws AuthorizationError when a claim is missing, duplicated or
   *   cannot be rendered as a literal
   */
  processDatabasePolicy(
    entityName: string,
    role: string,
    operation: string,
    principal: Principal
  ): string {
    const row = this.policyRow(this.resolveRows(entityName, role, operation));
    if (!row?.policyTokens) return "";

    const claims = resolvePolicyClaims(principal, role);
    return parameterizePolicy(row.policyTokens, claims, operation);
  }
}
