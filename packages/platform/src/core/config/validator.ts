/**
 * Runtime Configuration Validator
 *
 * Semantic checks that need column metadata. Runs at load time; every
 * problem found is reported at once and the configuration is rejected.
 * Nothing here is deferred to request time.
 */

import {
  WILDCARD,
  type ActionConfig,
  type EntityConfig,
  type MetadataProvider,
  type RuntimeConfig,
} from "@rowguard/contracts";
import { ConfigurationError, PolicySyntaxError } from "../authorization/errors.js";
import {
  findUnbalancedParenthesis,
  policyColumns,
  tokenizePolicy,
  type PolicyToken,
} from "../authorization/policy.js";
import { resolveColumnSets } from "../authorization/permission-table.js";

interface ActionScope {
  entity: string;
  role: string;
  action: ActionConfig;
}

function scopeLabel({ entity, role, action }: ActionScope): string {
  return `entity:${entity}, role:${role}, action:${action.operation}`;
}

function validateMappings(name: string, entity: EntityConfig, columns: readonly string[], issues: string[]): void {
  for (const column of Object.keys(entity.mappings)) {
    if (!columns.includes(column)) {
      issues.push(`Entity ${name}: mapped column ${column} is not a column of the entity.`);
    }
  }

  const seen = new Set<string>();
  for (const column of columns) {
    const exposed = entity.mappings[column] ?? column;
    if (seen.has(exposed)) {
      issues.push(`Entity ${name}: exposed name ${exposed} is used by more than one column.`);
    }
    seen.add(exposed);
  }
}

function validateOperation(scope: ActionScope, entity: EntityConfig, issues: string[]): void {
  const operation = scope.action.operation;
  if (entity.source.type === "stored-procedure") {
    if (operation !== "execute" && operation !== WILDCARD) {
      issues.push(
        `Invalid operation for Entity: ${scope.entity}. Stored procedures can only be configured with the 'execute' operation.`
      );
    }
  } else if (operation === "execute") {
    issues.push(
      `Invalid operation for Entity: ${scope.entity}. The 'execute' operation can only be configured for entities backed by stored procedures.`
    );
  }
}

function validateFields(scope: ActionScope, columns: readonly string[], issues: string[]): void {
  const fields = scope.action.fields;
  if (!fields) return;

  const lists: Array<[string, string[] | undefined]> = [
    ["included", fields.include],
    ["excluded", fields.exclude],
  ];
  for (const [set, list] of lists) {
    if (!list) continue;
    if (list.includes(WILDCARD)) {
      if (list.length > 1) {
        issues.push(`No other field can be present with wildcard in the ${set} set for: ${scopeLabel(scope)}`);
      }
      continue;
    }
    for (const field of list) {
      if (!columns.includes(field)) {
        issues.push(`Field ${field} in the ${set} set is not a column of the entity: ${scopeLabel(scope)}`);
      }
    }
  }
}

function validatePolicy(scope: ActionScope, columns: readonly string[], issues: string[]): void {
  const policy = scope.action.policy?.database?.trim();
  if (!policy) return;

  if (scope.action.operation === "create") {
    issues.push(`The create action does not support defining a database policy: ${scopeLabel(scope)}`);
    return;
  }

  let tokens: PolicyToken[];
  try {
    tokens = tokenizePolicy(policy);
  } catch (err) {
    if (err instanceof PolicySyntaxError) {
      issues.push(`Invalid database policy for ${scopeLabel(scope)}: ${err.message}`);
      return;
    }
    throw err;
  }

  const unbalanced = findUnbalancedParenthesis(tokens);
  if (unbalanced >= 0) {
    issues.push(
      `Invalid database policy for ${scopeLabel(scope)}: Unbalanced parenthesis (at offset ${unbalanced})`
    );
  }

  const { allowed } = resolveColumnSets(scope.action.fields, columns);
  if (!policyColumns(tokens).every((column) => allowed.has(column))) {
    issues.push(`Not all the columns required by policy are accessible. ${scopeLabel(scope)}`);
  }
}

/**
 * Returns every semantic problem in the configuration; empty when valid.
 */
export function validateRuntimeConfig(config: RuntimeConfig, metadata: MetadataProvider): string[] {
  const issues: string[] = [];

  for (const [name, entity] of Object.entries(config.entities)) {
    const columns = metadata.getColumns(name);
    if (!columns) {
      issues.push(`Entity ${name}: no column metadata is available.`);
      continue;
    }

    validateMappings(name, entity, columns, issues);

    const roles = new Set<string>();
    for (const permission of entity.permissions) {
      const key = permission.role.toLowerCase();
      if (roles.has(key)) {
        issues.push(`Entity ${name}: role ${permission.role} is configured more than once.`);
      }
      roles.add(key);

      for (const action of permission.actions) {
        const scope: ActionScope = { entity: name, role: permission.role, action };
        validateOperation(scope, entity, issues);
        validateFields(scope, columns, issues);
        validatePolicy(scope, columns, issues);
      }
    }
  }

  return issues;
}

/**
 * @throws ConfigurationError listing every issue found
 */
export function assertValidRuntimeConfig(config: RuntimeConfig, metadata: MetadataProvider): void {
  const issues = validateRuntimeConfig(config, metadata);
  if (issues.length > 0) throw new ConfigurationError(issues);
}
