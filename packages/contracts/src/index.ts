/**
 * @rowguard/contracts
 *
 * Public API: the shared boundary between the authorization platform and
 * whoever configures or embeds it. Types, constants and the configuration
 * schema only; no engine logic.
 */

// Operations
export type {
  TableOperation,
  EntityOperation,
  ConfiguredOperation,
} from "./operation.js";
export {
  WILDCARD,
  TABLE_OPERATIONS,
  ENTITY_OPERATIONS,
  CRUD_OPERATIONS,
  parseConfiguredOperation,
  parseEntityOperation,
  expandConfiguredOperation,
  requiredTableOperations,
} from "./operation.js";

// Runtime configuration
export type {
  RuntimeConfig,
  EntityConfig,
  EntitySourceConfig,
  PermissionConfig,
  ActionConfig,
  FieldsConfig,
  PolicyConfig,
} from "./runtime-config.js";
export { RuntimeConfigSchema, defineRuntimeConfig } from "./runtime-config.js";

// Metadata
export type { SourceType, MetadataProvider } from "./metadata.js";
export { SOURCE_TYPES } from "./metadata.js";

// Claims and principals
export type {
  Claim,
  ClaimValueType,
  ClaimsIdentity,
  Principal,
} from "./claims.js";
export {
  ROLE_ANONYMOUS,
  ROLE_AUTHENTICATED,
  ROLE_CLAIM_TYPE,
  ORIGINAL_ROLES_CLAIM_TYPE,
  SCOPE_CLAIM_TYPES,
  CLIENT_ROLE_HEADER,
  isSystemRole,
  isAuthenticatedIdentity,
  stringClaim,
} from "./claims.js";

// Authentication
export type { AuthProvider, AuthResult } from "./auth.js";

// Context
export type { Logger } from "./context.js";
