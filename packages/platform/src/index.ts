/**
 * @rowguard/platform
 *
 * The authorization engine and everything it needs to run as a service.
 * Apps import from here; the engine never imports from apps.
 */

// Authorization engine
export { AuthorizationResolver } from "./core/authorization/resolver.js";
export {
  PermissionTable,
  buildPermissionTable,
  buildEntityPermissions,
  resolveColumnSets,
} from "./core/authorization/permission-table.js";
export type {
  EntityPermissions,
  RolePermissions,
  OperationPermission,
  ColumnSets,
} from "./core/authorization/permission-table.js";
export {
  tokenizePolicy,
  parameterizePolicy,
  formatClaimLiteral,
  policyColumns,
  findUnbalancedParenthesis,
  CLAIM_PREFIX,
  FIELD_PREFIX,
  POLICY_OPERATORS,
} from "./core/authorization/policy.js";
export type { PolicyToken, PassThroughKind } from "./core/authorization/policy.js";
export {
  isAuthenticated,
  isInRole,
  resolveClientRole,
  identityFromTokenPayload,
  getAuthenticatedUserClaims,
  resolvePolicyClaims,
  getProcessedUserClaims,
  SYSTEM_ROLE_AUTHENTICATION_TYPE,
} from "./core/authorization/claims.js";
export type { ClientRoleResolution } from "./core/authorization/claims.js";
export { authorizeRequest } from "./core/authorization/pipeline.js";
export type {
  AuthorizationRequest,
  AuthorizationDecision,
  DenialReason,
} from "./core/authorization/pipeline.js";
export {
  AuthorizationError,
  ConfigurationError,
  PolicySyntaxError,
} from "./core/authorization/errors.js";
export type { AuthorizationSubStatus } from "./core/authorization/errors.js";

// Configuration
export { loadConfig } from "./core/config/index.js";
export type { AppConfig } from "./core/config/index.js";
export {
  RuntimeConfigProvider,
  parseRuntimeConfig,
} from "./core/config/runtime-config.js";
export type {
  RuntimeConfigProviderOptions,
  ConfigLoadedHandler,
} from "./core/config/runtime-config.js";
export {
  validateRuntimeConfig,
  assertValidRuntimeConfig,
} from "./core/config/validator.js";

// Metadata
export { StaticMetadataProvider, loadMetadataFile } from "./core/metadata/index.js";

// Auth
export {
  initAuthProvider,
  getAuthProvider,
  setAuthProvider,
  resetAuthProvider,
  JwtAuthProvider,
  JWT_AUTHENTICATION_TYPE,
  DevAuthProvider,
  DEV_USER_ID,
} from "./auth/index.js";
export type { JwtAuthOptions } from "./auth/index.js";

// REST adapter
export { registerAuthorizationRoutes, HTTP_VERB_OPERATIONS } from "./adapters/rest/adapter.js";
export type { AuthorizationRoutesOptions } from "./adapters/rest/adapter.js";
export { authMiddleware, createAuthMiddleware } from "./adapters/rest/auth-middleware.js";
export type { AuthMiddlewareOptions } from "./adapters/rest/auth-middleware.js";

// Logging & observability
export { createLogger } from "./core/logging/index.js";
export type { LogLevel } from "./core/logging/index.js";
export {
  initObservability,
  captureException,
  captureMessage,
  flushObservability,
  getObservabilityProvider,
  setObservabilityProvider,
  resetObservability,
  ConsoleObservabilityProvider,
  SilentObservabilityProvider,
} from "./core/observability/index.js";
export type {
  ObservabilityProvider,
  ObservabilityContext,
  ObservabilitySeverity,
} from "./core/observability/index.js";
