/**
 * Bootstrap
 *
 * Wires configuration, metadata, the runtime permission configuration and
 * authentication into a ready resolver.
 * This is the SINGLE place where process configuration meets the engine.
 *
 * Sequence:
 *   1. Initialize observability
 *   2. Load process configuration from the environment
 *   3. Load column metadata
 *   4. Load and validate the runtime permission configuration
 *   5. Build the resolver (it follows later reloads on its own)
 *   6. Initialize the auth provider
 */

import {
  AuthorizationResolver,
  RuntimeConfigProvider,
  createLogger,
  initAuthProvider,
  initObservability,
  loadConfig,
  loadMetadataFile,
  type AppConfig,
} from "@rowguard/platform";

const logger = createLogger("bootstrap");

export interface BootstrapResult {
  config: AppConfig;
  configProvider: RuntimeConfigProvider;
  resolver: AuthorizationResolver;
}

/**
 * Initializes the entire application.
 * Call once at server startup. Throws on any configuration problem.
 */
export function bootstrap(env: NodeJS.ProcessEnv = process.env): BootstrapResult {
  // 0. Initialize observability FIRST: captures errors from all subsequent steps
  initObservability();

  const config = loadConfig(env);

  const metadata = loadMetadataFile(config.metadataPath);

  const configProvider = new RuntimeConfigProvider({ path: config.runtimeConfigPath, metadata });
  configProvider.load();

  const resolver = AuthorizationResolver.fromConfigProvider(configProvider, metadata);

  initAuthProvider(config);

  logger.info("Bootstrap complete", {
    entities: resolver.getPermissionTable().entityNames(),
    runtimeConfigPath: config.runtimeConfigPath,
  });

  return { config, configProvider, resolver };
}
