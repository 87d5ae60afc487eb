/**
 * Runtime Configuration Provider
 *
 * Owns the current permission configuration. Loading reads the JSON file,
 * checks its structure (zod) and semantics (validator), and only then
 * publishes it to subscribers. A failed reload leaves the previous
 * configuration in place.
 */

import { readFileSync } from "node:fs";
import { RuntimeConfigSchema, type MetadataProvider, type RuntimeConfig } from "@rowguard/contracts";
import { ConfigurationError } from "../authorization/errors.js";
import { createLogger } from "../logging/index.js";
import { assertValidRuntimeConfig } from "./validator.js";

const logger = createLogger("config");

export type ConfigLoadedHandler = (config: RuntimeConfig) => void;

export interface RuntimeConfigProviderOptions {
  path: string;
  metadata: MetadataProvider;
  /** File reader; defaults to a UTF-8 readFileSync */
  readFile?: (path: string) => string;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Parses and validates an already-decoded configuration document.
 *
 * @throws ConfigurationError with one issue per problem, prefixed by the
 *   JSON path for structural problems
 */
export function parseRuntimeConfig(input: unknown, metadata: MetadataProvider): RuntimeConfig {
  const result = RuntimeConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError(
      result.error.issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
      )
    );
  }
  assertValidRuntimeConfig(result.data, metadata);
  return result.data;
}

export class RuntimeConfigProvider {
  private config: RuntimeConfig | null = null;
  private readonly handlers = new Set<ConfigLoadedHandler>();
  private readonly readFile: (path: string) => string;

  constructor(private readonly options: RuntimeConfigProviderOptions) {
    this.readFile = options.readFile ?? ((path) => readFileSync(path, "utf8"));
  }

  get path(): string {
    return this.options.path;
  }

  private read(): RuntimeConfig {
    let text: string;
    try {
      text = this.readFile(this.options.path);
    } catch (err) {
      throw new ConfigurationError([
        `Cannot read runtime configuration at ${this.options.path}: ${errorMessage(err)}`,
      ]);
    }

    let document: unknown;
    try {
      document = JSON.parse(text);
    } catch (err) {
      throw new ConfigurationError([
        `Runtime configuration at ${this.options.path} is not valid JSON: ${errorMessage(err)}`,
      ]);
    }

    return parseRuntimeConfig(document, this.options.metadata);
  }

  /**
   * Reads and validates the file, then publishes it.
   *
   * @throws ConfigurationError when the file is missing or invalid
   */
  load(): RuntimeConfig {
    const config = this.read();
    this.config = config;
    logger.info("Runtime configuration loaded", {
      path: this.options.path,
      entities: Object.keys(config.entities).length,
    });
    for (const handler of this.handlers) handler(config);
    return config;
  }

  /**
   * Like load(), but an invalid file is logged and the previous
   * configuration kept. Returns whether the new file was applied.
   */
  reload(): boolean {
    try {
      this.load();
      return true;
    } catch (err) {
      if (!(err instanceof ConfigurationError)) throw err;
      logger.error("Runtime configuration reload rejected; keeping previous configuration", {
        path: this.options.path,
        issues: err.issues,
      });
      return false;
    }
  }

  /**
   * @throws Error when nothing has been loaded yet
   */
  getConfig(): RuntimeConfig {
    if (!this.config) {
      throw new Error("Runtime configuration not loaded. Call load() during bootstrap.");
    }
    return this.config;
  }

  /** Subscribe to successful loads. Returns an unsubscribe function. */
  onConfigLoaded(handler: ConfigLoadedHandler): () => void {
    this.handlers.add(handler);
    return () => {
      this.handlers.delete(handler);
    };
  }
}
