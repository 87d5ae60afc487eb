/**
 * Observability Module
 *
 * Captures errors and operational messages (authorization denials,
 * configuration reload failures). Follows the provider pattern: a
 * pluggable backend with a structured-console default.
 *
 * Usage:
 *   import { captureException, captureMessage } from "./observability";
 *
 *   captureException(error, { entity: "Book", role: "reader" });
 *   captureMessage("Runtime configuration reload rejected", "warning", { issues: 3 });
 */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type ObservabilitySeverity = "fatal" | "error" | "warning" | "info" | "debug";

/** Context tags attached to an event for filtering */
export interface ObservabilityContext {
  userId?: string;
  role?: string;
  entity?: string;
  [key: string]: unknown;
}

/** The provider contract. Every observability backend implements this. */
export interface ObservabilityProvider {
  /** Provider name (for logging) */
  readonly name: string;

  captureException(error: Error, context?: ObservabilityContext): void;

  captureMessage(
    message: string,
    level: ObservabilitySeverity,
    context?: ObservabilityContext
  ): void;

  /** Flush pending events to the backend (for graceful shutdown) */
  flush(): Promise<void>;
}

// ---------------------------------------------------------------------------
// Console Provider
// ---------------------------------------------------------------------------

export class ConsoleObservabilityProvider implements ObservabilityProvider {
  readonly name = "console";

  captureException(error: Error, context?: ObservabilityContext): void {
    console.error(
      JSON.stringify({
        level: "error",
        context: "observability",
        event: "exception",
        name: error.name,
        message: error.message,
        stack: error.stack,
        ...context,
        timestamp: new Date().toISOString(),
      })
    );
  }

  captureMessage(
    message: string,
    level: ObservabilitySeverity,
    context?: ObservabilityContext
  ): void {
    const logFn =
      level === "fatal" || level === "error"
        ? console.error
        : level === "warning"
          ? console.warn
          : level === "debug"
            ? console.debug
            : console.log;

    logFn(
      JSON.stringify({
        level,
        context: "observability",
        event: "message",
        message,
        ...context,
        timestamp: new Date().toISOString(),
      })
    );
  }

  async flush(): Promise<void> {
    // console writes are synchronous
  }
}

/**
 * Drops everything. Selected with OBSERVABILITY=off, e.g. when logs are
 * already shipped elsewhere and the duplicate lines are noise.
 */
export class SilentObservabilityProvider implements ObservabilityProvider {
  readonly name = "silent";

  captureException(): void {}

  captureMessage(): void {}

  async flush(): Promise<void> {}
}

// ---------------------------------------------------------------------------
// State
// ---------------------------------------------------------------------------

let provider: ObservabilityProvider = new ConsoleObservabilityProvider();

/**
 * Select the provider from the environment. Safe to call multiple times.
 */
export function initObservability(): void {
  provider =
    process.env.OBSERVABILITY === "off"
      ? new SilentObservabilityProvider()
      : new ConsoleObservabilityProvider();
}

// ---------------------------------------------------------------------------
// Public API (delegates to provider)
// ---------------------------------------------------------------------------

export function captureException(
  error: Error,
  context?: ObservabilityContext
): void {
  provider.captureException(error, context);
}

export function captureMessage(
  message: string,
  level: ObservabilitySeverity = "info",
  context?: ObservabilityContext
): void {
  provider.captureMessage(message, level, context);
}

/** Flush pending events (call during graceful shutdown) */
export async function flushObservability(): Promise<void> {
  await provider.flush();
}

/** Get the current observability provider (for testing/inspection) */
export function getObservabilityProvider(): ObservabilityProvider {
  return provider;
}

/** Override the observability provider (for testing or custom backends) */
export function setObservabilityProvider(p: ObservabilityProvider): void {
  provider = p;
}

// ---------------------------------------------------------------------------
// Testing Helpers
// ---------------------------------------------------------------------------

/** Reset observability module state (for testing only) */
export function resetObservability(): void {
  provider = new ConsoleObservabilityProvider();
}
