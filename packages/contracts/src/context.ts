/**
 * Context Types
 *
 * Services the platform hands to its own modules.
 */

/**
 * Structured logger. Every module gets one, tagged with its context name.
 */
export interface Logger {
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  debug(message: string, data?: Record<string, unknown>): void;
}
