/**
 * Logger Interface for Library Code
 *
 * Library modules (ingestion, embedder, stores, agent) accept a Logger
 * through their options. The CLI passes its CommandContext, which satisfies
 * this interface; tests pass silentLogger or a vi.fn() spy.
 */

/**
 * Generic logger interface for library code
 */
export interface Logger {
  /** Progress and outcome messages (optional - not every context shows them) */
  info?: (message: string) => void;
  /** Log a warning message */
  warn: (message: string) => void;
  /** Log a debug message (optional - not all contexts need debug) */
  debug?: (message: string) => void;
}

/**
 * Console logger used when nothing is injected.
 */
export const consoleLogger: Logger = {
  info: (message: string) => console.log(message),
  warn: (message: string) => console.warn(message),
  debug: (message: string) => console.log(message),
};

/**
 * Silent logger for tests or when logging should be suppressed.
 */
export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  debug: () => {},
};

/**
 * Prefix every message, e.g. with the component name.
 */
export function scopedLogger(logger: Logger, scope: string): Logger {
  return {
    info: logger.info ? (message) => logger.info?.(`[${scope}] ${message}`) : undefined,
    warn: (message) => logger.warn(`[${scope}] ${message}`),
    debug: logger.debug ? (message) => logger.debug?.(`[${scope}] ${message}`) : undefined,
  };
}
