/**
 * Where library code reports recoverable problems: a failed attempt that
 * will be retried, an item that is skipped. The CLI routes these through
 * its progress reporter; other callers pass their own.
 */
export interface Logger {
  warn(message: string): void;
}

/** Used when no logger is injected */
export const consoleLogger: Logger = {
  warn: (message) => console.warn(message),
};
