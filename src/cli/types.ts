/**
 * Options parsed on the root `kbi` program, shared by every subcommand.
 */
export interface GlobalOptions {
  verbose: boolean;
  /** NDJSON progress and JSON results on stdout */
  json: boolean;
}

/**
 * What a command handler gets from the entry point. `warn` makes it a
 * library Logger as well.
 */
export interface CommandContext {
  options: GlobalOptions;
  /** Suppressed with --json */
  log: (message: string) => void;
  /** Shown only with --verbose */
  debug: (message: string) => void;
  /** Suppressed with --json */
  warn: (message: string) => void;
  error: (message: string) => void;
}
