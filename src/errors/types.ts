/**
 * Error types for kb-ingest.
 *
 * Fatal conditions (bad config, missing credential, unreadable store) are
 * thrown as CLIError subclasses and end the run with their exit code.
 * Per-item remote failures are never thrown; see ServiceResult.
 */

/**
 * Base class for all CLI errors.
 */
export class CLIError extends Error {
  /** Recovery suggestion shown under the message */
  public readonly hint?: string;

  /** Process exit code (1-255) */
  public readonly code: number;

  constructor(message: string, hint?: string, code: number = 1, options?: ErrorOptions) {
    super(message, options);
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = 'CLIError';
    this.hint = hint;
    this.code = code;
  }
}

/** Exit code 3 */
export class FileNotFoundError extends CLIError {
  constructor(path: string) {
    super(`Path does not exist: ${path}`, 'Check the path and try again', 3);
    this.name = 'FileNotFoundError';
  }
}

/**
 * Invalid TOML, out-of-range values, or an overlap that would never let
 * the chunk window advance. Raised before any item is processed.
 *
 * Exit code 2
 */
export class ConfigError extends CLIError {
  constructor(message: string, hint?: string) {
    super(message, hint ?? 'Run: kbi config list  to see valid options', 2);
    this.name = 'ConfigError';
  }
}

/**
 * The remote service credential is missing.
 *
 * Exit code 4
 */
export class APIKeyError extends CLIError {
  /** Environment variable that should hold the key */
  public readonly envVar: string;

  constructor(service: string, envVar: string) {
    super(
      `${service} API key not configured`,
      `Set the ${envVar} environment variable (or add it to a .env file)`,
      4
    );
    this.name = 'APIKeyError';
    this.envVar = envVar;
  }
}

/**
 * The chunk store could not be opened, migrated or read. `cause` holds
 * the SQLite error when there is one.
 *
 * Exit code 5
 */
export class DatabaseError extends CLIError {
  constructor(message: string, cause?: Error) {
    super(message, 'Try running: kbi status  to check the chunk store', 5, cause ? { cause } : undefined);
    this.name = 'DatabaseError';
  }
}

/**
 * A file failed schema validation, e.g. an embedding artifact.
 * Each issue is listed in the hint.
 */
export class ValidationError extends CLIError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(
      message,
      issues.length > 0 ? `Issues:\n  ${issues.join('\n  ')}` : 'Check your input and try again',
      1
    );
    this.name = 'ValidationError';
    this.issues = issues;
  }
}
