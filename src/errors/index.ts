/**
 * Errors
 *
 * @example
 * ```ts
 * import { ConfigError } from './errors/index.js';
 *
 * throw new ConfigError('overlap must be smaller than chunk_size', 'Run: kbi config set chunking.overlap 200');
 * ```
 */

export {
  CLIError,
  FileNotFoundError,
  ConfigError,
  APIKeyError,
  DatabaseError,
  ValidationError,
} from './types.js';

export {
  describeError,
  formatError,
  getExitCode,
  handleError,
  createGlobalErrorHandler,
  toError,
  type ErrorHandlerOptions,
  type ErrorOutput,
} from './handler.js';
