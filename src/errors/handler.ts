/**
 * Top-level error reporting for the CLI.
 *
 * Every thrown value is first reduced to an ErrorOutput, then rendered
 * as coloured text or, with `--json`, as a JSON object on stderr.
 */

import chalk from 'chalk';
import { CLIError, ValidationError } from './types.js';

export interface ErrorHandlerOptions {
  /** Include stack traces */
  verbose?: boolean;
  /** Render as JSON instead of text */
  json?: boolean;
}

/**
 * Structured form of a thrown value, as printed with `--json`.
 */
export interface ErrorOutput {
  error: string;
  code: number;
  hint?: string;
  /** Message of the wrapped error (e.g. the SQLite error behind a DatabaseError) */
  cause?: string;
  /** Field-level problems of a ValidationError */
  issues?: string[];
  stack?: string;
}

/**
 * Normalize anything thrown into an Error instance.
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

export function getExitCode(error: unknown): number {
  return error instanceof CLIError ? error.code : 1;
}

/**
 * Reduce a thrown value to the fields the renderers print.
 */
export function describeError(error: unknown, verbose = false): ErrorOutput {
  if (!(error instanceof Error)) {
    return { error: String(error), code: 1 };
  }

  const output: ErrorOutput = { error: error.message, code: getExitCode(error) };

  if (error instanceof CLIError && error.hint) {
    output.hint = error.hint;
  }
  if (error.cause instanceof Error) {
    output.cause = error.cause.message;
  }
  if (error instanceof ValidationError && error.issues.length > 0) {
    output.issues = error.issues;
  }
  if (verbose && error.stack) {
    output.stack = error.stack;
  }

  return output;
}

/**
 * Format an error for display. Pure, so it can be tested without
 * process.exit.
 */
export function formatError(error: unknown, options: ErrorHandlerOptions = {}): string {
  const { verbose = false, json = false } = options;
  const output = describeError(error, verbose);

  if (json) {
    return JSON.stringify(output, null, 2);
  }

  const lines = [chalk.red('Error: ') + output.error];

  if (output.cause) {
    lines.push(chalk.dim('Caused by: ') + output.cause);
  }

  if (output.hint) {
    lines.push(chalk.dim('Hint: ') + output.hint);
  } else if (error instanceof Error && !(error instanceof CLIError) && !verbose) {
    // Unexpected failure: the stack is the useful part
    lines.push(chalk.dim('Hint: ') + 'Run with --verbose for more details');
  }

  if (output.stack) {
    lines.push('', chalk.dim('Stack trace:'), chalk.dim(output.stack));
  }

  return lines.join('\n');
}

/**
 * Print the error to stderr and exit with its code.
 */
export function handleError(error: unknown, options: ErrorHandlerOptions = {}): never {
  console.error(formatError(error, options));
  process.exit(getExitCode(error));
}

/**
 * Handler for `uncaughtException` / `unhandledRejection`.
 */
export function createGlobalErrorHandler(
  options: ErrorHandlerOptions = {}
): (error: unknown) => never {
  return (error: unknown) => handleError(error, options);
}
