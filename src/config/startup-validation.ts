/**
 * Startup Configuration Validation
 *
 * Checks the API credential and config file before a command runs.
 * A missing credential is fatal for commands that call the remote
 * service; commands that only touch local files run without one.
 */

import chalk from 'chalk';
import { loadConfig } from './loader.js';
import { hasApiKey, loadEnv, SETUP_INSTRUCTIONS } from './env.js';
import { ConfigError } from '../errors/index.js';

/**
 * Result of startup validation.
 */
export interface StartupValidationResult {
  /** Whether the command may run */
  valid: boolean;
  /** Non-fatal issues */
  warnings: string[];
  /** Fatal issues */
  errors: string[];
  /** Setup instructions for the errors */
  hints: string[];
}

/**
 * Options for startup validation.
 */
export interface StartupValidationOptions {
  /** Skip the API key check (for commands that never call the service) */
  skipApiKey?: boolean;
}

/**
 * Validate configuration at CLI startup.
 *
 * Returns warnings/errors rather than throwing so the caller decides how
 * to present them.
 *
 * @example
 * const result = validateStartupConfig({ skipApiKey: false });
 * if (!result.valid) {
 *   printStartupValidation(result);
 * }
 */
export function validateStartupConfig(
  options: StartupValidationOptions = {}
): StartupValidationResult {
  const { skipApiKey = false } = options;
  const warnings: string[] = [];
  const errors: string[] = [];
  const hints: string[] = [];

  const report = (error: unknown): void => {
    if (!(error instanceof ConfigError)) {
      throw error;
    }
    errors.push(error.message);
    if (error.hint) hints.push(error.hint);
  };

  try {
    loadEnv();
    if (!skipApiKey && !hasApiKey()) {
      errors.push('GENAI_API_KEY is not set');
      hints.push(SETUP_INSTRUCTIONS);
    }
  } catch (error) {
    report(error);
  }

  try {
    const { rps, rpm } = loadConfig(false).rate_limit;
    if (rpm < rps) {
      warnings.push(
        `rate_limit.rpm (${rpm}) is below rate_limit.rps (${rps}); the per-second limit never applies`
      );
    }
  } catch (error) {
    report(error);
  }

  return {
    valid: errors.length === 0,
    warnings,
    errors,
    hints,
  };
}

/**
 * Print startup validation warnings/errors to console.
 *
 * @param verbose - Whether to show warnings (errors are always shown)
 */
export function printStartupValidation(
  result: StartupValidationResult,
  verbose = false
): void {
  for (const error of result.errors) {
    console.error(chalk.red(`✗ ${error}`));
  }

  for (const hint of result.hints) {
    console.error(chalk.dim(`  ${hint}`));
  }

  if (verbose) {
    for (const warning of result.warnings) {
      console.warn(chalk.yellow(`⚠ ${warning}`));
    }
  }
}

/**
 * Commands that call the remote embedding/captioning service.
 */
export const COMMANDS_REQUIRING_API_KEY = ['embed'];

/**
 * Commands that read config.toml and should fail fast on a broken one.
 */
export const COMMANDS_REQUIRING_CONFIG = ['embed', 'chunk', 'annotate', 'status'];

/**
 * Get validation options for a command, or null when the command needs
 * no startup validation at all.
 */
export function getValidationOptionsForCommand(
  command: string
): StartupValidationOptions | null {
  if (!COMMANDS_REQUIRING_CONFIG.includes(command)) {
    return null;
  }
  return {
    skipApiKey: !COMMANDS_REQUIRING_API_KEY.includes(command),
  };
}
