#!/usr/bin/env node
/**
 * kb-ingest CLI Entry Point
 *
 * This is the main entry point for the `kbi` command.
 * It sets up Commander.js with global options and registers all subcommands.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { readFileSync } from 'node:fs';
import { z } from 'zod';
import type { GlobalOptions, CommandContext } from './types.js';
import { createAnnotateCommand } from './commands/annotate.js';
import { createChunkCommand } from './commands/chunk.js';
import { createConfigCommand } from './commands/config.js';
import { createEmbedCommand } from './commands/embed.js';
import { createStatusCommand } from './commands/status.js';
import {
  handleError,
  createGlobalErrorHandler,
  CLIError,
} from '../errors/index.js';
import {
  validateStartupConfig,
  printStartupValidation,
  getValidationOptionsForCommand,
} from '../config/index.js';
import { parseJsonWithSchema } from '../utils/index.js';

/**
 * Version from package.json (two levels up from both src/cli and dist/cli).
 */
function readVersion(): string {
  const raw = readFileSync(new URL('../../package.json', import.meta.url), 'utf-8');
  const parsed = parseJsonWithSchema(raw, z.object({ version: z.string() }));
  return parsed.success ? parsed.data.version : '0.0.0';
}

// Create the root program
const program = new Command();

program
  .name('kbi')
  .description('Chunk markdown and forum corpora and turn them into a vector embedding set')
  .version(readVersion(), '-v, --version', 'Display version number')

  // Global options - available to ALL subcommands
  .option('--verbose', 'Enable verbose output for debugging', false)
  .option('--json', 'Output results as JSON', false)

  .addHelpText('after', `
${chalk.dim('Examples:')}
  ${chalk.cyan('kbi annotate data/markdown')}        Add source URL comments to markdown files
  ${chalk.cyan('kbi chunk')}                         Build the chunk store
  ${chalk.cyan('kbi embed')}                         Embed chunks and image captions
  ${chalk.cyan('kbi embed --no-images')}             Embed text chunks only
  ${chalk.cyan('kbi status')}                        Show what has been built
  ${chalk.cyan('kbi config set rate_limit.rps 1')}   Change a setting
`);

/**
 * Create a command context with logging utilities
 * This is passed to all command handlers
 */
function createContext(options: GlobalOptions): CommandContext {
  return {
    options,
    log: (message: string) => {
      if (!options.json) {
        console.log(message);
      }
    },
    debug: (message: string) => {
      if (options.verbose && !options.json) {
        console.log(chalk.dim(`[debug] ${message}`));
      }
    },
    warn: (message: string) => {
      if (!options.json) {
        console.warn(chalk.yellow(`Warning: ${message}`));
      }
    },
    error: (message: string) => {
      if (options.json) {
        console.error(JSON.stringify({ error: message }));
      } else {
        console.error(chalk.red(`Error: ${message}`));
      }
    },
  };
}

/**
 * Get global options from the program
 * Commander stores options on the Command object after parsing
 */
function getGlobalOptions(): GlobalOptions {
  const opts = program.opts<Partial<GlobalOptions>>();
  return {
    verbose: opts.verbose ?? false,
    json: opts.json ?? false,
  };
}

/**
 * Name of the top-level command an action belongs to (`config` for
 * `kbi config get ...`).
 */
function topLevelCommandName(command: Command): string {
  let current = command;
  while (current.parent && current.parent !== program) {
    current = current.parent;
  }
  return current.name();
}

const getContext = () => createContext(getGlobalOptions());

program.addCommand(createAnnotateCommand(getContext));
program.addCommand(createChunkCommand(getContext));
program.addCommand(createEmbedCommand(getContext));
program.addCommand(createStatusCommand(getContext));
program.addCommand(createConfigCommand(getContext));

// ============================================================================
// ERROR HANDLING & EXECUTION
// ============================================================================

program.on('command:*', (operands: string[]) => {
  throw new CLIError(
    `Unknown command: ${operands[0]}`,
    `Run: kbi --help  to see available commands`
  );
});

// Check the API key and config file before commands that need them
program.hook('preAction', (_thisCommand, actionCommand) => {
  const opts = getGlobalOptions();
  const validationOptions = getValidationOptionsForCommand(topLevelCommandName(actionCommand));

  if (validationOptions === null) {
    return;
  }

  const result = validateStartupConfig(validationOptions);

  if (result.errors.length > 0 || (opts.verbose && result.warnings.length > 0)) {
    printStartupValidation(result, opts.verbose);

    if (result.errors.length > 0) {
      throw new CLIError(
        'Configuration validation failed',
        'Fix the issues above and try again'
      );
    }
  }
});

async function main(): Promise<void> {
  const getErrorOptions = () => {
    const opts = getGlobalOptions();
    return { verbose: opts.verbose, json: opts.json };
  };

  // Errors that escape every try/catch
  const globalHandler = createGlobalErrorHandler(getErrorOptions());
  process.on('uncaughtException', globalHandler);
  process.on('unhandledRejection', globalHandler);

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    handleError(error, getErrorOptions());
  }
}

await main();
