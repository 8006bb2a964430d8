/**
 * Config Command
 *
 * Manages $KBI_HOME/config.toml:
 *   kbi config get <key>         - Print one value (dot path)
 *   kbi config set <key> <value> - Validate against the full schema, then write
 *   kbi config list              - Print every value, grouped by section
 *   kbi config path              - Print the file location
 *   kbi config reset --force     - Restore the commented default template
 */

import { Command } from 'commander';
import chalk from 'chalk';
import {
  loadConfig,
  getConfigValue,
  setConfigValue,
  listConfig,
  getConfigPath,
  resetConfig,
} from '../../config/index.js';
import { toError } from '../../errors/index.js';
import type { CommandContext } from '../types.js';

/**
 * Print `payload` as one JSON line with --json, otherwise run `text`.
 */
function output(ctx: CommandContext, payload: unknown, text: () => void): void {
  if (ctx.options.json) {
    console.log(JSON.stringify(payload));
  } else {
    text();
  }
}

function fail(ctx: CommandContext, message: string): void {
  if (ctx.options.json) {
    console.error(JSON.stringify({ error: message }));
  } else {
    ctx.error(message);
  }
  process.exitCode = 1;
}

/**
 * Run a subcommand body, reporting config errors instead of throwing so
 * that `kbi config` can repair a broken file.
 */
function guarded(ctx: CommandContext, body: () => void): void {
  try {
    body();
  } catch (error) {
    fail(ctx, toError(error).message);
  }
}

function formatValue(value: unknown): string {
  return typeof value === 'string' ? value : JSON.stringify(value);
}

export function createConfigCommand(getContext: () => CommandContext): Command {
  const configCmd = new Command('config').description('Manage configuration settings');

  configCmd
    .command('get <key>')
    .description('Get a configuration value (e.g., kbi config get embedding.model)')
    .action((key: string) => {
      const ctx = getContext();
      guarded(ctx, () => {
        const value = getConfigValue(key);
        if (value === undefined) {
          fail(ctx, `Unknown config key: ${key}`);
          ctx.log(`Run ${chalk.cyan('kbi config list')} to see all available keys.`);
          return;
        }
        output(ctx, { key, value }, () => ctx.log(formatValue(value)));
      });
    });

  configCmd
    .command('set <key> <value>')
    .description('Set a configuration value (e.g., kbi config set rate_limit.rps 1)')
    .action((key: string, value: string) => {
      const ctx = getContext();
      guarded(ctx, () => {
        setConfigValue(key, value);
        output(ctx, { success: true, key, value: getConfigValue(key) }, () =>
          ctx.log(`${chalk.green('✓')} Set ${chalk.cyan(key)} = ${chalk.yellow(value)}`)
        );
      });
    });

  configCmd
    .command('list')
    .alias('ls')
    .description('List all configuration values')
    .action(() => {
      const ctx = getContext();
      guarded(ctx, () => {
        const entries = listConfig();
        output(ctx, Object.fromEntries(entries), () => {
          let section = '';
          for (const [key, value] of entries) {
            const [head = ''] = key.split('.');
            if (head !== section) {
              section = head;
              ctx.log('');
              ctx.log(chalk.bold(`[${section}]`));
            }
            ctx.log(`  ${chalk.cyan(key.slice(section.length + 1))} = ${chalk.yellow(formatValue(value))}`);
          }
          ctx.log('');
          ctx.log(chalk.dim(`Config file: ${getConfigPath()}`));
        });
      });
    });

  configCmd
    .command('path')
    .description('Show the config file location')
    .action(() => {
      const ctx = getContext();
      const configPath = getConfigPath();
      output(ctx, { path: configPath }, () => ctx.log(configPath));
    });

  configCmd
    .command('reset')
    .description('Restore the default configuration template')
    .option('-f, --force', 'Skip confirmation')
    .action((options: { force?: boolean }) => {
      const ctx = getContext();

      if (!options.force && !ctx.options.json) {
        ctx.log(chalk.yellow('This will reset all configuration to defaults.'));
        ctx.log(`Run with ${chalk.cyan('--force')} to confirm.`);
        process.exitCode = 1;
        return;
      }

      guarded(ctx, () => {
        const replaced = resetConfig();
        // Writes the default template
        loadConfig(true);
        output(ctx, { success: true, replaced }, () =>
          ctx.log(`${chalk.green('✓')} Configuration reset to defaults`)
        );
      });
    });

  return configCmd;
}
