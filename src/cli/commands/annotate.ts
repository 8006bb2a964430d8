/**
 * Annotate Command
 *
 * Writes the `<!-- source_url: ... -->` comment into every markdown file
 * under a directory, so chunks can cite their published page.
 *
 * Usage:
 *   kbi annotate                         Annotate sources.markdown_dir
 *   kbi annotate docs --base-url URL     Annotate another tree
 */

import { Command } from 'commander';
import chalk from 'chalk';

import type { CommandContext } from '../types.js';
import { scanDirectory, annotateFile, type AnnotationAction } from '../../indexer/index.js';
import { loadConfig, resolveDataPath } from '../../config/index.js';
import { toError } from '../../errors/index.js';

interface AnnotateCommandOptions {
  baseUrl?: string;
}

/**
 * Create the annotate command.
 */
export function createAnnotateCommand(getContext: () => CommandContext): Command {
  return new Command('annotate')
    .argument('[dir]', 'Markdown root (default: sources.markdown_dir)')
    .description('Insert or refresh source URL comments in markdown files')
    .option('--base-url <url>', 'Page URL prefix (default: sources.markdown_base_url)')
    .action(async (dir: string | undefined, cmdOptions: AnnotateCommandOptions) => {
      const ctx = getContext();
      const config = loadConfig();

      const root = resolveDataPath(dir ?? config.sources.markdown_dir);
      const baseUrl = cmdOptions.baseUrl ?? config.sources.markdown_base_url;

      ctx.debug(`Annotating ${root} with base URL ${baseUrl}`);

      const { files } = await scanDirectory(root);
      const counts: Record<AnnotationAction, number> = { inserted: 0, updated: 0, unchanged: 0 };
      const failed: string[] = [];

      for (const file of files) {
        try {
          const action = await annotateFile(file.path, baseUrl);
          counts[action]++;
          ctx.debug(`${action}: ${file.relativePath}`);
        } catch (error) {
          failed.push(file.relativePath);
          ctx.error(`${file.relativePath}: ${toError(error).message}`);
        }
      }

      if (failed.length > 0) {
        process.exitCode = 1;
      }

      if (ctx.options.json) {
        console.log(JSON.stringify({ root, files: files.length, ...counts, failed }));
        return;
      }

      ctx.log(
        `${chalk.green('✓')} ${files.length} file(s): ` +
          `${counts.inserted} inserted, ${counts.updated} updated, ${counts.unchanged} unchanged`
      );
    });
}
