/**
 * Chunk Command
 *
 * Builds the chunk store from markdown documents and forum dumps.
 *
 * Usage:
 *   kbi chunk                           Use the directories from config.toml
 *   kbi chunk --markdown-dir docs       Override the markdown root
 *   kbi chunk --append                  Keep chunks from earlier runs
 *   kbi chunk --json                    Output progress as NDJSON
 *
 * Pipeline:
 * 1. Scanning - Find *.md files and forum *.json dumps
 * 2. Chunking - Clean markup and split into overlapping windows
 * 3. Storing - Write chunks and image URLs to SQLite
 */

import { Command } from 'commander';

import type { CommandContext } from '../types.js';
import { createProgressReporter } from '../utils/progress.js';
import { runChunkPipeline } from '../../indexer/index.js';
import { getChunkStore } from '../../database/index.js';
import { loadConfig, resolveDataPath } from '../../config/index.js';
import { CLIError, toError } from '../../errors/index.js';

interface ChunkCommandOptions {
  markdownDir?: string;
  discourseDir?: string;
  db?: string;
  append: boolean;
}

/**
 * Create the chunk command.
 *
 * @param getContext - Factory function to get the command context
 */
export function createChunkCommand(getContext: () => CommandContext): Command {
  return new Command('chunk')
    .description('Split markdown and forum dumps into the chunk store')
    .option('--markdown-dir <dir>', 'Markdown root (default: sources.markdown_dir)')
    .option('--discourse-dir <dir>', 'Forum dump directory (default: sources.discourse_dir)')
    .option('--db <path>', 'Chunk store path (default: storage.database_path)')
    .option('--append', 'Keep existing chunks instead of clearing the store', false)
    .action(async (cmdOptions: ChunkCommandOptions) => {
      const ctx = getContext();
      const config = loadConfig();

      const markdownDir = resolveDataPath(cmdOptions.markdownDir ?? config.sources.markdown_dir);
      const discourseDir = resolveDataPath(cmdOptions.discourseDir ?? config.sources.discourse_dir);
      const dbPath = resolveDataPath(cmdOptions.db ?? config.storage.database_path);

      ctx.debug(`Markdown: ${markdownDir}`);
      ctx.debug(`Forum dumps: ${discourseDir}`);
      ctx.debug(`Chunk store: ${dbPath}`);
      ctx.debug(`Window: ${config.chunking.chunk_size} chars, overlap ${config.chunking.overlap}`);

      const store = getChunkStore(dbPath);

      const reporter = createProgressReporter({
        json: ctx.options.json,
        verbose: ctx.options.verbose,
      });

      try {
        const result = await runChunkPipeline({
          store,
          markdownDir,
          discourseDir,
          discourseBaseUrl: config.sources.discourse_base_url,
          chunkSize: config.chunking.chunk_size,
          overlap: config.chunking.overlap,
          minPostLength: config.chunking.min_post_length,
          append: cmdOptions.append,

          onStageStart: (stage, total) => reporter.startStage(stage, total),
          onProgress: (_stage, processed, _total, current) => reporter.updateProgress(processed, current),
          onStageComplete: (_stage, stats) => reporter.completeStage(stats),
          onWarning: (message, context) => reporter.warn(message, context),
          onError: (error, context) => reporter.error(error.message, context),
        });

        reporter.showChunkSummary(result);
      } catch (error) {
        if (error instanceof CLIError) throw error;
        throw new CLIError(
          `Chunking failed: ${toError(error).message}`,
          'Check the error details above and try again'
        );
      }
    });
}
