/**
 * Embed Command
 *
 * Turns the chunk store into an embedding artifact.
 *
 * Usage:
 *   kbi embed                     Read storage.database_path, write storage.output_path
 *   kbi embed --no-images         Text chunks only
 *   kbi embed -o out.json --json  Custom output, NDJSON progress
 *
 * Every call to the model goes through one rate limiter. Failed items are
 * retried with backoff and, once retries run out, skipped.
 */

import { Command } from 'commander';
import { existsSync } from 'node:fs';

import type { CommandContext } from '../types.js';
import { createProgressReporter } from '../utils/progress.js';
import {
  runEmbeddingPipeline,
  RateLimiter,
  RetryingServiceClient,
  GeminiService,
  createImageDownloader,
} from '../../indexer/index.js';
import { getChunkStore } from '../../database/index.js';
import { loadConfig, getEnv, resolveDataPath } from '../../config/index.js';
import { APIKeyError, CLIError, toError } from '../../errors/index.js';

interface EmbedCommandOptions {
  db?: string;
  output?: string;
  /** false with --no-images */
  images: boolean;
}

/**
 * Create the embed command.
 *
 * @param getContext - Factory function to get the command context
 */
export function createEmbedCommand(getContext: () => CommandContext): Command {
  return new Command('embed')
    .description('Embed stored chunks and image captions into one artifact')
    .option('--db <path>', 'Chunk store to read (default: storage.database_path)')
    .option('-o, --output <path>', 'Artifact path (default: storage.output_path)')
    .option('--no-images', 'Skip image captioning')
    .action(async (cmdOptions: EmbedCommandOptions) => {
      const ctx = getContext();
      const config = loadConfig();

      const apiKey = getEnv('GENAI_API_KEY')?.trim();
      if (!apiKey) {
        throw new APIKeyError('Generative Language', 'GENAI_API_KEY');
      }

      const dbPath = resolveDataPath(cmdOptions.db ?? config.storage.database_path);
      if (!existsSync(dbPath)) {
        throw new CLIError(`Chunk store not found: ${dbPath}`, 'Run: kbi chunk  to build it first', 3);
      }
      const outputPath = resolveDataPath(cmdOptions.output ?? config.storage.output_path);
      const captionImages = cmdOptions.images && config.captioning.enabled;

      ctx.debug(`Chunk store: ${dbPath}`);
      ctx.debug(`Output: ${outputPath}`);
      ctx.debug(`Embedding model: ${config.embedding.model} (${config.embedding.task_type})`);
      ctx.debug(
        captionImages ? `Caption model: ${config.captioning.model}` : 'Image captioning disabled'
      );
      ctx.debug(`Rate limit: ${config.rate_limit.rps}/s, ${config.rate_limit.rpm}/min`);

      // Read as-is: a store from another tool may lack the image table
      const store = getChunkStore(dbPath, { migrate: false });

      const reporter = createProgressReporter({
        json: ctx.options.json,
        verbose: ctx.options.verbose,
      });

      const limiter = new RateLimiter({
        rps: config.rate_limit.rps,
        rpm: config.rate_limit.rpm,
      });

      const client = new RetryingServiceClient({
        service: new GeminiService({
          apiKey,
          baseUrl: getEnv('GENAI_BASE_URL'),
          embeddingModel: config.embedding.model,
          taskType: config.embedding.task_type,
          captionModel: config.captioning.model,
          embeddingTimeoutMs: config.embedding.timeout_ms,
          captionTimeoutMs: config.captioning.timeout_ms,
        }),
        downloadImage: createImageDownloader({
          defaultMimeType: config.captioning.default_mime_type,
          timeoutMs: config.captioning.timeout_ms,
        }),
        limiter,
        embedMaxRetries: config.embedding.max_retries,
        captionMaxRetries: config.captioning.max_retries,
        logger: { warn: (message) => reporter.warn(message) },
      });

      try {
        const { result } = await runEmbeddingPipeline({
          source: store,
          client,
          model: config.embedding.model,
          outputPath,
          captionImages,

          onStageStart: (stage, total) => reporter.startStage(stage, total),
          onProgress: (_stage, processed, _total, current) => reporter.updateProgress(processed, current),
          onStageComplete: (_stage, stats) => reporter.completeStage(stats),
          onWarning: (message, context) => reporter.warn(message, context),
          onError: (error, context) => reporter.error(error.message, context),
        });

        reporter.showEmbeddingSummary(result);

        const stats = limiter.getStats();
        ctx.debug(`Remote calls: ${stats.totalCalls}, waited ${Math.round(stats.waitedMs / 1000)}s for the rate limit`);
      } catch (error) {
        if (error instanceof CLIError) throw error;
        throw new CLIError(
          `Embedding failed: ${toError(error).message}`,
          'Check the error details above and try again'
        );
      }
    });
}
