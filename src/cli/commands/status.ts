/**
 * Status Command
 *
 * Shows what the chunk store and the embedding artifact hold:
 *   kbi status         - Show counts and paths
 *   kbi status --json  - Output as JSON
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { existsSync } from 'node:fs';

import type { CommandContext } from '../types.js';
import { getChunkStore, type ChunkStoreStats } from '../../database/index.js';
import { readArtifact } from '../../indexer/index.js';
import { loadConfig, getConfigPath, hasApiKey, resolveDataPath } from '../../config/index.js';
import { CLIError } from '../../errors/index.js';

interface StoreStatus {
  path: string;
  exists: boolean;
  size: number;
  stats: ChunkStoreStats | null;
}

type ArtifactStatus =
  | { path: string; exists: false }
  | { path: string; exists: true; valid: false; error: string }
  | {
      path: string;
      exists: true;
      valid: true;
      model: string;
      count: number;
      dimensions: number;
      createdAt: string;
    };

/**
 * Format bytes to human-readable size (e.g., "127.4 MB")
 */
export function formatBytes(bytes: number): string {
  if (bytes === 0) return '0 Bytes';

  const k = 1024;
  const sizes = ['Bytes', 'KB', 'MB', 'GB', 'TB'];
  const i = Math.min(Math.floor(Math.log(bytes) / Math.log(k)), sizes.length - 1);

  return `${parseFloat((bytes / Math.pow(k, i)).toFixed(1))} ${sizes[i]}`;
}

/**
 * Format a path with ~ for home directory
 */
function formatPath(filePath: string): string {
  const homeDir = process.env['HOME'] ?? process.env['USERPROFILE'] ?? '';
  if (homeDir && filePath.startsWith(homeDir)) {
    return '~' + filePath.slice(homeDir.length);
  }
  return filePath;
}

function formatNumber(n: number): string {
  return n.toLocaleString();
}

/**
 * Counts from the chunk store, opened without migrating so status never
 * changes it.
 */
function getStoreStatus(path: string): StoreStatus {
  if (!existsSync(path)) {
    return { path, exists: false, size: 0, stats: null };
  }
  const store = getChunkStore(path, { migrate: false });
  return { path, exists: true, size: store.getDatabaseSize(), stats: store.getStats() };
}

async function getArtifactStatus(path: string): Promise<ArtifactStatus> {
  if (!existsSync(path)) {
    return { path, exists: false };
  }
  try {
    const artifact = await readArtifact(path);
    return {
      path,
      exists: true,
      valid: true,
      model: artifact.model,
      count: artifact.count,
      dimensions: artifact.dimensions,
      createdAt: artifact.created_at,
    };
  } catch (error) {
    if (!(error instanceof CLIError)) throw error;
    return { path, exists: true, valid: false, error: error.message };
  }
}

/**
 * Create the status command
 */
export function createStatusCommand(getContext: () => CommandContext): Command {
  return new Command('status')
    .description('Show chunk store and embedding artifact statistics')
    .action(async () => {
      const ctx = getContext();
      const config = loadConfig();

      const store = getStoreStatus(resolveDataPath(config.storage.database_path));
      const artifact = await getArtifactStatus(resolveDataPath(config.storage.output_path));
      const configPath = getConfigPath();
      const apiKey = hasApiKey();

      ctx.debug(`Chunk store ${store.exists ? 'found' : 'missing'}: ${store.path}`);

      if (ctx.options.json) {
        console.log(
          JSON.stringify(
            {
              chunkStore: store,
              artifact,
              config: { path: configPath },
              apiKeyConfigured: apiKey,
            },
            null,
            2
          )
        );
        return;
      }

      const lines: string[] = [];
      lines.push(chalk.bold('kb-ingest Status'));
      lines.push(chalk.dim('─'.repeat(35)));

      if (store.stats) {
        const { stats } = store;
        lines.push(
          `${chalk.cyan('Markdown:')}     ${formatNumber(stats.markdown)} chunks from ${formatNumber(stats.markdownFiles)} files`
        );
        lines.push(
          `${chalk.cyan('Forum:')}        ${formatNumber(stats.discourse)} chunks from ${formatNumber(stats.discourseTopics)} topics`
        );
        lines.push(
          `${chalk.cyan('Images:')}       ${stats.images === null ? chalk.dim('no image table') : formatNumber(stats.images)}`
        );
        lines.push(`${chalk.cyan('Chunk store:')}  ${formatBytes(store.size)} (${formatPath(store.path)})`);
      } else {
        lines.push(`${chalk.cyan('Chunk store:')}  ${chalk.dim('not found')} (${formatPath(store.path)})`);
      }

      lines.push('');
      if (!artifact.exists) {
        lines.push(`${chalk.cyan('Embeddings:')}   ${chalk.dim('not found')} (${formatPath(artifact.path)})`);
      } else if (!artifact.valid) {
        lines.push(`${chalk.cyan('Embeddings:')}   ${chalk.red(artifact.error)}`);
      } else {
        lines.push(
          `${chalk.cyan('Embeddings:')}   ${formatNumber(artifact.count)} records, ${artifact.dimensions} dimensions (${formatPath(artifact.path)})`
        );
        lines.push(`${chalk.cyan('Model:')}        ${artifact.model}, created ${artifact.createdAt}`);
      }

      lines.push('');
      lines.push(`${chalk.cyan('API key:')}      ${apiKey ? 'configured' : chalk.yellow('not set (GENAI_API_KEY)')}`);
      lines.push(`${chalk.cyan('Config:')}       ${formatPath(configPath)}`);

      if (!store.stats) {
        lines.push('');
        lines.push(chalk.yellow('No chunk store yet.'));
        lines.push(`Run ${chalk.cyan('kbi chunk')} to get started.`);
      }

      ctx.log(lines.join('\n'));
    });
}
