/**
 * Source Scanner
 *
 * File discovery for markdown documents and forum dumps using fast-glob.
 */

import { existsSync, statSync } from 'node:fs';
import { resolve } from 'node:path';
import fg from 'fast-glob';

import { FileNotFoundError, toError } from '../errors/index.js';
import type { ScanOptions, ScanResult, SourceFile } from './types.js';

export type { ScanOptions, ScanResult, SourceFile };

/** Markdown documents at any depth */
export const MARKDOWN_PATTERNS = ['**/*.md'];

/** Forum dumps sit directly in their directory, one topic per file */
export const DISCOURSE_PATTERNS = ['*.json'];

/**
 * Scan a directory for source files.
 *
 * @throws FileNotFoundError if the directory does not exist
 *
 * @example
 * ```ts
 * const result = await scanDirectory('data/markdown');
 * console.log(`Discovered ${result.files.length} files`);
 * ```
 */
export async function scanDirectory(
  rootPath: string,
  options: ScanOptions = {}
): Promise<ScanResult> {
  const startTime = performance.now();
  const absoluteRoot = resolve(rootPath);

  if (!existsSync(absoluteRoot)) {
    throw new FileNotFoundError(absoluteRoot);
  }

  const entries = await fg(options.patterns ?? MARKDOWN_PATTERNS, {
    cwd: absoluteRoot,
    dot: false,
    onlyFiles: true,
    followSymbolicLinks: false,
    deep: options.maxDepth ?? Infinity,
    suppressErrors: true,
  });

  const files: SourceFile[] = [];
  let totalSize = 0;

  for (const relativePath of [...entries].sort()) {
    const path = resolve(absoluteRoot, relativePath);
    try {
      const size = statSync(path).size;
      files.push({ path, relativePath, size });
      totalSize += size;
    } catch (error) {
      options.onError?.(path, toError(error));
    }
  }

  return {
    rootPath: absoluteRoot,
    files,
    totalSize,
    scanDurationMs: Math.round(performance.now() - startTime),
  };
}
