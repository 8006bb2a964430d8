/**
 * Chunk Splitter
 *
 * Splits text into fixed-width, overlapping character windows.
 *
 * Window i starts at i * (chunkSize - overlap). Splitting stops at the
 * first window that reaches the end of the text, so a text of length
 * L > chunkSize yields ceil((L - overlap) / (chunkSize - overlap)) chunks
 * and the last one may be shorter than chunkSize.
 */

import { ConfigError } from '../../errors/index.js';

export const DEFAULT_CHUNK_SIZE = 1000;
export const DEFAULT_CHUNK_OVERLAP = 200;

/**
 * Collapse runs of whitespace to a single space and trim.
 */
export function normalizeWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Reject parameters that would never advance the window.
 *
 * @throws ConfigError
 */
export function assertChunkParameters(chunkSize: number, overlap: number): void {
  if (!Number.isInteger(chunkSize) || chunkSize < 1) {
    throw new ConfigError(`chunk_size must be a positive integer (got ${chunkSize})`);
  }
  if (!Number.isInteger(overlap) || overlap < 0) {
    throw new ConfigError(`overlap must be a non-negative integer (got ${overlap})`);
  }
  if (overlap >= chunkSize) {
    throw new ConfigError(`overlap (${overlap}) must be smaller than chunk_size (${chunkSize})`);
  }
}

/**
 * Split `text` into overlapping chunks.
 *
 * @example
 * ```ts
 * splitText('a'.repeat(2400)).map((c) => c.length); // [1000, 1000, 800]
 * ```
 *
 * @throws ConfigError if overlap >= chunkSize
 */
export function splitText(
  text: string,
  chunkSize = DEFAULT_CHUNK_SIZE,
  overlap = DEFAULT_CHUNK_OVERLAP
): string[] {
  assertChunkParameters(chunkSize, overlap);

  const normalized = normalizeWhitespace(text);
  if (normalized.length === 0) {
    return [];
  }
  if (normalized.length <= chunkSize) {
    return [normalized];
  }

  const step = chunkSize - overlap;
  const chunks: string[] = [];

  for (let start = 0; start < normalized.length; start += step) {
    chunks.push(normalized.slice(start, start + chunkSize));
    if (start + chunkSize >= normalized.length) {
      break;
    }
  }

  return chunks;
}

/**
 * Number of chunks splitText produces for a normalized text of `length`.
 */
export function countChunks(
  length: number,
  chunkSize = DEFAULT_CHUNK_SIZE,
  overlap = DEFAULT_CHUNK_OVERLAP
): number {
  assertChunkParameters(chunkSize, overlap);
  if (length === 0) return 0;
  if (length <= chunkSize) return 1;
  return Math.ceil((length - overlap) / (chunkSize - overlap));
}
