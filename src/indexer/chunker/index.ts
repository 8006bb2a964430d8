/**
 * Chunker Module
 *
 * @example
 * ```ts
 * import { splitText } from './chunker/index.js';
 *
 * const chunks = splitText(cleanedText, config.chunking.chunk_size, config.chunking.overlap);
 * ```
 */

export {
  splitText,
  countChunks,
  normalizeWhitespace,
  assertChunkParameters,
  DEFAULT_CHUNK_SIZE,
  DEFAULT_CHUNK_OVERLAP,
} from './splitter.js';
