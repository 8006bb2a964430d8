/**
 * Chunk Pipeline
 *
 * Builds the chunk store from raw sources:
 * Scan → Clean + Split → Store
 *
 * Markdown documents contribute text chunks and image references; forum
 * dumps contribute one group of chunks per post. Unreadable or malformed
 * files are reported and skipped.
 */

import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';

import { scanDirectory, MARKDOWN_PATTERNS, DISCOURSE_PATTERNS } from './scanner.js';
import { splitText, assertChunkParameters } from './chunker/index.js';
import { parseMarkdown, parseTopicFile, cleanHtml, buildTopicUrl } from './sources/index.js';
import type { SourceFile } from './types.js';
import type {
  ChunkStore,
  DiscoursePostInput,
  MarkdownDocumentInput,
} from '../database/index.js';
import { toError } from '../errors/index.js';
import type { PipelineStage, StageStats, ChunkPipelineResult } from '../cli/utils/progress.js';

/** Default for `chunking.min_post_length` */
export const DEFAULT_MIN_POST_LENGTH = 20;

/**
 * The chunk store operations this pipeline writes through.
 */
export type ChunkSink = Pick<ChunkStore, 'clearChunks' | 'insertMarkdownDocument' | 'insertDiscoursePost'>;

/**
 * Options for running the chunk pipeline.
 */
export interface ChunkPipelineOptions {
  store: ChunkSink;

  /** Markdown root; skipped with a warning when it does not exist */
  markdownDir?: string;

  /** Forum dump directory; skipped with a warning when it does not exist */
  discourseDir?: string;

  /** Forum origin for chunk URLs */
  discourseBaseUrl: string;

  chunkSize: number;
  overlap: number;

  /** Posts whose cleaned text is shorter are skipped (default: 20) */
  minPostLength?: number;

  /** Keep existing chunks instead of clearing the store first */
  append?: boolean;

  // Progress callbacks
  onStageStart?: (stage: PipelineStage, total: number) => void;
  onProgress?: (stage: PipelineStage, processed: number, total: number, current?: string) => void;
  onStageComplete?: (stage: PipelineStage, stats: StageStats) => void;
  onWarning?: (message: string, context?: string) => void;
  onError?: (error: Error, context?: string) => void;
}

/**
 * Run the chunk pipeline.
 *
 * @throws ConfigError before reading anything if overlap >= chunk size
 */
export async function runChunkPipeline(options: ChunkPipelineOptions): Promise<ChunkPipelineResult> {
  const {
    store,
    markdownDir,
    discourseDir,
    discourseBaseUrl,
    chunkSize,
    overlap,
    minPostLength = DEFAULT_MIN_POST_LENGTH,
    append = false,
    onStageStart,
    onProgress,
    onStageComplete,
    onWarning,
    onError,
  } = options;

  assertChunkParameters(chunkSize, overlap);

  const pipelineStartTime = performance.now();
  const stageDurations: Partial<Record<PipelineStage, number>> = {};
  const warnings: string[] = [];
  const errors: string[] = [];

  const warn = (message: string, context?: string): void => {
    warnings.push(context ? `${context}: ${message}` : message);
    onWarning?.(message, context);
  };

  const fail = (error: Error, context: string): void => {
    errors.push(`${context}: ${error.message}`);
    onError?.(error, context);
  };

  // =========================================================================
  // STAGE 1: SCANNING
  // =========================================================================
  const scanStartTime = performance.now();
  onStageStart?.('scanning', 0);

  let filesFound = 0;
  const scan = async (dir: string | undefined, patterns: string[], label: string): Promise<SourceFile[]> => {
    if (!dir) {
      return [];
    }
    if (!existsSync(dir)) {
      warn(`${label} directory not found; skipping`, dir);
      return [];
    }
    const result = await scanDirectory(dir, {
      patterns,
      onError: (path, error) => fail(error, path),
    });
    for (const file of result.files) {
      filesFound++;
      onProgress?.('scanning', filesFound, 0, file.relativePath);
    }
    return result.files;
  };

  const markdownFiles = await scan(markdownDir, MARKDOWN_PATTERNS, 'Markdown');
  const discourseFiles = await scan(discourseDir, DISCOURSE_PATTERNS, 'Forum dump');

  const scanDuration = Math.round(performance.now() - scanStartTime);
  stageDurations.scanning = scanDuration;
  onStageComplete?.('scanning', {
    stage: 'scanning',
    processed: filesFound,
    total: filesFound,
    durationMs: scanDuration,
    details: { markdown: markdownFiles.length, discourse: discourseFiles.length },
  });

  // =========================================================================
  // STAGE 2: CHUNKING
  // =========================================================================
  const chunkStartTime = performance.now();
  const fileTotal = markdownFiles.length + discourseFiles.length;
  onStageStart?.('chunking', fileTotal);

  const documents: MarkdownDocumentInput[] = [];
  const posts: DiscoursePostInput[] = [];
  let filesChunked = 0;
  let skippedFiles = 0;
  let skippedPosts = 0;
  let topicsRead = 0;

  const read = async (file: SourceFile): Promise<string | null> => {
    try {
      return await readFile(file.path, 'utf-8');
    } catch (error) {
      skippedFiles++;
      fail(toError(error), file.relativePath);
      return null;
    }
  };

  for (const file of markdownFiles) {
    const text = await read(file);
    if (text !== null) {
      const parsed = parseMarkdown(text);
      documents.push({
        filePath: file.path,
        sourceUrl: parsed.sourceUrl,
        chunks: splitText(parsed.text, chunkSize, overlap),
        imageUrls: parsed.imageUrls,
      });
    }
    onProgress?.('chunking', ++filesChunked, fileTotal, file.relativePath);
  }

  for (const file of discourseFiles) {
    const text = await read(file);
    if (text !== null) {
      const parsed = parseTopicFile(text);
      if (!parsed.success) {
        skippedFiles++;
        warn(`Skipping malformed topic dump: ${parsed.error}`, file.relativePath);
      } else {
        topicsRead++;
        const { topic } = parsed;
        for (const post of topic.posts) {
          const cleaned = cleanHtml(post.cooked);
          if (cleaned.length < minPostLength) {
            skippedPosts++;
            continue;
          }
          posts.push({
            postId: post.id,
            topicId: topic.id,
            chunks: splitText(cleaned, chunkSize, overlap).map((content, index) => ({
              content,
              sourceUrl: buildTopicUrl(discourseBaseUrl, topic.slug, topic.id, index),
            })),
          });
        }
      }
    }
    onProgress?.('chunking', ++filesChunked, fileTotal, file.relativePath);
  }

  const markdownChunkCount = documents.reduce((sum, doc) => sum + doc.chunks.length, 0);
  const discourseChunkCount = posts.reduce((sum, post) => sum + post.chunks.length, 0);
  const imageReferenceCount = documents.reduce((sum, doc) => sum + doc.imageUrls.length, 0);

  const chunkDuration = Math.round(performance.now() - chunkStartTime);
  stageDurations.chunking = chunkDuration;
  onStageComplete?.('chunking', {
    stage: 'chunking',
    processed: markdownChunkCount + discourseChunkCount,
    total: markdownChunkCount + discourseChunkCount,
    durationMs: chunkDuration,
    details: {
      images: imageReferenceCount,
      skippedFiles,
      skippedPosts,
    },
  });

  // =========================================================================
  // STAGE 3: STORING
  // =========================================================================
  const storeStartTime = performance.now();
  const storeTotal = documents.length + posts.length;
  onStageStart?.('storing', storeTotal);

  if (!append) {
    store.clearChunks();
  }

  let stored = 0;
  for (const document of documents) {
    store.insertMarkdownDocument(document);
    onProgress?.('storing', ++stored, storeTotal, document.filePath);
  }
  for (const post of posts) {
    store.insertDiscoursePost(post);
    onProgress?.('storing', ++stored, storeTotal);
  }

  const storeDuration = Math.round(performance.now() - storeStartTime);
  stageDurations.storing = storeDuration;
  onStageComplete?.('storing', {
    stage: 'storing',
    processed: markdownChunkCount + discourseChunkCount,
    total: markdownChunkCount + discourseChunkCount,
    durationMs: storeDuration,
    details: { append },
  });

  return {
    markdownFiles: documents.length,
    discourseFiles: topicsRead,
    markdownChunks: markdownChunkCount,
    discourseChunks: discourseChunkCount,
    imageReferences: imageReferenceCount,
    skippedFiles,
    skippedPosts,
    totalDurationMs: Math.round(performance.now() - pipelineStartTime),
    stageDurations,
    warnings,
    errors,
  };
}
