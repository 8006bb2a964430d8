/**
 * Embedding Pipeline
 *
 * Text chunks → embed → collection; image references → caption → embed →
 * collection; then the collection is written as one artifact.
 *
 * Items are processed one at a time. Retries live in the service client;
 * here a failed item is counted, reported through the callbacks, and
 * skipped. The pipeline never stops for a single item.
 */

import type { ChunkOrigin, ImageReference, MalformedRowHandler, TextChunk } from '../database/index.js';
import type { EmbeddingVector, RetryResult } from './embedder/index.js';
import {
  EmbeddingCollection,
  buildArtifact,
  writeArtifact,
  type OutputRecord,
} from './output/index.js';
import { toError } from '../errors/index.js';
import type {
  PipelineStage,
  SkipReason,
  StageStats,
  EmbeddingPipelineResult,
} from '../cli/utils/progress.js';

/** Prefix marking image-derived records in the output */
export const IMAGE_CONTENT_PREFIX = '[IMAGE] ';

/**
 * Where chunks come from. The chunk store implements this; a
 * `getImageReferences` returning null means the store has no image table.
 * Rows a source cannot turn into chunks go to `onMalformedRow`.
 */
export interface ChunkSource {
  getTextChunks(origin?: ChunkOrigin, onMalformedRow?: MalformedRowHandler): TextChunk[];
  getImageReferences(onMalformedRow?: MalformedRowHandler): ImageReference[] | null;
}

/**
 * The two retried operations the pipeline calls.
 */
export interface EmbeddingClient {
  embedText(content: string, label?: string): Promise<RetryResult<EmbeddingVector>>;
  captionImage(url: string): Promise<RetryResult<string>>;
}

/**
 * Options for running the embedding pipeline.
 */
export interface EmbeddingPipelineOptions {
  source: ChunkSource;
  client: EmbeddingClient;

  /** Embedding model name, recorded in the artifact */
  model: string;

  /** Artifact path. When omitted nothing is written and the collection is only returned. */
  outputPath?: string;

  /** Caption and embed images (default: true) */
  captionImages?: boolean;

  /** Collection to append to (default: a new one) */
  collection?: EmbeddingCollection;

  /** Clock for the artifact's created_at */
  now?: () => Date;

  // Progress callbacks
  onStageStart?: (stage: PipelineStage, total: number) => void;
  onProgress?: (stage: PipelineStage, processed: number, total: number, current?: string) => void;
  onStageComplete?: (stage: PipelineStage, stats: StageStats) => void;
  onWarning?: (message: string, context?: string) => void;
  onError?: (error: Error, context?: string) => void;
}

export interface EmbeddingPipelineOutput {
  result: EmbeddingPipelineResult;
  collection: EmbeddingCollection;
}

/**
 * Run the embedding pipeline.
 *
 * @throws when the text chunks cannot be read or the artifact cannot be
 *   written; per-item failures never throw
 *
 * @example
 * ```typescript
 * const reporter = createProgressReporter({ json: false, verbose: true });
 *
 * const { result } = await runEmbeddingPipeline({
 *   source: getChunkStore(dbPath, { migrate: false }),
 *   client,
 *   model: config.embedding.model,
 *   outputPath: 'data/embeddings.json',
 *   onStageStart: (stage, total) => reporter.startStage(stage, total),
 *   onProgress: (stage, processed, total, current) => reporter.updateProgress(processed, current),
 *   onStageComplete: (stage, stats) => reporter.completeStage(stats),
 *   onWarning: (msg, ctx) => reporter.warn(msg, ctx),
 *   onError: (err, ctx) => reporter.error(err.message, ctx),
 * });
 *
 * reporter.showEmbeddingSummary(result);
 * ```
 */
export async function runEmbeddingPipeline(
  options: EmbeddingPipelineOptions
): Promise<EmbeddingPipelineOutput> {
  const {
    source,
    client,
    model,
    outputPath,
    captionImages = true,
    now = () => new Date(),
    onStageStart,
    onProgress,
    onStageComplete,
    onWarning,
    onError,
  } = options;

  const collection = options.collection ?? new EmbeddingCollection();
  const pipelineStartTime = performance.now();
  const stageDurations: Partial<Record<PipelineStage, number>> = {};
  const skipped: Partial<Record<SkipReason, number>> = {};
  const warnings: string[] = [];
  const errors: string[] = [];

  const warn = (message: string, context?: string): void => {
    warnings.push(context ? `${context}: ${message}` : message);
    onWarning?.(message, context);
  };

  const skip = (reason: SkipReason, error: Error, context: string): void => {
    skipped[reason] = (skipped[reason] ?? 0) + 1;
    errors.push(`${context}: ${error.message}`);
    onError?.(error, context);
  };

  const append = (record: OutputRecord, context: string): boolean => {
    const appended = collection.append(record);
    if (appended.accepted) {
      return true;
    }
    skip(appended.reason, new Error(appended.message), context);
    return false;
  };

  const skipMalformed: MalformedRowHandler = ({ table, index, problem }) =>
    skip('malformed-row', new Error(`Malformed row skipped: ${problem}`), `${table}[${index}]`);

  // Missing text tables are fatal; a missing image table is not
  const textChunks = source.getTextChunks(undefined, skipMalformed);
  const imageReferences = readImageReferences(source, captionImages, warn, skipMalformed);

  // =========================================================================
  // STAGE 1: TEXT CHUNKS
  // =========================================================================
  const embedStartTime = performance.now();
  onStageStart?.('embedding', textChunks.length);

  let textRecords = 0;

  for (const [index, chunk] of textChunks.entries()) {
    const context = `${chunk.origin} chunk ${index + 1}/${textChunks.length}`;
    const embedded = await client.embedText(chunk.content, context);

    if (!embedded.ok) {
      skip('embedding-failed', embedded.error, context);
    } else if (
      append({ content: chunk.content, sourceUrl: chunk.sourceUrl, embedding: embedded.value }, context)
    ) {
      textRecords++;
    }

    onProgress?.('embedding', index + 1, textChunks.length, chunk.sourceUrl || undefined);
  }

  const embedDuration = Math.round(performance.now() - embedStartTime);
  stageDurations.embedding = embedDuration;
  onStageComplete?.('embedding', {
    stage: 'embedding',
    processed: textRecords,
    total: textChunks.length,
    durationMs: embedDuration,
  });

  // =========================================================================
  // STAGE 2: IMAGES
  // =========================================================================
  let imageRecords = 0;

  if (captionImages) {
    const captionStartTime = performance.now();
    onStageStart?.('captioning', imageReferences.length);

    for (const [index, image] of imageReferences.entries()) {
      const caption = await client.captionImage(image.url);

      if (!caption.ok) {
        skip('caption-failed', caption.error, image.url);
      } else {
        const embedded = await client.embedText(caption.value, `caption of ${image.url}`);
        if (!embedded.ok) {
          skip('embedding-failed', embedded.error, image.url);
        } else if (
          append(
            {
              content: `${IMAGE_CONTENT_PREFIX}${caption.value}`,
              sourceUrl: image.url,
              embedding: embedded.value,
            },
            image.url
          )
        ) {
          imageRecords++;
        }
      }

      onProgress?.('captioning', index + 1, imageReferences.length, image.url);
    }

    const captionDuration = Math.round(performance.now() - captionStartTime);
    stageDurations.captioning = captionDuration;
    onStageComplete?.('captioning', {
      stage: 'captioning',
      processed: imageRecords,
      total: imageReferences.length,
      durationMs: captionDuration,
    });
  }

  // =========================================================================
  // STAGE 3: ARTIFACT
  // =========================================================================
  if (outputPath) {
    const writeStartTime = performance.now();
    onStageStart?.('writing', collection.size);

    await writeArtifact(outputPath, buildArtifact(collection, model, now()));

    const writeDuration = Math.round(performance.now() - writeStartTime);
    stageDurations.writing = writeDuration;
    onStageComplete?.('writing', {
      stage: 'writing',
      processed: collection.size,
      total: collection.size,
      durationMs: writeDuration,
      details: { path: outputPath },
    });
  }

  return {
    collection,
    result: {
      textChunks: textChunks.length,
      imageReferences: imageReferences.length,
      textRecords,
      imageRecords,
      recordCount: collection.size,
      dimensions: collection.dimensions,
      skipped,
      outputPath: outputPath ?? null,
      totalDurationMs: Math.round(performance.now() - pipelineStartTime),
      stageDurations,
      warnings,
      errors,
    },
  };
}

/**
 * Image references, or an empty list when captioning is off or the
 * source has none to give.
 */
function readImageReferences(
  source: ChunkSource,
  enabled: boolean,
  warn: (message: string, context?: string) => void,
  onMalformedRow: MalformedRowHandler
): ImageReference[] {
  if (!enabled) {
    return [];
  }

  try {
    const references = source.getImageReferences(onMalformedRow);
    if (references === null) {
      warn('No image table in the chunk store; skipping images');
      return [];
    }
    return references;
  } catch (error) {
    warn(`Could not read image references: ${toError(error).message}; skipping images`);
    return [];
  }
}
