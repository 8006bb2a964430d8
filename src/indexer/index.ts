/**
 * Indexer Module
 *
 * Source discovery and cleaning, chunking, the rate-limited service
 * client, and the two pipelines that tie them together.
 *
 * @example
 * ```ts
 * import { runChunkPipeline, runEmbeddingPipeline } from './indexer/index.js';
 *
 * await runChunkPipeline({ store, markdownDir: 'data/markdown', ... });
 * const { result } = await runEmbeddingPipeline({ source: store, client, model, outputPath });
 * console.log(`Produced ${result.recordCount} records`);
 * ```
 */

// Scanner
export { scanDirectory, MARKDOWN_PATTERNS, DISCOURSE_PATTERNS } from './scanner.js';
export type { SourceFile, ScanOptions, ScanResult } from './types.js';

// Chunker
export {
  splitText,
  countChunks,
  normalizeWhitespace,
  assertChunkParameters,
  DEFAULT_CHUNK_SIZE,
  DEFAULT_CHUNK_OVERLAP,
} from './chunker/index.js';

// Source preprocessing
export {
  parseMarkdown,
  extractSourceUrl,
  extractImageUrls,
  stripMarkdown,
  parseTopicFile,
  cleanHtml,
  buildTopicUrl,
  annotateSourceUrl,
  annotateFile,
  pageNameFromPath,
  pageUrlFromPath,
  formatSourceUrlComment,
  type ParsedMarkdown,
  type DiscourseTopic,
  type TopicParseResult,
  type AnnotationAction,
  type AnnotationResult,
} from './sources/index.js';

// Remote service
export {
  RateLimiter,
  RetryingServiceClient,
  GeminiService,
  ServiceRequestError,
  createImageDownloader,
  CAPTION_PROMPT,
  success,
  failure,
  type ServiceResult,
  type RetryResult,
  type EmbeddingVector,
  type ImagePayload,
  type GenerativeService,
  type ImageDownloader,
  type Throttle,
  type RateLimiterOptions,
  type GeminiServiceOptions,
  type RetryingServiceClientOptions,
} from './embedder/index.js';

// Output
export {
  EmbeddingCollection,
  buildArtifact,
  writeArtifact,
  readArtifact,
  EmbeddingArtifactSchema,
  ARTIFACT_VERSION,
  type OutputRecord,
  type AppendResult,
  type EmbeddingArtifact,
} from './output/index.js';

// Pipelines
export {
  runChunkPipeline,
  DEFAULT_MIN_POST_LENGTH,
  type ChunkPipelineOptions,
  type ChunkSink,
} from './chunk-pipeline.js';
export {
  runEmbeddingPipeline,
  IMAGE_CONTENT_PREFIX,
  type EmbeddingPipelineOptions,
  type EmbeddingPipelineOutput,
  type ChunkSource,
  type EmbeddingClient,
} from './pipeline.js';
