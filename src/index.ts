/**
 * kb-ingest - Library Entry Point
 *
 * The CLI (`kbi`) covers the usual workflow:
 * ```bash
 * kbi annotate data/markdown   # Add source URL comments
 * kbi chunk                    # Build the chunk store
 * kbi embed                    # Write the embedding artifact
 * ```
 *
 * This module exports the pieces behind those commands for callers that
 * want to drive the pipelines themselves, e.g. with a different service
 * client or an in-memory chunk source.
 *
 * @example Embedding an existing chunk store
 * ```typescript
 * import {
 *   getChunkStore,
 *   GeminiService,
 *   RateLimiter,
 *   RetryingServiceClient,
 *   createImageDownloader,
 *   runEmbeddingPipeline,
 *   DEFAULT_GENAI_BASE_URL,
 * } from 'kb-ingest';
 *
 * const client = new RetryingServiceClient({
 *   service: new GeminiService({
 *     apiKey: process.env.GENAI_API_KEY ?? '',
 *     baseUrl: DEFAULT_GENAI_BASE_URL,
 *     embeddingModel: 'models/embedding-001',
 *     taskType: 'RETRIEVAL_DOCUMENT',
 *     captionModel: 'gemini-1.5-flash',
 *   }),
 *   downloadImage: createImageDownloader(),
 *   limiter: new RateLimiter({ rps: 2, rpm: 100 }),
 * });
 *
 * const { result } = await runEmbeddingPipeline({
 *   source: getChunkStore('data/knowledge_base.db', { migrate: false }),
 *   client,
 *   model: 'models/embedding-001',
 *   outputPath: 'data/embeddings.json',
 * });
 * ```
 *
 * @packageDocumentation
 */

export type { GlobalOptions, CommandContext } from './cli/types.js';

export * from './config/index.js';
export * from './database/index.js';
export * from './errors/index.js';
export * from './indexer/index.js';
export * from './utils/index.js';
