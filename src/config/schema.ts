/**
 * Configuration Schema
 *
 * Defines the shape of $KBI_HOME/config.toml using Zod.
 * This provides both TypeScript types AND runtime validation.
 */

import { z } from 'zod';

/**
 * Chunking configuration (ChunkSplitter window and forum post filter)
 */
export const ChunkingConfigSchema = z.object({
  chunk_size: z
    .number()
    .int()
    .min(1)
    .max(100000)
    .describe('Window width in characters'),
  overlap: z
    .number()
    .int()
    .min(0)
    .describe('Characters shared by consecutive windows (must be < chunk_size)'),
  min_post_length: z
    .number()
    .int()
    .min(0)
    .describe('Forum posts whose cleaned text is shorter than this are skipped'),
});

/**
 * Task types accepted by the embedContent endpoint
 */
export const EmbeddingTaskTypeSchema = z.enum([
  'RETRIEVAL_DOCUMENT',
  'RETRIEVAL_QUERY',
  'SEMANTIC_SIMILARITY',
  'CLASSIFICATION',
  'CLUSTERING',
]);

/**
 * Text embedding configuration
 */
export const EmbeddingConfigSchema = z.object({
  model: z.string().min(1).describe('Embedding model (e.g., models/embedding-001)'),
  task_type: EmbeddingTaskTypeSchema.describe('Embedding intent sent with every request'),
  max_retries: z
    .number()
    .int()
    .min(1)
    .max(10)
    .describe('Total attempts per chunk before it is skipped (1-10)'),
  timeout_ms: z
    .number()
    .int()
    .min(1000)
    .max(600000)
    .describe('Per-request timeout in milliseconds'),
});

/**
 * Image captioning configuration
 */
export const CaptioningConfigSchema = z.object({
  enabled: z.boolean().describe('Caption and embed images referenced by markdown'),
  model: z.string().min(1).describe('Multimodal model used for captions'),
  max_retries: z
    .number()
    .int()
    .min(1)
    .max(10)
    .describe('Total attempts per image before it is skipped (1-10)'),
  default_mime_type: z
    .string()
    .regex(/^image\/[\w.+-]+$/, 'Must be an image MIME type')
    .describe('Content type assumed when the image server sends none'),
  timeout_ms: z
    .number()
    .int()
    .min(1000)
    .max(600000)
    .describe('Per-request timeout in milliseconds (download and caption)'),
});

/**
 * Outbound call quota shared by embedding and captioning
 */
export const RateLimitConfigSchema = z.object({
  rps: z.number().positive().max(1000).describe('Maximum calls per second'),
  rpm: z.number().int().min(1).max(100000).describe('Maximum calls per rolling minute'),
});

/**
 * Raw corpus locations used by `kbi chunk` and `kbi annotate`
 */
export const SourcesConfigSchema = z.object({
  markdown_dir: z.string().min(1),
  discourse_dir: z.string().min(1),
  discourse_base_url: z.string().url().describe('Forum origin used to build post URLs'),
  markdown_base_url: z.string().describe('Prefix for page URLs written by `kbi annotate`'),
});

/**
 * Data file locations
 */
export const StorageConfigSchema = z.object({
  database_path: z.string().min(1).describe('SQLite chunk store'),
  output_path: z.string().min(1).describe('Embedding artifact (JSON)'),
});

/**
 * Root object schema (no cross-field rules, so it can be deep-partialled)
 */
export const ConfigObjectSchema = z.object({
  chunking: ChunkingConfigSchema,
  embedding: EmbeddingConfigSchema,
  captioning: CaptioningConfigSchema,
  rate_limit: RateLimitConfigSchema,
  sources: SourcesConfigSchema,
  storage: StorageConfigSchema,
});

/**
 * Complete config schema with cross-field rules.
 *
 * An overlap at or above the chunk size would never advance the
 * splitter window.
 */
export const ConfigSchema = ConfigObjectSchema.superRefine((config, ctx) => {
  if (config.chunking.overlap >= config.chunking.chunk_size) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['chunking', 'overlap'],
      message: `overlap (${config.chunking.overlap}) must be smaller than chunk_size (${config.chunking.chunk_size})`,
    });
  }
});

/**
 * TypeScript type inferred from the schema
 */
export type Config = z.infer<typeof ConfigObjectSchema>;
export type ChunkingConfig = Config['chunking'];
export type EmbeddingConfig = Config['embedding'];
export type CaptioningConfig = Config['captioning'];
export type RateLimitConfig = Config['rate_limit'];
export type EmbeddingTaskType = z.infer<typeof EmbeddingTaskTypeSchema>;

/**
 * Partial config for merging user overrides with defaults
 */
export const PartialConfigSchema = ConfigObjectSchema.deepPartial();
export type PartialConfig = z.infer<typeof PartialConfigSchema>;
