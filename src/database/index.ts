/**
 * Database Module
 *
 * SQLite chunk store written by `kbi chunk` and read by `kbi embed`.
 *
 * @example
 * ```ts
 * import { getChunkStore } from './database/index.js';
 *
 * const store = getChunkStore(config.storage.database_path);
 * const chunks = store.getTextChunks();
 * ```
 */

// Connection management (low-level)
export { getDb, closeDb, getDbPath, openDatabase } from './connection.js';

// Migration utilities
export {
  runMigrations,
  hasPendingMigrations,
  getAppliedMigrations,
  resetMigrationState,
  getMigrationCount,
  type MigrationResult,
} from './migrate.js';

// Schema types
export type {
  ChunkOrigin,
  MarkdownChunk,
  DiscourseChunk,
  ImageChunk,
  TextChunk,
  ImageReference,
  MalformedRow,
  MalformedRowHandler,
  MarkdownDocumentInput,
  DiscoursePostInput,
  ChunkStoreStats,
} from './schema.js';
export { CHUNK_ORIGINS } from './schema.js';

// Validation schemas and utilities
export {
  MarkdownChunkRowSchema,
  DiscourseChunkRowSchema,
  ImageChunkRowSchema,
  CountRowSchema,
  type MarkdownChunkRow,
  type DiscourseChunkRow,
  type ImageChunkRow,
  type RowIssue,
  SchemaValidationError,
  summarizeIssues,
  validateRow,
  validateRows,
} from './validation.js';

// High-level operations
export { ChunkStore, getChunkStore, resetChunkStore } from './operations.js';
