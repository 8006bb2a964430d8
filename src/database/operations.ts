/**
 * Chunk Store Operations
 *
 * High-level operations over the chunk tables. The chunking pipeline
 * writes through this class and the embedding pipeline reads from it.
 *
 * Handles:
 * - Transactions for per-document / per-post batches
 * - Row validation on every read (strict, or skip-and-report)
 * - Tolerating stores that lack the image_chunks table
 */

import { statSync } from 'node:fs';
import type Database from 'better-sqlite3';
import type { z } from 'zod';
import { getDb } from './connection.js';
import { runMigrations } from './migrate.js';
import {
  CHUNK_ORIGINS,
  type ChunkOrigin,
  type ChunkStoreStats,
  type DiscoursePostInput,
  type ImageReference,
  type MalformedRowHandler,
  type MarkdownDocumentInput,
  type TextChunk,
} from './schema.js';
import {
  CountRowSchema,
  DiscourseChunkRowSchema,
  ImageChunkRowSchema,
  MarkdownChunkRowSchema,
  summarizeIssues,
  validateRow,
  validateRows,
} from './validation.js';
import { DatabaseError, toError } from '../errors/index.js';

const TEXT_TABLES: Record<ChunkOrigin, string> = {
  markdown: 'markdown_chunks',
  discourse: 'discourse_chunks',
};

const IMAGE_TABLE = 'image_chunks';

/**
 * Typed access to a chunk store database.
 */
export class ChunkStore {
  private db: Database.Database;

  constructor(db: Database.Database) {
    this.db = db;
  }

  /**
   * Check whether a table exists in this store.
   */
  hasTable(name: string): boolean {
    const row = this.db
      .prepare("SELECT name FROM sqlite_master WHERE type='table' AND name = ?")
      .get(name);
    return row !== undefined;
  }

  /**
   * Size of the database file in bytes; 0 for in-memory or not-yet-written stores.
   */
  getDatabaseSize(): number {
    if (this.db.memory) {
      return 0;
    }
    try {
      return statSync(this.db.name).size;
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return 0;
      }
      throw error;
    }
  }

  /**
   * Store the chunks and image references of one markdown document.
   *
   * @returns Number of text chunks written
   */
  insertMarkdownDocument(input: MarkdownDocumentInput): number {
    const chunkStmt = this.db.prepare(`
      INSERT INTO markdown_chunks (file_path, chunk_index, content, source_url)
      VALUES (@filePath, @chunkIndex, @content, @sourceUrl)
    `);
    const imageStmt = this.db.prepare(`
      INSERT INTO image_chunks (file_path, image_url) VALUES (@filePath, @imageUrl)
    `);

    const insert = this.db.transaction((doc: MarkdownDocumentInput) => {
      doc.chunks.forEach((content, chunkIndex) => {
        chunkStmt.run({ filePath: doc.filePath, chunkIndex, content, sourceUrl: doc.sourceUrl });
      });
      for (const imageUrl of doc.imageUrls) {
        imageStmt.run({ filePath: doc.filePath, imageUrl });
      }
    });

    insert(input);
    return input.chunks.length;
  }

  /**
   * Store the chunks of one forum post.
   *
   * @returns Number of text chunks written
   */
  insertDiscoursePost(input: DiscoursePostInput): number {
    const stmt = this.db.prepare(`
      INSERT INTO discourse_chunks (post_id, topic_id, chunk_index, content, source_url)
      VALUES (@postId, @topicId, @chunkIndex, @content, @sourceUrl)
    `);

    const insert = this.db.transaction((post: DiscoursePostInput) => {
      post.chunks.forEach((chunk, chunkIndex) => {
        stmt.run({
          postId: post.postId,
          topicId: post.topicId,
          chunkIndex,
          content: chunk.content,
          sourceUrl: chunk.sourceUrl,
        });
      });
    });

    insert(input);
    return input.chunks.length;
  }

  /**
   * Delete every chunk and image reference.
   */
  clearChunks(): void {
    this.db.transaction(() => {
      for (const table of Object.values(TEXT_TABLES)) {
        if (this.hasTable(table)) {
          this.db.prepare(`DELETE FROM ${table}`).run();
        }
      }
      if (this.hasTable(IMAGE_TABLE)) {
        this.db.prepare(`DELETE FROM ${IMAGE_TABLE}`).run();
      }
    })();
  }

  /**
   * Read text chunks, markdown first then discourse, each in insertion order.
   *
   * @param origin - Restrict to a single origin
   * @param onMalformedRow - Skip rows that fail validation and report them
   *   here. Without it the first such row throws SchemaValidationError.
   * @throws DatabaseError if a requested chunk table does not exist
   */
  getTextChunks(origin?: ChunkOrigin, onMalformedRow?: MalformedRowHandler): TextChunk[] {
    const origins = origin ? [origin] : CHUNK_ORIGINS;
    const chunks: TextChunk[] = [];

    for (const current of origins) {
      const table = TEXT_TABLES[current];
      this.requireTable(table);

      const schema = current === 'markdown' ? MarkdownChunkRowSchema : DiscourseChunkRowSchema;
      const rows = this.readRows(table, schema, onMalformedRow);
      for (const row of rows) {
        chunks.push({
          content: row.content,
          sourceUrl: row.source_url,
          origin: current,
          chunkIndex: row.chunk_index,
        });
      }
    }

    return chunks;
  }

  /**
   * Read image references in insertion order.
   *
   * @param onMalformedRow - As for getTextChunks
   * @returns null when the store has no image_chunks table
   */
  getImageReferences(onMalformedRow?: MalformedRowHandler): ImageReference[] | null {
    if (!this.hasTable(IMAGE_TABLE)) {
      return null;
    }

    return this.readRows(IMAGE_TABLE, ImageChunkRowSchema, onMalformedRow).map((row) => ({
      url: row.image_url,
    }));
  }

  /**
   * Row counts for `kbi status`.
   */
  getStats(): ChunkStoreStats {
    return {
      markdown: this.count(TEXT_TABLES.markdown),
      discourse: this.count(TEXT_TABLES.discourse),
      images: this.hasTable(IMAGE_TABLE) ? this.count(IMAGE_TABLE) : null,
      markdownFiles: this.count(TEXT_TABLES.markdown, 'DISTINCT file_path'),
      discourseTopics: this.count(TEXT_TABLES.discourse, 'DISTINCT topic_id'),
    };
  }

  private count(table: string, expression = '*'): number {
    if (!this.hasTable(table)) {
      return 0;
    }
    const row = this.db.prepare(`SELECT COUNT(${expression}) AS count FROM ${table}`).get();
    return validateRow(CountRowSchema, row, `${table}.count`).count;
  }

  private readRows<T extends z.ZodSchema>(
    table: string,
    schema: T,
    onMalformedRow?: MalformedRowHandler
  ): z.output<T>[] {
    const rows = this.db.prepare(`SELECT * FROM ${table} ORDER BY id`).all();
    const report = onMalformedRow;
    const onInvalid = report
      ? (error: z.ZodError, index: number) => report({ table, index, problem: summarizeIssues(error) })
      : undefined;
    return validateRows(schema, rows, table, onInvalid);
  }

  private requireTable(table: string): void {
    if (!this.hasTable(table)) {
      throw new DatabaseError(`Chunk store has no ${table} table`);
    }
  }
}

// Singleton for the CLI
let storeInstance: ChunkStore | null = null;
let storePath: string | null = null;

/**
 * Open the shared chunk store at `path`, applying pending migrations.
 *
 * Pass `{ migrate: false }` to read a store as-is (the embedding pipeline
 * must not add tables to a store produced elsewhere).
 *
 * @throws DatabaseError if the file cannot be opened or a migration fails
 */
export function getChunkStore(path: string, options: { migrate?: boolean } = {}): ChunkStore {
  const { migrate = true } = options;

  if (storeInstance && storePath === path) {
    return storeInstance;
  }

  let db: Database.Database;
  try {
    db = getDb(path);
  } catch (error) {
    throw new DatabaseError(`Cannot open chunk store: ${path}`, toError(error));
  }

  if (migrate) {
    const result = runMigrations(db);
    const [firstFailure] = result.failed;
    if (firstFailure) {
      throw new DatabaseError(`Migration ${firstFailure.name} failed: ${firstFailure.error}`);
    }
  }

  storeInstance = new ChunkStore(db);
  storePath = path;
  return storeInstance;
}

/**
 * Drop the shared store (for testing or after closeDb()).
 */
export function resetChunkStore(): void {
  storeInstance = null;
  storePath = null;
}
