/**
 * Database Schema Types
 *
 * TypeScript interfaces matching the SQLite table schemas.
 */

/**
 * Where a text chunk came from.
 */
export type ChunkOrigin = 'markdown' | 'discourse';

export const CHUNK_ORIGINS: readonly ChunkOrigin[] = ['markdown', 'discourse'];

// ============================================================================
// markdown_chunks
// ============================================================================

export interface MarkdownChunk {
  id: number;
  /** Path of the source file, relative to the markdown directory */
  file_path: string;
  /** Position within the document, from 0 */
  chunk_index: number;
  content: string;
  /** Page URL from the document's source_url comment ('' when absent) */
  source_url: string;
}

// ============================================================================
// discourse_chunks
// ============================================================================

export interface DiscourseChunk {
  id: number;
  post_id: number;
  topic_id: number;
  chunk_index: number;
  content: string;
  source_url: string;
}

// ============================================================================
// image_chunks
// ============================================================================

export interface ImageChunk {
  id: number;
  /** Markdown file the image was referenced from */
  file_path: string;
  image_url: string;
}

// ============================================================================
// Read model
// ============================================================================

/**
 * A text chunk as consumed by the embedding pipeline, regardless of origin.
 */
export interface TextChunk {
  content: string;
  sourceUrl: string;
  origin: ChunkOrigin;
  /** Position within its document or post; null when the store left it empty */
  chunkIndex: number | null;
}

/**
 * A stored row left out of a read because a column the embedding
 * pipeline needs is missing or has the wrong type.
 */
export interface MalformedRow {
  table: string;
  /** Zero-based position in the table's id order */
  index: number;
  /** Failed columns, e.g. "content: Expected string, received null" */
  problem: string;
}

export type MalformedRowHandler = (row: MalformedRow) => void;

/**
 * An image referenced by a markdown document.
 */
export interface ImageReference {
  url: string;
}

// ============================================================================
// Inputs
// ============================================================================

/**
 * One cleaned and split markdown document.
 */
export interface MarkdownDocumentInput {
  filePath: string;
  sourceUrl: string;
  chunks: string[];
  imageUrls: string[];
}

/**
 * One cleaned and split forum post.
 */
export interface DiscoursePostInput {
  postId: number;
  topicId: number;
  chunks: Array<{ content: string; sourceUrl: string }>;
}

/**
 * Row counts per table. `images` is null when the store has no
 * image_chunks table.
 */
export interface ChunkStoreStats {
  markdown: number;
  discourse: number;
  images: number | null;
  markdownFiles: number;
  discourseTopics: number;
}
