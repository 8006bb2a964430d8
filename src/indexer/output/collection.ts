/**
 * Embedding Collection
 *
 * Three parallel sequences (chunk text, vector, source URL) that always
 * have the same length. `append` is the only way in: a record is checked
 * first, then pushed to all three or to none.
 */

import type { EmbeddingVector } from '../embedder/index.js';

export interface OutputRecord {
  content: string;
  sourceUrl: string;
  embedding: EmbeddingVector;
}

export type RejectReason = 'empty-vector' | 'invalid-value' | 'dimension-mismatch';

export type AppendResult =
  | { accepted: true; index: number }
  | { accepted: false; reason: RejectReason; message: string };

export interface CollectionSnapshot {
  chunks: string[];
  embeddings: number[][];
  sourceUrls: string[];
}

export class EmbeddingCollection {
  private readonly chunks: string[] = [];
  private readonly embeddings: number[][] = [];
  private readonly sourceUrls: string[] = [];
  private dimension: number | null = null;

  /**
   * Add a record. Vectors must be non-empty, finite, and as long as the
   * first accepted vector.
   */
  append(record: OutputRecord): AppendResult {
    const { embedding } = record;

    if (embedding.length === 0) {
      return { accepted: false, reason: 'empty-vector', message: 'Embedding is empty' };
    }
    if (!embedding.every(Number.isFinite)) {
      return { accepted: false, reason: 'invalid-value', message: 'Embedding contains a non-finite value' };
    }
    if (this.dimension !== null && embedding.length !== this.dimension) {
      return {
        accepted: false,
        reason: 'dimension-mismatch',
        message: `Embedding has ${embedding.length} dimensions, expected ${this.dimension}`,
      };
    }

    this.dimension ??= embedding.length;
    this.chunks.push(record.content);
    this.embeddings.push([...embedding]);
    this.sourceUrls.push(record.sourceUrl);

    return { accepted: true, index: this.chunks.length - 1 };
  }

  get size(): number {
    return this.chunks.length;
  }

  /** Vector length of the accepted records, or null before the first */
  get dimensions(): number | null {
    return this.dimension;
  }

  /**
   * Copies of the three sequences.
   */
  snapshot(): CollectionSnapshot {
    return {
      chunks: [...this.chunks],
      embeddings: this.embeddings.map((vector) => [...vector]),
      sourceUrls: [...this.sourceUrls],
    };
  }
}
