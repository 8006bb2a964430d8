/**
 * Row Validation Tests
 */

import { describe, it, expect, vi } from 'vitest';
import {
  MarkdownChunkRowSchema,
  ImageChunkRowSchema,
  SchemaValidationError,
  summarizeIssues,
  validateRow,
  validateRows,
} from '../validation.js';

describe('validateRow', () => {
  it('keeps only the columns the embedding path reads', () => {
    const row = { id: 1, file_path: 'a.md', image_url: 'https://img.example.com/a.png' };

    expect(validateRow(ImageChunkRowSchema, row, 'image_chunks.id=1')).toEqual({
      image_url: 'https://img.example.com/a.png',
    });
  });

  it('lists the failed columns in the hint', () => {
    try {
      validateRow(MarkdownChunkRowSchema, {}, 'markdown_chunks.id=1');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(SchemaValidationError);
      if (error instanceof SchemaValidationError) {
        expect(error.hint).toBe(
          'Unexpected row shape:\n  - chunk_index: Required\n  - content: Required\n  - source_url: Required\n\nRebuild the store with: kbi chunk'
        );
      }
    }
  });

  it('throws SchemaValidationError with exit code 5', () => {
    try {
      validateRow(ImageChunkRowSchema, { id: 'x' }, 'image_chunks.id=x');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(SchemaValidationError);
      if (error instanceof SchemaValidationError) {
        expect(error.message).toBe('Database schema mismatch in image_chunks.id=x');
        expect(error.code).toBe(5);
        expect(error.issues).toEqual([{ path: 'image_url', message: 'Required' }]);
      }
    }
  });

  it('normalizes null source URLs and accepts a null chunk index', () => {
    const row = { id: 1, file_path: null, chunk_index: null, content: 'c', source_url: null };

    expect(validateRow(MarkdownChunkRowSchema, row, 'markdown_chunks')).toEqual({
      chunk_index: null,
      content: 'c',
      source_url: '',
    });
  });
});

describe('validateRows', () => {
  const good = { image_url: 'u' };
  const bad = { image_url: null };

  it('includes the failing index in the message', () => {
    expect(() => validateRows(ImageChunkRowSchema, [good, bad], 'image_chunks')).toThrow(
      'Database schema mismatch in image_chunks[1]'
    );
  });

  it('hands invalid rows to onInvalid with their index and leaves them out', () => {
    const onInvalid = vi.fn();

    const rows = validateRows(ImageChunkRowSchema, [bad, good], 'image_chunks', onInvalid);

    expect(rows).toEqual([good]);
    expect(onInvalid).toHaveBeenCalledTimes(1);
    expect(onInvalid.mock.calls[0]?.[1]).toBe(0);
  });
});

describe('summarizeIssues', () => {
  it('joins each failed column with its message', () => {
    const parsed = MarkdownChunkRowSchema.safeParse({ chunk_index: 'x', content: 3, source_url: 'u' });

    expect(parsed.success).toBe(false);
    if (!parsed.success) {
      expect(summarizeIssues(parsed.error)).toBe(
        'chunk_index: Expected number, received string; content: Expected string, received number'
      );
    }
  });
});
