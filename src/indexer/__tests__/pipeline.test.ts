/**
 * Embedding Pipeline Tests
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import {
  runEmbeddingPipeline,
  IMAGE_CONTENT_PREFIX,
  type ChunkSource,
  type EmbeddingClient,
} from '../pipeline.js';
import { readArtifact } from '../output/index.js';
import type { EmbeddingVector, RetryResult } from '../embedder/index.js';
import Database from 'better-sqlite3';
import { ChunkStore, type ImageReference, type TextChunk } from '../../database/index.js';

function ok<T>(value: T): RetryResult<T> {
  return { ok: true, value, attempts: 1 };
}

function failed<T>(message = 'boom'): RetryResult<T> {
  return { ok: false, error: new Error(message), attempts: 3 };
}

function chunk(content: string, sourceUrl = `https://docs/${content}`): TextChunk {
  return { content, sourceUrl, origin: 'markdown', chunkIndex: 0 };
}

function source(chunks: TextChunk[], images: ImageReference[] | null | Error = []): ChunkSource {
  return {
    getTextChunks: () => chunks,
    getImageReferences: () => {
      if (images instanceof Error) throw images;
      return images;
    },
  };
}

/** Embeds any text as [length, 1]; texts containing "fail" fail */
function fakeClient(captions: Record<string, RetryResult<string>> = {}) {
  const embedText = vi.fn<EmbeddingClient['embedText']>(async (content) =>
    content.includes('fail') ? failed<EmbeddingVector>() : ok([content.length, 1])
  );
  const captionImage = vi.fn<EmbeddingClient['captionImage']>(
    async (url) => captions[url] ?? failed<string>('no caption')
  );
  return { embedText, captionImage };
}

describe('runEmbeddingPipeline', () => {
  it('skips a chunk whose embedding fails and keeps the rest in order', async () => {
    const client = fakeClient();

    const { result, collection } = await runEmbeddingPipeline({
      source: source([chunk('one'), chunk('two-fail'), chunk('three')]),
      client,
      model: 'test-model',
    });

    expect(collection.snapshot()).toEqual({
      chunks: ['one', 'three'],
      embeddings: [
        [3, 1],
        [5, 1],
      ],
      sourceUrls: ['https://docs/one', 'https://docs/three'],
    });
    expect(result.textChunks).toBe(3);
    expect(result.textRecords).toBe(2);
    expect(result.recordCount).toBe(2);
    expect(result.skipped).toEqual({ 'embedding-failed': 1 });
    expect(result.errors).toEqual(['markdown chunk 2/3: boom']);
    expect(client.embedText).toHaveBeenCalledWith('two-fail', 'markdown chunk 2/3');
  });

  it('treats a missing image table as no images', async () => {
    const onWarning = vi.fn();

    const { result } = await runEmbeddingPipeline({
      source: source([chunk('text')], null),
      client: fakeClient(),
      model: 'm',
      onWarning,
    });

    expect(result.imageReferences).toBe(0);
    expect(result.imageRecords).toBe(0);
    expect(result.textRecords).toBe(1);
    expect(onWarning).toHaveBeenCalledWith('No image table in the chunk store; skipping images', undefined);
  });

  it('treats a failing image query as no images', async () => {
    const { result } = await runEmbeddingPipeline({
      source: source([chunk('text')], new Error('no such table: image_chunks')),
      client: fakeClient(),
      model: 'm',
    });

    expect(result.imageRecords).toBe(0);
    expect(result.textRecords).toBe(1);
    expect(result.warnings).toEqual([
      'Could not read image references: no such table: image_chunks; skipping images',
    ]);
  });

  it('captions images, embeds the caption and prefixes the content', async () => {
    const client = fakeClient({
      'https://img/chart.webp': ok('a bar chart'),
      'https://img/broken.png': failed('HTTP 404: missing'),
      'https://img/bad-caption.png': ok('caption that will fail'),
    });

    const { result, collection } = await runEmbeddingPipeline({
      source: source(
        [],
        [
          { url: 'https://img/chart.webp' },
          { url: 'https://img/broken.png' },
          { url: 'https://img/bad-caption.png' },
        ]
      ),
      client,
      model: 'm',
    });

    expect(collection.snapshot()).toEqual({
      chunks: [`${IMAGE_CONTENT_PREFIX}a bar chart`],
      embeddings: [[11, 1]],
      sourceUrls: ['https://img/chart.webp'],
    });
    expect(client.embedText).toHaveBeenCalledWith('a bar chart', 'caption of https://img/chart.webp');
    expect(result.imageRecords).toBe(1);
    expect(result.skipped).toEqual({ 'caption-failed': 1, 'embedding-failed': 1 });
    expect(result.errors).toEqual([
      'https://img/broken.png: HTTP 404: missing',
      'https://img/bad-caption.png: boom',
    ]);
  });

  it('does not read images when captioning is disabled', async () => {
    const getImageReferences = vi.fn(() => [{ url: 'https://img/a.png' }]);
    const onStageStart = vi.fn();

    const { result } = await runEmbeddingPipeline({
      source: { getTextChunks: () => [chunk('text')], getImageReferences },
      client: fakeClient(),
      model: 'm',
      captionImages: false,
      onStageStart,
    });

    expect(getImageReferences).not.toHaveBeenCalled();
    expect(result.imageReferences).toBe(0);
    expect(onStageStart.mock.calls.map(([stage]) => stage)).toEqual(['embedding']);
  });

  it('rejects a vector whose length differs from the first', async () => {
    const embedText = vi
      .fn<EmbeddingClient['embedText']>()
      .mockResolvedValueOnce(ok([1, 2, 3]))
      .mockResolvedValueOnce(ok([1, 2]))
      .mockResolvedValueOnce(ok([4, 5, 6]));

    const { result, collection } = await runEmbeddingPipeline({
      source: source([chunk('a'), chunk('b'), chunk('c')]),
      client: { embedText, captionImage: vi.fn() },
      model: 'm',
    });

    expect(collection.snapshot().chunks).toEqual(['a', 'c']);
    expect(result.dimensions).toBe(3);
    expect(result.skipped).toEqual({ 'dimension-mismatch': 1 });
    expect(result.errors).toEqual(['markdown chunk 2/3: Embedding has 2 dimensions, expected 3']);
  });

  it('reports zero records when nothing could be embedded', async () => {
    const { result } = await runEmbeddingPipeline({
      source: source([chunk('fail-1'), chunk('fail-2')]),
      client: fakeClient(),
      model: 'm',
    });

    expect(result.recordCount).toBe(0);
    expect(result.dimensions).toBeNull();
    expect(result.skipped).toEqual({ 'embedding-failed': 2 });
  });

  it('skips malformed store rows and embeds the rest', async () => {
    const db = new Database(':memory:');
    db.exec(`
      CREATE TABLE markdown_chunks (id INTEGER PRIMARY KEY AUTOINCREMENT, file_path TEXT, chunk_index INTEGER, content TEXT, source_url TEXT);
      CREATE TABLE discourse_chunks (id INTEGER PRIMARY KEY AUTOINCREMENT, post_id INTEGER, topic_id INTEGER, chunk_index INTEGER, content TEXT, source_url TEXT);
      CREATE TABLE image_chunks (id INTEGER PRIMARY KEY AUTOINCREMENT, file_path TEXT, image_url TEXT);
      INSERT INTO markdown_chunks (file_path, chunk_index, content, source_url) VALUES ('a.md', 0, 'intro', 'https://docs/a');
      INSERT INTO discourse_chunks (post_id, topic_id, chunk_index, content, source_url) VALUES (NULL, 4, 0, 'reply', 'https://forum/t/x/4/0');
      INSERT INTO discourse_chunks (post_id, topic_id, chunk_index, content, source_url) VALUES (9, 4, 1, NULL, 'https://forum/t/x/4/1');
      INSERT INTO image_chunks (file_path, image_url) VALUES ('a.md', NULL);
    `);
    const client = fakeClient();

    const { result, collection } = await runEmbeddingPipeline({
      source: new ChunkStore(db),
      client,
      model: 'm',
    });
    db.close();

    expect(collection.snapshot().chunks).toEqual(['intro', 'reply']);
    expect(result.skipped).toEqual({ 'malformed-row': 2 });
    expect(result.errors).toEqual([
      'discourse_chunks[1]: Malformed row skipped: content: Expected string, received null',
      'image_chunks[0]: Malformed row skipped: image_url: Expected string, received null',
    ]);
    expect(client.captionImage).not.toHaveBeenCalled();
  });

  it('propagates a failure to read text chunks', async () => {
    const failing: ChunkSource = {
      getTextChunks: () => {
        throw new Error('Chunk store has no markdown_chunks table');
      },
      getImageReferences: () => [],
    };

    await expect(
      runEmbeddingPipeline({ source: failing, client: fakeClient(), model: 'm' })
    ).rejects.toThrow('Chunk store has no markdown_chunks table');
  });

  it('fires stage callbacks in order', async () => {
    const events: string[] = [];

    await runEmbeddingPipeline({
      source: source([chunk('text')], [{ url: 'https://img/a.png' }]),
      client: fakeClient({ 'https://img/a.png': ok('caption') }),
      model: 'm',
      onStageStart: (stage, total) => events.push(`start:${stage}:${total}`),
      onProgress: (stage, processed, total) => events.push(`progress:${stage}:${processed}/${total}`),
      onStageComplete: (stage, stats) => events.push(`complete:${stage}:${stats.processed}`),
    });

    expect(events).toEqual([
      'start:embedding:1',
      'progress:embedding:1/1',
      'complete:embedding:1',
      'start:captioning:1',
      'progress:captioning:1/1',
      'complete:captioning:1',
    ]);
  });

  describe('artifact output', () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), 'kbi-pipeline-'));
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it('writes the collection to the output path', async () => {
      const outputPath = join(dir, 'out', 'embeddings.json');

      const { result } = await runEmbeddingPipeline({
        source: source([chunk('one'), chunk('three')]),
        client: fakeClient(),
        model: 'test-model',
        outputPath,
        now: () => new Date('2026-03-01T00:00:00Z'),
      });

      expect(result.outputPath).toBe(outputPath);
      expect(result.stageDurations.writing).toBeGreaterThanOrEqual(0);
      expect(await readArtifact(outputPath)).toEqual({
        version: 1,
        model: 'test-model',
        dimensions: 2,
        count: 2,
        created_at: '2026-03-01T00:00:00.000Z',
        chunks: ['one', 'three'],
        embeddings: [
          [3, 1],
          [5, 1],
        ],
        source_urls: ['https://docs/one', 'https://docs/three'],
      });
    });
  });
});
