/**
 * Tests for the chunk command
 *
 * Runs against real fixture directories and a SQLite file in a temp dir.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdirSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { createChunkCommand } from '../chunk.js';
import { getChunkStore } from '../../../database/index.js';
import {
  captureConsole,
  completeResult,
  createRecordingContext,
  parseEvents,
  runCommand,
  setupWorkspace,
} from './helpers.js';

const GUIDE = [
  '<!-- source_url: https://docs.example.com/#/guide -->',
  '# Guide',
  '',
  'Install the **tool** first. ![diagram](https://img.example.com/d.png)',
  '',
].join('\n');

const TOPIC = JSON.stringify({
  post_data: {
    id: 5,
    slug: 'setup-help',
    post_stream: {
      posts: [
        { id: 51, cooked: '<p>This post is long enough to keep.</p>' },
        { id: 52, cooked: '<p>short</p>' },
      ],
    },
  },
});

describe('createChunkCommand', () => {
  let workspace: ReturnType<typeof setupWorkspace>;
  let markdownDir: string;
  let discourseDir: string;
  let dbPath: string;
  let lines: string[];

  beforeEach(() => {
    workspace = setupWorkspace();
    markdownDir = join(workspace.dir, 'markdown');
    discourseDir = join(workspace.dir, 'discourse');
    dbPath = join(workspace.dir, 'kb.db');
    mkdirSync(markdownDir);
    mkdirSync(discourseDir);
    writeFileSync(join(markdownDir, 'guide.md'), GUIDE);
    writeFileSync(join(discourseDir, 'topic-5.json'), TOPIC);
    lines = captureConsole();
  });

  afterEach(() => {
    vi.restoreAllMocks();
    workspace.cleanup();
  });

  const chunkArgs = (...extra: string[]) => [
    'chunk',
    '--markdown-dir',
    markdownDir,
    '--discourse-dir',
    discourseDir,
    '--db',
    dbPath,
    ...extra,
  ];

  it('has the expected options', () => {
    const command = createChunkCommand(() => createRecordingContext().ctx);
    const flags = command.options.map((option) => option.long);

    expect(command.name()).toBe('chunk');
    expect(flags).toEqual(['--markdown-dir', '--discourse-dir', '--db', '--append']);
  });

  it('writes markdown and forum chunks to the store', async () => {
    const { ctx } = createRecordingContext({ json: true });

    await runCommand(createChunkCommand(() => ctx), chunkArgs());

    const store = getChunkStore(dbPath);
    expect(store.getTextChunks().map((chunk) => chunk.sourceUrl)).toEqual([
      'https://docs.example.com/#/guide',
      'https://discourse.example.com/t/setup-help/5/0',
    ]);
    expect(store.getImageReferences()).toEqual([{ url: 'https://img.example.com/d.png' }]);
  });

  it('emits a complete event with the run totals in JSON mode', async () => {
    const { ctx } = createRecordingContext({ json: true });

    await runCommand(createChunkCommand(() => ctx), chunkArgs());

    expect(completeResult(lines)).toMatchObject({
      markdownFiles: 1,
      discourseFiles: 1,
      markdownChunks: 1,
      discourseChunks: 1,
      imageReferences: 1,
      skippedFiles: 0,
      skippedPosts: 1,
      errors: [],
    });
    expect(parseEvents(lines)[0]).toMatchObject({ type: 'stage_start', stage: 'scanning' });
  });

  it('replaces earlier chunks by default', async () => {
    const { ctx } = createRecordingContext({ json: true });

    await runCommand(createChunkCommand(() => ctx), chunkArgs());
    await runCommand(createChunkCommand(() => ctx), chunkArgs());

    expect(getChunkStore(dbPath).getStats().markdown).toBe(1);
  });

  it('keeps earlier chunks with --append', async () => {
    const { ctx } = createRecordingContext({ json: true });

    await runCommand(createChunkCommand(() => ctx), chunkArgs());
    await runCommand(createChunkCommand(() => ctx), chunkArgs('--append'));

    expect(getChunkStore(dbPath).getStats().markdown).toBe(2);
  });

  it('warns and continues when a source directory is missing', async () => {
    const { ctx } = createRecordingContext({ json: true });
    const missing = join(workspace.dir, 'nope');

    await runCommand(createChunkCommand(() => ctx), [
      'chunk',
      '--markdown-dir',
      markdownDir,
      '--discourse-dir',
      missing,
      '--db',
      dbPath,
    ]);

    const warnings = parseEvents(lines).filter((event) => event.type === 'warning');
    expect(warnings).toHaveLength(1);
    expect(warnings[0]?.data).toEqual({
      message: 'Forum dump directory not found; skipping',
      context: missing,
    });
    expect(completeResult(lines)).toMatchObject({ markdownChunks: 1, discourseChunks: 0 });
  });
});
