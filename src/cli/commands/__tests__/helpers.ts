/**
 * Shared setup for command tests: a recording context, a temp KBI_HOME,
 * and a way to run a command the way the CLI would.
 */

import { vi } from 'vitest';
import { Command } from 'commander';
import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { CommandContext, GlobalOptions } from '../../types.js';
import { _clearEnvCache } from '../../../config/index.js';
import { closeDb, resetChunkStore, resetMigrationState } from '../../../database/index.js';

export interface RecordingContext {
  ctx: CommandContext;
  logs: string[];
  warnings: string[];
  errors: string[];
}

export function createRecordingContext(options: Partial<GlobalOptions> = {}): RecordingContext {
  const logs: string[] = [];
  const warnings: string[] = [];
  const errors: string[] = [];
  return {
    ctx: {
      options: { verbose: false, json: false, ...options },
      log: (message) => logs.push(message),
      debug: vi.fn(),
      warn: (message) => warnings.push(message),
      error: (message) => errors.push(message),
    },
    logs,
    warnings,
    errors,
  };
}

export async function runCommand(command: Command, args: string[]): Promise<void> {
  const program = new Command();
  program.exitOverride();
  program.addCommand(command);
  await program.parseAsync(['node', 'kbi', ...args]);
}

/**
 * Temp directory used as KBI_HOME and for data files.
 */
export function setupWorkspace(): { dir: string; cleanup: () => void } {
  const dir = mkdtempSync(join(tmpdir(), 'kbi-cmd-'));
  vi.stubEnv('KBI_HOME', join(dir, 'home'));
  _clearEnvCache();

  return {
    dir,
    cleanup: () => {
      closeDb();
      resetChunkStore();
      resetMigrationState();
      vi.unstubAllEnvs();
      _clearEnvCache();
      rmSync(dir, { recursive: true, force: true });
    },
  };
}

/**
 * Captures console.log lines. In --json mode these are NDJSON events.
 */
export function captureConsole(): string[] {
  const lines: string[] = [];
  vi.spyOn(console, 'log').mockImplementation((...args: unknown[]) => {
    lines.push(args.map(String).join(' '));
  });
  return lines;
}

export function parseEvents(lines: string[]): Array<{ type: string; stage?: string; data: Record<string, unknown> }> {
  return lines.map((line) => JSON.parse(line));
}

export function completeResult(lines: string[]): unknown {
  const complete = parseEvents(lines).find((event) => event.type === 'complete');
  if (!complete) {
    throw new Error('No complete event emitted');
  }
  return complete.data['result'];
}
