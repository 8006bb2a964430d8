/**
 * Progress Reporter
 *
 * Manages progress display for the chunk and embed runs.
 * Supports multiple output modes:
 * - Interactive: ora spinners with real-time updates
 * - JSON: NDJSON event stream for CI/CD integration
 * - Text: Simple text output for non-TTY environments
 *
 * Spinner updates are throttled (100ms minimum) and long paths/URLs are
 * truncated from the left.
 */

import ora, { type Ora } from 'ora';
import chalk from 'chalk';

/**
 * Stages of the two pipelines, in the order they run.
 * `kbi chunk`: scanning, chunking, storing.
 * `kbi embed`: embedding, captioning, writing.
 */
export type PipelineStage =
  | 'scanning'
  | 'chunking'
  | 'storing'
  | 'embedding'
  | 'captioning'
  | 'writing';

const STAGE_LABELS: Record<PipelineStage, string> = {
  scanning: 'Scanning',
  chunking: 'Chunking',
  storing: 'Storing',
  embedding: 'Embedding',
  captioning: 'Captioning',
  writing: 'Writing',
};

const STAGE_ORDER: PipelineStage[] = [
  'scanning',
  'chunking',
  'storing',
  'embedding',
  'captioning',
  'writing',
];

/**
 * Configuration options for the ProgressReporter.
 */
export interface ProgressReporterOptions {
  /** Output as JSON events instead of human-readable text */
  json: boolean;

  /** Show per-item detail */
  verbose: boolean;

  /** Disable colors (respects NO_COLOR env) */
  noColor: boolean;

  /** Whether stdout is a TTY (for spinner support) */
  isInteractive: boolean;
}

/**
 * Statistics for a completed stage.
 */
export interface StageStats {
  stage: PipelineStage;

  /** Number of items processed */
  processed: number;

  /** Total items in this stage */
  total: number;

  durationMs: number;

  /** Additional stage-specific details */
  details?: Record<string, unknown>;
}

/**
 * Why an item produced no output record.
 */
export type SkipReason =
  | 'malformed-row'
  | 'embedding-failed'
  | 'caption-failed'
  | 'empty-vector'
  | 'invalid-value'
  | 'dimension-mismatch';

/**
 * Result of `runChunkPipeline`.
 */
export interface ChunkPipelineResult {
  /** Markdown documents read */
  markdownFiles: number;

  /** Forum dumps read (malformed ones excluded) */
  discourseFiles: number;

  markdownChunks: number;
  discourseChunks: number;
  imageReferences: number;

  /** Files that could not be read or parsed */
  skippedFiles: number;

  /** Posts below the minimum length */
  skippedPosts: number;

  totalDurationMs: number;
  stageDurations: Partial<Record<PipelineStage, number>>;
  warnings: string[];
  errors: string[];
}

/**
 * Result of `runEmbeddingPipeline`.
 */
export interface EmbeddingPipelineResult {
  /** Text chunks read from the store */
  textChunks: number;

  /** Image references read from the store (0 when the source is absent) */
  imageReferences: number;

  textRecords: number;
  imageRecords: number;

  /** Records in the output; always textRecords + imageRecords */
  recordCount: number;

  /** Vector length of the output, null when nothing was produced */
  dimensions: number | null;

  skipped: Partial<Record<SkipReason, number>>;

  /** Where the artifact was written, null when no path was given */
  outputPath: string | null;

  totalDurationMs: number;
  stageDurations: Partial<Record<PipelineStage, number>>;
  warnings: string[];
  errors: string[];
}

/**
 * JSON event types for NDJSON output.
 */
export type ProgressEventType =
  | 'stage_start'
  | 'stage_progress'
  | 'stage_complete'
  | 'warning'
  | 'error'
  | 'complete';

/**
 * JSON event emitted in --json mode.
 */
export interface ProgressEvent {
  type: ProgressEventType;
  timestamp: string;
  stage?: PipelineStage;
  data: Record<string, unknown>;
}

/**
 * ProgressReporter manages all progress display during a run.
 *
 * Usage:
 * ```typescript
 * const reporter = createProgressReporter({ json: false, verbose: false });
 *
 * reporter.startStage('embedding', 120);
 * reporter.updateProgress(10, 'https://docs.example.com/page');
 * reporter.completeStage({ stage: 'embedding', processed: 118, total: 120, durationMs: 61000 });
 *
 * reporter.showEmbeddingSummary(result);
 * ```
 */
export class ProgressReporter {
  private options: ProgressReporterOptions;
  private spinner: Ora | null = null;
  private currentStage: PipelineStage | null = null;
  private currentTotal: number = 0;
  private lastUpdateTime: number = 0;
  private verboseLines: string[] = [];

  /** Minimum time between spinner updates to prevent flickering */
  private static readonly UPDATE_THROTTLE_MS = 100;

  /** Maximum length for path/URL display */
  private static readonly MAX_PATH_LENGTH = 40;

  constructor(options: ProgressReporterOptions) {
    this.options = options;

    if (options.noColor) {
      chalk.level = 0;
    }
  }

  /**
   * Start a new stage.
   *
   * @param total - Expected total items (0 if unknown, like during scanning)
   */
  startStage(stage: PipelineStage, total: number = 0): void {
    this.currentStage = stage;
    this.currentTotal = total;
    this.verboseLines = [];

    if (this.options.json) {
      this.emitJson({
        type: 'stage_start',
        timestamp: new Date().toISOString(),
        stage,
        data: { total },
      });
      return;
    }

    if (this.options.isInteractive) {
      this.spinner?.stop();

      const label = STAGE_LABELS[stage];
      this.spinner = ora({
        text: `${label}...`,
        prefixText: chalk.cyan(label.padEnd(12)),
      }).start();
    } else {
      console.log(`${STAGE_LABELS[stage]}...`);
    }
  }

  /**
   * Update progress within the current stage.
   *
   * @param current - File or URL being processed
   */
  updateProgress(processed: number, current?: string): void {
    if (!this.currentStage) return;

    const now = performance.now();
    if (now - this.lastUpdateTime < ProgressReporter.UPDATE_THROTTLE_MS) {
      return;
    }
    this.lastUpdateTime = now;

    if (this.options.json) {
      this.emitJson({
        type: 'stage_progress',
        timestamp: new Date().toISOString(),
        stage: this.currentStage,
        data: {
          processed,
          total: this.currentTotal,
          current,
        },
      });
      return;
    }

    let progressText: string;
    if (this.currentTotal > 0) {
      const percentage = Math.round((processed / this.currentTotal) * 100);
      progressText = `${processed}/${this.currentTotal} (${percentage}%)`;
    } else {
      progressText = `Found ${processed} files`;
    }

    const truncated = current ? this.truncatePath(current) : '';

    if (this.options.isInteractive && this.spinner) {
      this.spinner.text = truncated
        ? `${progressText.padEnd(25)} ${chalk.dim(truncated)}`
        : progressText;
    }

    if (this.options.verbose && current) {
      this.verboseLines.push(`  → ${current}`);
    }
  }

  /**
   * Mark the current stage as complete.
   */
  completeStage(stats: StageStats): void {
    if (this.options.json) {
      this.emitJson({
        type: 'stage_complete',
        timestamp: new Date().toISOString(),
        stage: stats.stage,
        data: {
          processed: stats.processed,
          total: stats.total,
          durationMs: stats.durationMs,
          details: stats.details,
        },
      });
    } else if (this.options.isInteractive && this.spinner) {
      this.spinner.succeed(
        `${stats.processed.toLocaleString()} ${this.getStageUnit(stats.stage)}`
      );

      if (this.options.verbose && this.verboseLines.length > 0) {
        for (const line of this.verboseLines.slice(0, 10)) {
          console.log(chalk.dim(line));
        }
        if (this.verboseLines.length > 10) {
          console.log(chalk.dim(`  ... and ${this.verboseLines.length - 10} more`));
        }
      }
    } else {
      console.log(
        `${STAGE_LABELS[stats.stage]} complete: ${stats.processed.toLocaleString()} ${this.getStageUnit(stats.stage)}`
      );
    }

    this.currentStage = null;
    this.spinner = null;
  }

  /**
   * Display a warning message.
   *
   * @param context - Optional context (e.g., file path or URL)
   */
  warn(message: string, context?: string): void {
    if (this.options.json) {
      this.emitJson({
        type: 'warning',
        timestamp: new Date().toISOString(),
        stage: this.currentStage ?? undefined,
        data: { message, context },
      });
      return;
    }

    // Spinners hide warnings unless verbose
    if (this.options.verbose || !this.options.isInteractive) {
      const contextStr = context ? ` (${context})` : '';
      console.warn(chalk.yellow(`Warning: ${message}${contextStr}`));
    }
  }

  /**
   * Display a per-item error. The run continues.
   */
  error(message: string, context?: string): void {
    if (this.options.json) {
      this.emitJson({
        type: 'error',
        timestamp: new Date().toISOString(),
        stage: this.currentStage ?? undefined,
        data: { message, context },
      });
      return;
    }

    const contextStr = context ? ` (${context})` : '';
    const line = chalk.red(`Error: ${message}${contextStr}`);
    if (this.spinner) {
      // Print above the spinner instead of through it
      this.spinner.clear();
      console.error(line);
      this.spinner.render();
    } else {
      console.error(line);
    }
  }

  /**
   * Summary after `kbi chunk`.
   */
  showChunkSummary(result: ChunkPipelineResult): void {
    if (this.options.json) {
      this.emitComplete(result);
      return;
    }

    console.log('');
    console.log(chalk.green.bold('Chunking Complete ✓'));
    console.log('');
    console.log(`  ${chalk.dim('Markdown files:')}   ${result.markdownFiles.toLocaleString()}`);
    console.log(`  ${chalk.dim('Forum topics:')}     ${result.discourseFiles.toLocaleString()}`);
    console.log(`  ${chalk.dim('Markdown chunks:')}  ${result.markdownChunks.toLocaleString()}`);
    console.log(`  ${chalk.dim('Forum chunks:')}     ${result.discourseChunks.toLocaleString()}`);
    console.log(`  ${chalk.dim('Image URLs:')}       ${result.imageReferences.toLocaleString()}`);
    if (result.skippedFiles > 0 || result.skippedPosts > 0) {
      console.log(
        `  ${chalk.dim('Skipped:')}          ${result.skippedFiles} file(s), ${result.skippedPosts} short post(s)`
      );
    }
    console.log(`  ${chalk.dim('Time elapsed:')}     ${this.formatDuration(result.totalDurationMs)}`);

    this.showBreakdown(result.stageDurations);
    this.showWarnings(result.warnings);
    console.log('');
  }

  /**
   * Summary after `kbi embed`. Always states the record count, even when
   * it is zero.
   */
  showEmbeddingSummary(result: EmbeddingPipelineResult): void {
    if (this.options.json) {
      this.emitComplete(result);
      return;
    }

    const heading =
      result.recordCount > 0
        ? chalk.green.bold('Embedding Complete ✓')
        : chalk.yellow.bold('Embedding Complete (no records produced)');

    console.log('');
    console.log(heading);
    console.log('');
    console.log(`  ${chalk.dim('Records:')}          ${result.recordCount.toLocaleString()}`);
    console.log(
      `  ${chalk.dim('Text:')}             ${result.textRecords.toLocaleString()} of ${result.textChunks.toLocaleString()} chunks`
    );
    console.log(
      `  ${chalk.dim('Images:')}           ${result.imageRecords.toLocaleString()} of ${result.imageReferences.toLocaleString()} references`
    );
    if (result.dimensions !== null) {
      console.log(`  ${chalk.dim('Dimensions:')}       ${result.dimensions}`);
    }
    const skipped = Object.entries(result.skipped);
    if (skipped.length > 0) {
      const parts = skipped.map(([reason, count]) => `${count} ${reason}`);
      console.log(`  ${chalk.dim('Skipped:')}          ${parts.join(', ')}`);
    }
    if (result.outputPath) {
      console.log(`  ${chalk.dim('Output:')}           ${result.outputPath}`);
    }
    console.log(`  ${chalk.dim('Time elapsed:')}     ${this.formatDuration(result.totalDurationMs)}`);

    this.showBreakdown(result.stageDurations);
    this.showWarnings(result.warnings);
    console.log('');
  }

  private showBreakdown(stageDurations: Partial<Record<PipelineStage, number>>): void {
    if (!this.options.verbose) return;

    const stages = STAGE_ORDER.filter((stage) => stageDurations[stage] !== undefined);
    if (stages.length === 0) return;

    console.log('');
    console.log(chalk.dim('  Breakdown:'));
    for (const stage of stages) {
      const stageLabel = STAGE_LABELS[stage];
      console.log(
        `    ${chalk.dim(stageLabel + ':')}${' '.repeat(12 - stageLabel.length)}${this.formatDuration(stageDurations[stage] ?? 0)}`
      );
    }
  }

  private showWarnings(warnings: string[]): void {
    if (warnings.length === 0) return;

    console.log('');
    console.log(chalk.yellow(`  ${warnings.length} warning(s)`));
    if (this.options.verbose) {
      for (const warning of warnings.slice(0, 5)) {
        console.log(chalk.dim(`    - ${warning}`));
      }
      if (warnings.length > 5) {
        console.log(chalk.dim(`    ... and ${warnings.length - 5} more`));
      }
    }
  }

  private emitComplete(result: ChunkPipelineResult | EmbeddingPipelineResult): void {
    this.emitJson({
      type: 'complete',
      timestamp: new Date().toISOString(),
      data: { result },
    });
  }

  private emitJson(event: ProgressEvent): void {
    console.log(JSON.stringify(event));
  }

  /**
   * Unit shown after the processed count of a stage.
   */
  private getStageUnit(stage: PipelineStage): string {
    switch (stage) {
      case 'scanning':
        return 'files';
      case 'chunking':
        return 'chunks';
      case 'storing':
        return 'chunks stored';
      case 'embedding':
        return 'chunks embedded';
      case 'captioning':
        return 'images embedded';
      case 'writing':
        return 'records written';
    }
  }

  private truncatePath(path: string): string {
    if (path.length <= ProgressReporter.MAX_PATH_LENGTH) {
      return path;
    }
    return '...' + path.slice(-(ProgressReporter.MAX_PATH_LENGTH - 3));
  }

  /**
   * Format milliseconds as human-readable duration.
   */
  private formatDuration(ms: number): string {
    if (ms < 1000) {
      return `${ms}ms`;
    }
    if (ms < 60000) {
      return `${(ms / 1000).toFixed(1)}s`;
    }
    const minutes = Math.floor(ms / 60000);
    const seconds = ((ms % 60000) / 1000).toFixed(0);
    return `${minutes}m ${seconds}s`;
  }
}

/**
 * Create a ProgressReporter with sensible defaults.
 */
export function createProgressReporter(
  options: Partial<ProgressReporterOptions> = {}
): ProgressReporter {
  return new ProgressReporter({
    json: options.json ?? false,
    verbose: options.verbose ?? false,
    noColor: options.noColor ?? !!process.env.NO_COLOR,
    isInteractive: options.isInteractive ?? (process.stdout.isTTY ?? false),
  });
}
