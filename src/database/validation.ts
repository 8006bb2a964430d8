/**
 * Database Row Validation
 *
 * Zod schemas for validating database reads at runtime. The chunk store
 * may have been produced by an older build or another tool, so rows are
 * checked rather than cast.
 *
 * Usage:
 * ```ts
 * const rows = db.prepare('SELECT * FROM markdown_chunks').all();
 * return validateRows(MarkdownChunkRowSchema, rows, 'markdown_chunks');
 * ```
 */

import { z, type ZodIssue } from 'zod';
import { CLIError } from '../errors/types.js';

// ============================================================================
// Row Schemas
// ============================================================================

// Only the columns the embedding pipeline reads are checked. Stores
// written by other tools may leave any column NULL.

const chunkIndex = z.number().int().nonnegative().nullable();

const sourceUrl = z
  .string()
  .nullable()
  .transform((value) => value ?? '');

const textChunkRow = z.object({
  chunk_index: chunkIndex,
  content: z.string(),
  source_url: sourceUrl,
});

export const MarkdownChunkRowSchema = textChunkRow;

export type MarkdownChunkRow = z.infer<typeof MarkdownChunkRowSchema>;

export const DiscourseChunkRowSchema = textChunkRow;

export type DiscourseChunkRow = z.infer<typeof DiscourseChunkRowSchema>;

export const ImageChunkRowSchema = z.object({
  image_url: z.string(),
});

export type ImageChunkRow = z.infer<typeof ImageChunkRowSchema>;

/** `SELECT COUNT(*) AS count ...` */
export const CountRowSchema = z.object({
  count: z.number().int().nonnegative(),
});

/** One failed field of a row: dotted path and zod's message. */
export interface RowIssue {
  path: string;
  message: string;
}

const SHOWN_ISSUES = 3;

function describeIssues(issues: RowIssue[]): string {
  const shown = issues.slice(0, SHOWN_ISSUES).map(({ path, message }) => `  - ${path}: ${message}`);
  if (issues.length > SHOWN_ISSUES) {
    shown.push(`  ... and ${issues.length - SHOWN_ISSUES} more`);
  }
  return shown.join('\n');
}

/**
 * A row read from the chunk store does not have the expected shape.
 * Exits with the database code (5).
 */
export class SchemaValidationError extends CLIError {
  public readonly issues: RowIssue[];

  constructor(message: string, zodIssues: ZodIssue[]) {
    const issues = zodIssues.map((issue) => ({ path: issue.path.join('.'), message: issue.message }));
    super(
      message,
      `Unexpected row shape:\n${describeIssues(issues)}\n\nRebuild the store with: kbi chunk`,
      5
    );
    this.name = 'SchemaValidationError';
    this.issues = issues;
  }
}

/**
 * Parse one row, throwing SchemaValidationError when it does not match.
 *
 * @param context - Names the row in the error, e.g. "markdown_chunks.count"
 */
export function validateRow<T extends z.ZodSchema>(
  schema: T,
  row: unknown,
  context: string
): z.output<T> {
  const parsed = schema.safeParse(row);
  if (!parsed.success) {
    throw new SchemaValidationError(`Database schema mismatch in ${context}`, parsed.error.issues);
  }
  return parsed.data;
}

/** "content: Expected string, received null; source_url: Required" */
export function summarizeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
}

/**
 * Parse a result set. The first bad row throws, with its index in the
 * message, unless `onInvalid` is given: then bad rows are handed to it
 * with their index and left out of the result.
 */
export function validateRows<T extends z.ZodSchema>(
  schema: T,
  rows: unknown[],
  table: string,
  onInvalid?: (error: z.ZodError, index: number) => void
): z.output<T>[] {
  const parsedRows: z.output<T>[] = [];
  rows.forEach((row, index) => {
    if (onInvalid) {
      const parsed = schema.safeParse(row);
      if (parsed.success) {
        parsedRows.push(parsed.data);
      } else {
        onInvalid(parsed.error, index);
      }
    } else {
      parsedRows.push(validateRow(schema, row, `${table}[${index}]`));
    }
  });
  return parsedRows;
}
