/**
 * JSON Utilities
 *
 * Parsing for JSON that comes from outside the process (forum dumps,
 * artifacts, API bodies), validated against a Zod schema so callers get
 * typed data or a reason, never a thrown SyntaxError.
 */

import type { z } from 'zod';

/**
 * Result of parsing and validating a JSON document.
 */
export type JsonParseResult<T> =
  | { success: true; data: T }
  | { success: false; error: string };

/**
 * Parse a JSON string and validate it against a schema.
 *
 * @example
 * ```typescript
 * const result = parseJsonWithSchema(raw, ForumDumpSchema);
 * if (!result.success) {
 *   logger.warn(`Skipping malformed dump: ${result.error}`);
 * }
 * ```
 */
export function parseJsonWithSchema<S extends z.ZodTypeAny>(
  json: string,
  schema: S
): JsonParseResult<z.output<S>> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return { success: false, error: `Invalid JSON: ${message}` };
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    return { success: false, error: `Unexpected shape: ${issues}` };
  }

  return { success: true, data: result.data };
}
