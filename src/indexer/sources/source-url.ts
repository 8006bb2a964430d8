/**
 * Source URL Annotation
 *
 * Markdown documents carry their published URL in a first-line comment:
 *
 *   <!-- source_url: https://docs.example.com/#/page-name -->
 *
 * The chunker copies it onto every chunk of the document.
 */

import { readFile, writeFile } from 'node:fs/promises';
import { basename, extname } from 'node:path';

const COMMENT_PREFIX = '<!-- source_url:';

export type AnnotationAction = 'inserted' | 'updated' | 'unchanged';

export interface AnnotationResult {
  content: string;
  action: AnnotationAction;
}

/**
 * Page name for a markdown file: base name without extension, dashes,
 * underscores and spaces turned into dashes, lower-cased.
 *
 * @example
 * pageNameFromPath('docs/Large_Language-Models.md'); // 'large-language-models'
 */
export function pageNameFromPath(filePath: string): string {
  const name = basename(filePath, extname(filePath));
  return name.replace(/[-_ ]/g, '-').toLowerCase();
}

/**
 * Published URL for a markdown file: `<baseUrl><page-name>`.
 */
export function pageUrlFromPath(filePath: string, baseUrl: string): string {
  return `${baseUrl}${pageNameFromPath(filePath)}`;
}

export function formatSourceUrlComment(url: string): string {
  return `${COMMENT_PREFIX} ${url} -->`;
}

/**
 * Insert the source URL comment, or replace it when the first line
 * already is one. Inserted comments are followed by a blank line.
 */
export function annotateSourceUrl(content: string, url: string): AnnotationResult {
  const comment = formatSourceUrlComment(url);
  const newline = content.indexOf('\n');
  const firstLine = newline === -1 ? content : content.slice(0, newline);

  if (firstLine.trim().startsWith(COMMENT_PREFIX)) {
    const rest = newline === -1 ? '' : content.slice(newline + 1);
    const updated = `${comment}\n${rest}`;
    return { content: updated, action: updated === content ? 'unchanged' : 'updated' };
  }

  return { content: `${comment}\n\n${content}`, action: 'inserted' };
}

/**
 * Annotate one file in place. Files already carrying the right comment
 * are not rewritten.
 */
export async function annotateFile(filePath: string, baseUrl: string): Promise<AnnotationAction> {
  const content = await readFile(filePath, 'utf-8');
  const result = annotateSourceUrl(content, pageUrlFromPath(filePath, baseUrl));

  if (result.action !== 'unchanged') {
    await writeFile(filePath, result.content, 'utf-8');
  }

  return result.action;
}
