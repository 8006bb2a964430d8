/**
 * Markdown Source
 *
 * Turns an annotated markdown document into plain text for chunking and
 * a list of referenced image URLs.
 */

import { marked } from 'marked';

const SOURCE_URL_COMMENT = /<!--\s*source_url:\s*(.*?)\s*-->/;

/**
 * A markdown document reduced to what the chunk store needs.
 */
export interface ParsedMarkdown {
  /** From the `<!-- source_url: ... -->` comment, '' when absent */
  sourceUrl: string;
  /** Image URLs in document order (duplicates kept) */
  imageUrls: string[];
  /** Formatting-free text, whitespace not yet normalized */
  text: string;
}

/**
 * Read the source URL comment, wherever it sits in the document.
 */
export function extractSourceUrl(markdown: string): string {
  return SOURCE_URL_COMMENT.exec(markdown)?.[1]?.trim() ?? '';
}

/**
 * Collect image URLs using the marked lexer, so images inside code
 * blocks are not picked up and `![alt](url "title")` yields just the URL.
 */
export function extractImageUrls(markdown: string): string[] {
  const urls: string[] = [];

  marked.walkTokens(marked.lexer(markdown), (token) => {
    if (token.type === 'image' && typeof token.href === 'string' && token.href !== '') {
      urls.push(token.href);
    }
  });

  return urls;
}

/**
 * Strip markdown formatting, keeping the prose.
 *
 * Removes comments, code blocks and spans, images, heading markers and
 * emphasis markers. Links are replaced by their text.
 */
export function stripMarkdown(markdown: string): string {
  return (
    markdown
      .replace(/<!--[\s\S]*?-->/g, ' ')
      .replace(/(```|~~~)[\s\S]*?\1/g, ' ')
      .replace(/`[^`\n]*`/g, ' ')
      .replace(/!\[[^\]]*\]\([^)]*\)/g, ' ')
      .replace(/\[([^\]]*)\]\([^)]*\)/g, '$1')
      .replace(/^[ \t]{0,3}#{1,6}[ \t]*/gm, '')
      // Emphasis markers only where they touch a word edge, so snake_case survives
      .replace(/(^|[^\w*])[*_]{1,3}(?=\S)/gm, '$1')
      .replace(/(\S)[*_]{1,3}(?=[^\w*]|$)/gm, '$1')
  );
}

/**
 * Parse one markdown document.
 */
export function parseMarkdown(markdown: string): ParsedMarkdown {
  return {
    sourceUrl: extractSourceUrl(markdown),
    imageUrls: extractImageUrls(markdown),
    text: stripMarkdown(markdown),
  };
}
