/**
 * Discourse Source
 *
 * Forum topics are stored one per JSON file as dumped by the crawler:
 *
 *   { "post_data": { "id": 42, "slug": "topic-slug",
 *                    "post_stream": { "posts": [{ "id": 1, "cooked": "<p>...</p>" }] } } }
 *
 * `cooked` is the rendered post HTML.
 */

import { z } from 'zod';
import { parseJsonWithSchema } from '../../utils/index.js';

export const DiscoursePostSchema = z.object({
  id: z.number().int(),
  cooked: z.string().default(''),
});

export const DiscourseTopicFileSchema = z.object({
  post_data: z.object({
    id: z.number().int().default(-1),
    slug: z.string().default(''),
    post_stream: z
      .object({
        posts: z.array(DiscoursePostSchema).default([]),
      })
      .default({}),
  }),
});

export type DiscoursePost = z.infer<typeof DiscoursePostSchema>;

export interface DiscourseTopic {
  id: number;
  slug: string;
  posts: DiscoursePost[];
}

export type TopicParseResult =
  | { success: true; topic: DiscourseTopic }
  | { success: false; error: string };

/**
 * Parse a topic dump. Malformed JSON and unexpected shapes are reported,
 * not thrown, so one bad file does not stop a run.
 */
export function parseTopicFile(json: string): TopicParseResult {
  const result = parseJsonWithSchema(json, DiscourseTopicFileSchema);
  if (!result.success) {
    return result;
  }

  const { id, slug, post_stream } = result.data.post_data;
  return { success: true, topic: { id, slug, posts: post_stream.posts } };
}

const NAMED_ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: ' ',
  hellip: '…',
  mdash: '—',
  ndash: '–',
  rsquo: '’',
  lsquo: '‘',
  rdquo: '”',
  ldquo: '“',
};

const MAX_CODE_POINT = 0x10ffff;

function fromCode(match: string, code: number): string {
  return Number.isNaN(code) || code > MAX_CODE_POINT ? match : String.fromCodePoint(code);
}

function decodeEntity(match: string, entity: string): string {
  if (entity.startsWith('#x') || entity.startsWith('#X')) {
    return fromCode(match, Number.parseInt(entity.slice(2), 16));
  }
  if (entity.startsWith('#')) {
    return fromCode(match, Number.parseInt(entity.slice(1), 10));
  }
  return NAMED_ENTITIES[entity.toLowerCase()] ?? match;
}

/**
 * Reduce post HTML to text: scripts and styles dropped, tags replaced
 * by spaces, entities decoded, whitespace collapsed.
 */
export function cleanHtml(html: string): string {
  return html
    .replace(/<(script|style)\b[^>]*>[\s\S]*?<\/\1\s*>/gi, ' ')
    .replace(/<!--[\s\S]*?-->/g, ' ')
    .replace(/<[^>]+>/g, ' ')
    .replace(/&(#x[0-9a-f]{1,6}|#\d{1,7}|[a-z]+);/gi, decodeEntity)
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Provenance URL of a forum chunk: `<base>/t/<slug>/<topic_id>/<chunk_index>`.
 */
export function buildTopicUrl(baseUrl: string, slug: string, topicId: number, chunkIndex: number): string {
  return `${baseUrl.replace(/\/+$/, '')}/t/${slug}/${topicId}/${chunkIndex}`;
}
