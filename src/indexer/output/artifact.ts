/**
 * Embedding Artifact
 *
 * The pipeline's output file:
 *
 *   { "version": 1, "model": "...", "dimensions": 768, "count": 2,
 *     "created_at": "...", "chunks": [...], "embeddings": [[...], [...]],
 *     "source_urls": [...] }
 *
 * Written to a temp file and renamed, so readers never see half a file.
 */

import { existsSync } from 'node:fs';
import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { z } from 'zod';

import { FileNotFoundError, ValidationError } from '../../errors/index.js';
import { parseJsonWithSchema } from '../../utils/index.js';
import type { EmbeddingCollection } from './collection.js';

export const ARTIFACT_VERSION = 1;

export const EmbeddingArtifactSchema = z
  .object({
    version: z.literal(ARTIFACT_VERSION),
    model: z.string(),
    dimensions: z.number().int().nonnegative(),
    count: z.number().int().nonnegative(),
    created_at: z.string(),
    chunks: z.array(z.string()),
    embeddings: z.array(z.array(z.number())),
    source_urls: z.array(z.string()),
  })
  .superRefine((artifact, ctx) => {
    for (const key of ['chunks', 'embeddings', 'source_urls'] as const) {
      if (artifact[key].length !== artifact.count) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [key],
          message: `has ${artifact[key].length} entries, count is ${artifact.count}`,
        });
      }
    }
    const ragged = artifact.embeddings.findIndex((vector) => vector.length !== artifact.dimensions);
    if (ragged !== -1) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['embeddings', ragged],
        message: `expected ${artifact.dimensions} dimensions`,
      });
    }
  });

export type EmbeddingArtifact = z.infer<typeof EmbeddingArtifactSchema>;

export function buildArtifact(
  collection: EmbeddingCollection,
  model: string,
  createdAt = new Date()
): EmbeddingArtifact {
  const { chunks, embeddings, sourceUrls } = collection.snapshot();
  return {
    version: ARTIFACT_VERSION,
    model,
    dimensions: collection.dimensions ?? 0,
    count: chunks.length,
    created_at: createdAt.toISOString(),
    chunks,
    embeddings,
    source_urls: sourceUrls,
  };
}

/**
 * Write the artifact, creating the parent directory. On failure the temp
 * file is removed and the error rethrown.
 */
export async function writeArtifact(path: string, artifact: EmbeddingArtifact): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  const tempPath = `${path}.tmp-${process.pid}`;
  try {
    await writeFile(tempPath, JSON.stringify(artifact), 'utf-8');
    await rename(tempPath, path);
  } catch (error) {
    await rm(tempPath, { force: true });
    throw error;
  }
}

/**
 * Read and validate an artifact.
 *
 * @throws FileNotFoundError if the file does not exist
 * @throws ValidationError if it is not a valid artifact
 */
export async function readArtifact(path: string): Promise<EmbeddingArtifact> {
  if (!existsSync(path)) {
    throw new FileNotFoundError(path);
  }

  const result = parseJsonWithSchema(await readFile(path, 'utf-8'), EmbeddingArtifactSchema);
  if (!result.success) {
    throw new ValidationError(`Invalid embedding artifact: ${path}`, [result.error]);
  }
  return result.data;
}
