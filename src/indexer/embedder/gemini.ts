/**
 * Generative Language API
 *
 * REST client for the two model operations the pipeline uses:
 * `models/{model}:embedContent` and `models/{model}:generateContent`.
 * Plus the plain HTTP image download that precedes captioning.
 *
 * All methods resolve to ServiceResult; nothing here throws for network,
 * HTTP or response-shape problems.
 */

import { z } from 'zod';
import { toError } from '../../errors/index.js';
import type { EmbeddingTaskType } from '../../config/index.js';
import {
  failure,
  success,
  type EmbeddingVector,
  type GenerativeService,
  type ImageDownloader,
  type ImagePayload,
  type ServiceResult,
} from './types.js';

const DEFAULT_TIMEOUT_MS = 60000;

/**
 * Failed HTTP exchange. `status` is absent for network errors and timeouts.
 */
export class ServiceRequestError extends Error {
  constructor(
    message: string,
    public readonly status?: number
  ) {
    super(message);
    this.name = 'ServiceRequestError';
  }
}

const EmbedContentResponseSchema = z.object({
  embedding: z.object({
    values: z.array(z.number()),
  }),
});

const GenerateContentResponseSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z
          .object({
            parts: z.array(z.object({ text: z.string().optional() })).default([]),
          })
          .optional(),
      })
    )
    .default([]),
});

export interface GeminiServiceOptions {
  apiKey: string;
  baseUrl: string;
  embeddingModel: string;
  taskType: EmbeddingTaskType;
  captionModel: string;
  embeddingTimeoutMs?: number;
  captionTimeoutMs?: number;
  /** Injected in tests */
  fetch?: typeof fetch;
}

function trimTrailingSlash(url: string): string {
  return url.replace(/\/+$/, '');
}

/**
 * `embedding-001` and `models/embedding-001` both address the same model.
 */
export function modelResource(model: string): string {
  return model.startsWith('models/') ? model : `models/${model}`;
}

async function readErrorDetail(response: Response): Promise<string> {
  try {
    const text = await response.text();
    return text.trim().slice(0, 300);
  } catch (error) {
    return `unreadable body (${toError(error).message})`;
  }
}

/**
 * Run `fetch` with an abort timeout, turning every failure mode into a
 * ServiceResult. On success the open Response is returned for the caller
 * to read.
 */
async function fetchWithTimeout(
  fetchImpl: typeof fetch,
  url: string,
  init: RequestInit,
  timeoutMs: number
): Promise<ServiceResult<Response>> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const response = await fetchImpl(url, { ...init, signal: controller.signal });
    if (!response.ok) {
      const detail = await readErrorDetail(response);
      return failure(
        new ServiceRequestError(
          `HTTP ${response.status}${detail ? `: ${detail}` : ''}`,
          response.status
        )
      );
    }
    return success(response);
  } catch (error) {
    if (controller.signal.aborted) {
      return failure(new ServiceRequestError(`Request timed out after ${timeoutMs}ms`));
    }
    return failure(toError(error));
  } finally {
    clearTimeout(timeout);
  }
}

async function readJson(response: Response): Promise<ServiceResult<unknown>> {
  try {
    const body: unknown = await response.json();
    return success(body);
  } catch (error) {
    return failure(new ServiceRequestError(`Invalid JSON response: ${toError(error).message}`));
  }
}

function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

export class GeminiService implements GenerativeService {
  private readonly fetchImpl: typeof fetch;
  private readonly baseUrl: string;

  constructor(private readonly options: GeminiServiceOptions) {
    this.fetchImpl = options.fetch ?? fetch;
    this.baseUrl = trimTrailingSlash(options.baseUrl);
  }

  async embedContent(text: string): Promise<ServiceResult<EmbeddingVector>> {
    const model = modelResource(this.options.embeddingModel);
    const body = await this.post(
      `${model}:embedContent`,
      {
        model,
        content: { parts: [{ text }] },
        taskType: this.options.taskType,
      },
      this.options.embeddingTimeoutMs ?? DEFAULT_TIMEOUT_MS
    );
    if (!body.ok) return body;

    const parsed = EmbedContentResponseSchema.safeParse(body.value);
    if (!parsed.success) {
      return failure(new ServiceRequestError(`Unexpected embedding response: ${describeIssues(parsed.error)}`));
    }

    const values = parsed.data.embedding.values;
    if (values.length === 0) {
      return failure(new ServiceRequestError('Embedding response contained an empty vector'));
    }
    return success(values);
  }

  async generateCaption(image: ImagePayload, prompt: string): Promise<ServiceResult<string>> {
    const model = modelResource(this.options.captionModel);
    const body = await this.post(
      `${model}:generateContent`,
      {
        contents: [
          {
            role: 'user',
            parts: [
              { inlineData: { mimeType: image.mimeType, data: image.data.toString('base64') } },
              { text: prompt },
            ],
          },
        ],
      },
      this.options.captionTimeoutMs ?? DEFAULT_TIMEOUT_MS
    );
    if (!body.ok) return body;

    const parsed = GenerateContentResponseSchema.safeParse(body.value);
    if (!parsed.success) {
      return failure(new ServiceRequestError(`Unexpected caption response: ${describeIssues(parsed.error)}`));
    }

    const text = parsed.data.candidates
      .flatMap((candidate) => candidate.content?.parts ?? [])
      .map((part) => part.text ?? '')
      .join('')
      .trim();

    if (!text) {
      return failure(new ServiceRequestError('Caption response contained no text'));
    }
    return success(text);
  }

  private async post(path: string, payload: unknown, timeoutMs: number): Promise<ServiceResult<unknown>> {
    const response = await fetchWithTimeout(
      this.fetchImpl,
      `${this.baseUrl}/${path}`,
      {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'x-goog-api-key': this.options.apiKey,
        },
        body: JSON.stringify(payload),
      },
      timeoutMs
    );
    if (!response.ok) return response;
    return readJson(response.value);
  }
}

export interface ImageDownloadOptions {
  /**
   * Used when the server sends no Content-Type. Images that are not
   * actually this type get mislabeled; the model usually copes.
   */
  defaultMimeType?: string;
  timeoutMs?: number;
  fetch?: typeof fetch;
}

/**
 * MIME type from a Content-Type header, parameters stripped.
 */
export function parseMimeType(header: string | null, fallback: string): string {
  const type = header?.split(';')[0]?.trim().toLowerCase();
  return type ? type : fallback;
}

/**
 * Build the downloader used before captioning.
 */
export function createImageDownloader(options: ImageDownloadOptions = {}): ImageDownloader {
  const fetchImpl = options.fetch ?? fetch;
  const fallback = options.defaultMimeType ?? 'image/webp';
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;

  return async (url: string): Promise<ServiceResult<ImagePayload>> => {
    const response = await fetchWithTimeout(fetchImpl, url, { method: 'GET' }, timeoutMs);
    if (!response.ok) {
      return failure(new ServiceRequestError(`Failed to download image: ${response.error.message}`));
    }

    try {
      const data = Buffer.from(await response.value.arrayBuffer());
      return success({
        data,
        mimeType: parseMimeType(response.value.headers.get('content-type'), fallback),
      });
    } catch (error) {
      return failure(new ServiceRequestError(`Failed to read image body: ${toError(error).message}`));
    }
  };
}
