/**
 * Retrying Service Client
 *
 * Wraps embedding and captioning with bounded retries and exponential
 * backoff. Every attempt first passes through the shared throttle.
 *
 * Exhausted retries produce a failed RetryResult, never an exception;
 * the caller skips the item and the run continues.
 */

import { toError } from '../../errors/index.js';
import { consoleLogger, sleep as defaultSleep, type Logger, type Sleeper } from '../../utils/index.js';
import type {
  EmbeddingVector,
  GenerativeService,
  ImageDownloader,
  RetryResult,
  ServiceResult,
  Throttle,
} from './types.js';

export const CAPTION_PROMPT =
  'Provide a detailed factual description of the image. List all visible text, diagrams, ' +
  'charts, labels, and objects, including their spatial layout and relationships. Focus only ' +
  'on what can be directly seen, avoiding interpretation or assumptions. Describe every ' +
  'element as if preparing the image for a blind person to understand its structure and content.';

export const DEFAULT_EMBED_MAX_RETRIES = 3;
export const DEFAULT_CAPTION_MAX_RETRIES = 2;
export const DEFAULT_BASE_DELAY_MS = 1000;

export interface RetryingServiceClientOptions {
  service: GenerativeService;
  downloadImage: ImageDownloader;
  /** Shared by every call in the run */
  limiter: Throttle;
  embedMaxRetries?: number;
  captionMaxRetries?: number;
  /** Delay before the second attempt; doubles each time */
  baseDelayMs?: number;
  captionPrompt?: string;
  sleep?: Sleeper;
  logger?: Logger;
}

/** Short label for log lines about a text */
function preview(text: string, max = 40): string {
  const flat = text.replace(/\s+/g, ' ').trim();
  return flat.length > max ? `"${flat.slice(0, max)}…"` : `"${flat}"`;
}

export class RetryingServiceClient {
  private readonly service: GenerativeService;
  private readonly downloadImage: ImageDownloader;
  private readonly limiter: Throttle;
  private readonly embedMaxRetries: number;
  private readonly captionMaxRetries: number;
  private readonly baseDelayMs: number;
  private readonly captionPrompt: string;
  private readonly sleep: Sleeper;
  private readonly logger: Logger;

  constructor(options: RetryingServiceClientOptions) {
    this.service = options.service;
    this.downloadImage = options.downloadImage;
    this.limiter = options.limiter;
    this.embedMaxRetries = Math.max(1, options.embedMaxRetries ?? DEFAULT_EMBED_MAX_RETRIES);
    this.captionMaxRetries = Math.max(1, options.captionMaxRetries ?? DEFAULT_CAPTION_MAX_RETRIES);
    this.baseDelayMs = options.baseDelayMs ?? DEFAULT_BASE_DELAY_MS;
    this.captionPrompt = options.captionPrompt ?? CAPTION_PROMPT;
    this.sleep = options.sleep ?? defaultSleep;
    this.logger = options.logger ?? consoleLogger;
  }

  /**
   * Embed a text.
   *
   * @param label - Identifies the item in log lines (defaults to a preview of the text)
   */
  embedText(content: string, label = preview(content)): Promise<RetryResult<EmbeddingVector>> {
    return this.withRetry<EmbeddingVector>(`Embedding ${label}`, this.embedMaxRetries, () =>
      this.service.embedContent(content)
    );
  }

  /**
   * Download an image and caption it. A failed download counts as a
   * failed attempt.
   */
  captionImage(url: string): Promise<RetryResult<string>> {
    return this.withRetry<string>(`Captioning ${url}`, this.captionMaxRetries, async () => {
      const image = await this.downloadImage(url);
      if (!image.ok) return image;
      return this.service.generateCaption(image.value, this.captionPrompt);
    });
  }

  /**
   * Backoff before retry number `attempt + 1` (attempt counted from 0).
   */
  backoffDelay(attempt: number): number {
    return 2 ** attempt * this.baseDelayMs;
  }

  private async withRetry<T>(
    label: string,
    maxRetries: number,
    operation: () => Promise<ServiceResult<T>>
  ): Promise<RetryResult<T>> {
    let lastError: Error = new Error('No attempt was made');

    for (let attempt = 0; attempt < maxRetries; attempt++) {
      await this.limiter.acquire();

      let result: ServiceResult<T>;
      try {
        result = await operation();
      } catch (error) {
        // Services resolve their failures; a throw counts as one too
        result = { ok: false, error: toError(error) };
      }

      if (result.ok) {
        return { ok: true, value: result.value, attempts: attempt + 1 };
      }

      lastError = result.error;

      if (attempt === maxRetries - 1) {
        this.logger.warn(`${label} failed after ${maxRetries} attempts: ${lastError.message}`);
        break;
      }

      const delay = this.backoffDelay(attempt);
      this.logger.warn(
        `${label}: attempt ${attempt + 1}/${maxRetries} failed (${lastError.message}); ` +
          `retrying in ${delay / 1000}s`
      );
      await this.sleep(delay);
    }

    return { ok: false, error: lastError, attempts: maxRetries };
  }
}
