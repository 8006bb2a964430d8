/**
 * Embedder Module
 *
 * Rate-limited, retrying access to the embedding and captioning models.
 *
 * @example
 * ```ts
 * const limiter = new RateLimiter({ rps: 2, rpm: 60 });
 * const client = new RetryingServiceClient({
 *   service: new GeminiService({ apiKey, baseUrl, ... }),
 *   downloadImage: createImageDownloader(),
 *   limiter,
 * });
 *
 * const result = await client.embedText('some chunk');
 * if (result.ok) console.log(result.value.length);
 * ```
 */

export {
  success,
  failure,
  type ServiceResult,
  type RetryResult,
  type EmbeddingVector,
  type ImagePayload,
  type GenerativeService,
  type ImageDownloader,
  type Throttle,
} from './types.js';

export {
  RateLimiter,
  WINDOW_MS,
  type RateLimiterOptions,
  type RateLimiterStats,
} from './rate-limiter.js';

export {
  GeminiService,
  ServiceRequestError,
  createImageDownloader,
  parseMimeType,
  modelResource,
  type GeminiServiceOptions,
  type ImageDownloadOptions,
} from './gemini.js';

export {
  RetryingServiceClient,
  CAPTION_PROMPT,
  DEFAULT_EMBED_MAX_RETRIES,
  DEFAULT_CAPTION_MAX_RETRIES,
  DEFAULT_BASE_DELAY_MS,
  type RetryingServiceClientOptions,
} from './client.js';
