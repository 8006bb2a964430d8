/**
 * Embedder Types
 *
 * Remote calls never throw past the service layer: every operation
 * resolves to a ServiceResult, and the retry loop inspects the variant.
 */

/**
 * Outcome of a single remote call.
 */
export type ServiceResult<T> = { ok: true; value: T } | { ok: false; error: Error };

/**
 * Outcome of a retried operation. `attempts` counts calls made, including
 * the successful one.
 */
export type RetryResult<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; error: Error; attempts: number };

export function success<T>(value: T): ServiceResult<T> {
  return { ok: true, value };
}

export function failure<T = never>(error: Error): ServiceResult<T> {
  return { ok: false, error };
}

/**
 * Vector returned by the embedding model. Its length is whatever the
 * model produces.
 */
export type EmbeddingVector = number[];

/**
 * Downloaded image bytes and the MIME type they are sent with.
 */
export interface ImagePayload {
  data: Buffer;
  mimeType: string;
}

/**
 * The two remote model operations the pipeline needs.
 */
export interface GenerativeService {
  /** Embed one text as a retrieval document */
  embedContent(text: string): Promise<ServiceResult<EmbeddingVector>>;

  /** Describe an image in text, guided by `prompt` */
  generateCaption(image: ImagePayload, prompt: string): Promise<ServiceResult<string>>;
}

export type ImageDownloader = (url: string) => Promise<ServiceResult<ImagePayload>>;

/**
 * Anything that can hold a caller until a call is permitted.
 */
export interface Throttle {
  acquire(): Promise<void>;
}
