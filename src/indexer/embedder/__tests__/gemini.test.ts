/**
 * Generative Language REST Client Tests
 *
 * fetch is replaced by a mock; nothing leaves the process.
 */

import { describe, it, expect, vi, type Mock } from 'vitest';
import {
  GeminiService,
  ServiceRequestError,
  createImageDownloader,
  parseMimeType,
  modelResource,
} from '../gemini.js';

const BASE_URL = 'https://api.example.com/v1beta/';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}

function createService(fetchMock: typeof fetch, timeoutMs = 1000): GeminiService {
  return new GeminiService({
    apiKey: 'test-key',
    baseUrl: BASE_URL,
    embeddingModel: 'models/embedding-001',
    taskType: 'RETRIEVAL_DOCUMENT',
    captionModel: 'gemini-1.5-flash',
    embeddingTimeoutMs: timeoutMs,
    captionTimeoutMs: timeoutMs,
    fetch: fetchMock,
  });
}

function requestOf(fetchMock: Mock<typeof fetch>, index = 0) {
  const call = fetchMock.mock.calls[index];
  const init = call?.[1];
  const body: unknown = JSON.parse(String(init?.body));
  return { url: String(call?.[0]), headers: init?.headers, body };
}

describe('modelResource', () => {
  it('prefixes bare model names', () => {
    expect(modelResource('gemini-1.5-flash')).toBe('models/gemini-1.5-flash');
    expect(modelResource('models/embedding-001')).toBe('models/embedding-001');
  });
});

describe('GeminiService.embedContent', () => {
  it('posts the text with the task type and returns the vector', async () => {
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(
      jsonResponse({ embedding: { values: [0.5, -0.25, 1] } })
    );

    const result = await createService(fetchMock).embedContent('hello');

    expect(result).toEqual({ ok: true, value: [0.5, -0.25, 1] });
    const request = requestOf(fetchMock);
    expect(request.url).toBe('https://api.example.com/v1beta/models/embedding-001:embedContent');
    expect(request.headers).toMatchObject({ 'x-goog-api-key': 'test-key' });
    expect(request.body).toEqual({
      model: 'models/embedding-001',
      content: { parts: [{ text: 'hello' }] },
      taskType: 'RETRIEVAL_DOCUMENT',
    });
  });

  it('fails on a non-success status', async () => {
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(new Response('quota exceeded', { status: 429 }));

    const result = await createService(fetchMock).embedContent('hello');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(ServiceRequestError);
      expect(result.error.message).toBe('HTTP 429: quota exceeded');
    }
  });

  it('fails on an unexpected body', async () => {
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(jsonResponse({ embedding: {} }));

    const result = await createService(fetchMock).embedContent('hello');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe('Unexpected embedding response: embedding.values: Required');
    }
  });

  it('fails on an empty vector', async () => {
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(jsonResponse({ embedding: { values: [] } }));

    const result = await createService(fetchMock).embedContent('hello');

    expect(result.ok).toBe(false);
  });

  it('turns network errors into failures', async () => {
    const fetchMock = vi.fn<typeof fetch>().mockRejectedValue(new TypeError('fetch failed'));

    const result = await createService(fetchMock).embedContent('hello');

    expect(result).toEqual({ ok: false, error: new TypeError('fetch failed') });
  });

  it('aborts requests that exceed the timeout', async () => {
    const fetchMock = vi.fn<typeof fetch>(
      (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
        })
    );

    const result = await createService(fetchMock, 10).embedContent('hello');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe('Request timed out after 10ms');
    }
  });
});

describe('GeminiService.generateCaption', () => {
  it('sends the image inline with the prompt', async () => {
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(
      jsonResponse({ candidates: [{ content: { parts: [{ text: ' A line chart ' }, { text: 'of sales.' }] } }] })
    );

    const result = await createService(fetchMock).generateCaption(
      { data: Buffer.from('img'), mimeType: 'image/png' },
      'Describe it.'
    );

    expect(result).toEqual({ ok: true, value: 'A line chart of sales.' });
    const request = requestOf(fetchMock);
    expect(request.url).toBe('https://api.example.com/v1beta/models/gemini-1.5-flash:generateContent');
    expect(request.body).toEqual({
      contents: [
        {
          role: 'user',
          parts: [{ inlineData: { mimeType: 'image/png', data: 'aW1n' } }, { text: 'Describe it.' }],
        },
      ],
    });
  });

  it('fails when the model returns no text', async () => {
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(jsonResponse({ candidates: [] }));

    const result = await createService(fetchMock).generateCaption(
      { data: Buffer.from('img'), mimeType: 'image/png' },
      'Describe it.'
    );

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe('Caption response contained no text');
    }
  });
});

describe('createImageDownloader', () => {
  it('returns bytes and the declared type without parameters', async () => {
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(
      new Response(new Uint8Array([1, 2, 3]), { headers: { 'content-type': 'image/PNG; charset=binary' } })
    );

    const result = await createImageDownloader({ fetch: fetchMock })('https://img.example.com/a.png');

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.mimeType).toBe('image/png');
      expect([...result.value.data]).toEqual([1, 2, 3]);
    }
  });

  it('falls back to the default type when none is declared', async () => {
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(new Response(new Uint8Array([9])));

    const result = await createImageDownloader({ fetch: fetchMock })('https://img.example.com/a');

    expect(result.ok && result.value.mimeType).toBe('image/webp');
  });

  it('fails on a non-success status', async () => {
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(new Response('missing', { status: 404 }));

    const result = await createImageDownloader({ fetch: fetchMock })('https://img.example.com/a.png');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe('Failed to download image: HTTP 404: missing');
    }
  });
});

describe('parseMimeType', () => {
  it('uses the fallback for missing or blank headers', () => {
    expect(parseMimeType(null, 'image/webp')).toBe('image/webp');
    expect(parseMimeType('  ', 'image/webp')).toBe('image/webp');
    expect(parseMimeType('image/jpeg', 'image/webp')).toBe('image/jpeg');
  });
});
