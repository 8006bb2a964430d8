/**
 * Environment Variable Handler Tests
 *
 * Uses vi.stubEnv() for safe environment variable mocking.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  loadEnv,
  getEnv,
  hasApiKey,
  _clearEnvCache,
  DEFAULT_GENAI_BASE_URL,
} from '../env.js';
import { ConfigError } from '../../errors/index.js';

describe('Environment Variable Loading', () => {
  beforeEach(() => {
    _clearEnvCache();
    vi.stubEnv('GENAI_API_KEY', '');
    vi.stubEnv('GENAI_BASE_URL', '');
  });

  afterEach(() => {
    _clearEnvCache();
    vi.unstubAllEnvs();
  });

  it('loads GENAI_API_KEY when set', () => {
    vi.stubEnv('GENAI_API_KEY', 'test-key');

    expect(loadEnv().GENAI_API_KEY).toBe('test-key');
    expect(hasApiKey()).toBe(true);
  });

  it('treats a blank key as missing', () => {
    vi.stubEnv('GENAI_API_KEY', '   ');

    expect(hasApiKey()).toBe(false);
  });

  it('provides the default base URL', () => {
    expect(getEnv('GENAI_BASE_URL')).toBe(DEFAULT_GENAI_BASE_URL);
  });

  it('uses a custom base URL when set', () => {
    vi.stubEnv('GENAI_BASE_URL', 'http://127.0.0.1:8080/v1beta');

    expect(getEnv('GENAI_BASE_URL')).toBe('http://127.0.0.1:8080/v1beta');
  });

  it('rejects a base URL that is not a URL', () => {
    vi.stubEnv('GENAI_API_KEY', 'test-key');
    vi.stubEnv('GENAI_BASE_URL', 'not a url');

    expect(() => loadEnv()).toThrow(ConfigError);
    expect(() => getEnv('GENAI_BASE_URL')).toThrow('GENAI_BASE_URL is not a valid URL: not a url');
  });

  it('caches values after the first load', () => {
    vi.stubEnv('GENAI_API_KEY', 'first');
    loadEnv();
    vi.stubEnv('GENAI_API_KEY', 'second');

    expect(getEnv('GENAI_API_KEY')).toBe('first');

    _clearEnvCache();
    expect(getEnv('GENAI_API_KEY')).toBe('second');
  });
});
