/**
 * Environment Variable Handler
 *
 * Loads the Generative Language API credential and endpoint.
 * Supports .env files for local development via dotenv.
 *
 * The key is never logged or included in error messages; only its
 * presence is reported.
 */

import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';
import { ConfigError } from '../errors/index.js';

// No-op when .env doesn't exist
dotenvConfig();

export const DEFAULT_GENAI_BASE_URL = 'https://generativelanguage.googleapis.com/v1beta';

/**
 * Environment variable schema. The key is optional at load time and
 * required only by commands that call the remote service.
 */
export const EnvSchema = z.object({
  GENAI_API_KEY: z.string().optional(),
  GENAI_BASE_URL: z.string().url().default(DEFAULT_GENAI_BASE_URL),
});

export type EnvVars = z.infer<typeof EnvSchema>;

/** Cached after first access; cleared by _clearEnvCache() in tests */
let _envCache: EnvVars | null = null;

/**
 * Load environment variables (called once, then cached).
 *
 * @throws ConfigError if GENAI_BASE_URL is set but is not a URL
 */
export function loadEnv(): EnvVars {
  if (_envCache !== null) {
    return _envCache;
  }

  const baseUrl = process.env.GENAI_BASE_URL?.trim() || undefined;
  const result = EnvSchema.safeParse({
    GENAI_API_KEY: process.env.GENAI_API_KEY,
    GENAI_BASE_URL: baseUrl,
  });

  if (!result.success) {
    // Only GENAI_BASE_URL can fail
    throw new ConfigError(
      `GENAI_BASE_URL is not a valid URL: ${baseUrl ?? ''}`,
      `Unset it to use ${DEFAULT_GENAI_BASE_URL}`
    );
  }

  _envCache = result.data;
  return _envCache;
}

/**
 * Get a specific environment variable by key.
 */
export function getEnv<K extends keyof EnvVars>(key: K): EnvVars[K] {
  return loadEnv()[key];
}

/**
 * Check if the API key is configured (non-empty) without exposing it.
 */
export function hasApiKey(): boolean {
  return Boolean(loadEnv().GENAI_API_KEY?.trim());
}

/**
 * Clear the environment cache.
 * FOR TESTING ONLY.
 *
 * @internal
 */
export function _clearEnvCache(): void {
  _envCache = null;
}

/**
 * Shown when the API key is missing.
 */
export const SETUP_INSTRUCTIONS = `
To embed chunks and caption images you need a Generative Language API key:

1. Create a key in Google AI Studio
2. Set the environment variable:

   # macOS/Linux (add to ~/.bashrc or ~/.zshrc)
   export GENAI_API_KEY="your-key"

   # or put it in a .env file next to where you run kbi
   GENAI_API_KEY=your-key

3. Run: kbi embed
`.trim();
