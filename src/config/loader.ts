/**
 * Configuration Loader
 *
 * Handles the complete config lifecycle:
 * 1. Find/create the config directory ($KBI_HOME, default ~/.kbi)
 * 2. Load config.toml if it exists
 * 3. Validate with Zod schema
 * 4. Merge with defaults (user values override defaults)
 * 5. Validate cross-field rules on the merged result
 */

import * as fs from 'node:fs';
import TOML from '@iarna/toml';
import { ConfigSchema, PartialConfigSchema, type Config } from './schema.js';
import { DEFAULT_CONFIG, CONFIG_TEMPLATE } from './defaults.js';
import { getKbiDir, getConfigPath } from './paths.js';
import { ConfigError } from '../errors/index.js';

export { getKbiDir, getConfigPath };

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Ensure the config directory exists
 */
function ensureKbiDir(): void {
  const dir = getKbiDir();
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
}

/**
 * Deep merge two objects, with source values overriding target.
 * Arrays and primitives are replaced, nested objects are merged.
 */
function deepMerge(target: PlainObject, source: PlainObject): PlainObject {
  const result: PlainObject = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = target[key];

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result;
}

function formatIssues(issues: Array<{ path: (string | number)[]; message: string }>): string {
  return issues.map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`).join('\n');
}

/**
 * Merge a raw (already parsed) user config over the defaults and validate it.
 *
 * @throws ConfigError if a value has the wrong type/range or the
 *   merged result breaks a cross-field rule
 */
export function resolveConfig(raw: unknown, source = getConfigPath()): Config {
  const partial = PartialConfigSchema.safeParse(raw);

  if (!partial.success) {
    throw new ConfigError(
      `Invalid configuration:\n${formatIssues(partial.error.issues)}`,
      `Fix ${source} or run: kbi config reset --force  to restore defaults`
    );
  }

  const merged = deepMerge(structuredClone(DEFAULT_CONFIG), partial.data);
  const full = ConfigSchema.safeParse(merged);

  if (!full.success) {
    throw new ConfigError(
      `Invalid configuration:\n${formatIssues(full.error.issues)}`,
      `Fix ${source} or run: kbi config reset --force  to restore defaults`
    );
  }

  return full.data;
}

/**
 * Load and parse the config file.
 * Returns the merged config (defaults + user overrides).
 *
 * @param createIfMissing - If true, writes the default template on first run
 * @throws ConfigError if config file exists but is invalid
 */
export function loadConfig(createIfMissing = true): Config {
  const configPath = getConfigPath();

  if (!fs.existsSync(configPath)) {
    if (createIfMissing) {
      ensureKbiDir();
      fs.writeFileSync(configPath, CONFIG_TEMPLATE, 'utf-8');
    }
    return structuredClone(DEFAULT_CONFIG);
  }

  const content = fs.readFileSync(configPath, 'utf-8');
  let parsed: unknown;

  try {
    parsed = TOML.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown parse error';
    throw new ConfigError(
      `Invalid TOML in config file: ${message}`,
      `Fix the syntax in ${configPath} or run: kbi config reset --force`
    );
  }

  return resolveConfig(parsed, configPath);
}

/**
 * Get a specific config value by dot-notation path
 * Example: getConfigValue('chunking.chunk_size') => 1000
 */
export function getConfigValue(key: string): unknown {
  let current: unknown = loadConfig();

  for (const part of key.split('.')) {
    if (!isPlainObject(current)) {
      return undefined;
    }
    current = current[part];
  }

  return current;
}

/**
 * Parse a CLI string into a boolean, number or string
 */
function parseValue(value: string): unknown {
  if (value.toLowerCase() === 'true') return true;
  if (value.toLowerCase() === 'false') return false;

  const num = Number(value);
  if (!isNaN(num) && value.trim() !== '') return num;

  return value;
}

/**
 * Set a specific config value by dot-notation path.
 * The whole merged config is validated before the file is written.
 */
export function setConfigValue(key: string, value: string): void {
  const configPath = getConfigPath();
  const parts = key.split('.').filter(Boolean);
  const lastPart = parts.pop();

  if (lastPart === undefined) {
    throw new ConfigError('Invalid config key: empty key', 'Run: kbi config list  to see available keys');
  }

  ensureKbiDir();

  let config: PlainObject = {};
  if (fs.existsSync(configPath)) {
    config = TOML.parse(fs.readFileSync(configPath, 'utf-8'));
  }

  let current = config;
  for (const part of parts) {
    const next = current[part];
    if (isPlainObject(next)) {
      current = next;
    } else {
      const created: PlainObject = {};
      current[part] = created;
      current = created;
    }
  }
  current[lastPart] = parseValue(value);

  try {
    resolveConfig(config, configPath);
  } catch (error) {
    if (error instanceof ConfigError) {
      throw new ConfigError(
        `Invalid value for '${key}':\n${error.message.replace(/^Invalid configuration:\n/, '')}`,
        'Run: kbi config list  to see current values and types'
      );
    }
    throw error;
  }

  fs.writeFileSync(configPath, TOML.stringify(config as TOML.JsonMap), 'utf-8');
}

/**
 * Delete the config file so the next load falls back to defaults.
 *
 * @returns true if a file was removed
 */
export function resetConfig(): boolean {
  const configPath = getConfigPath();
  if (!fs.existsSync(configPath)) {
    return false;
  }
  fs.unlinkSync(configPath);
  return true;
}

/**
 * List all config values in a flat format
 * Returns entries like ['chunking.chunk_size', 1000]
 */
export function listConfig(): Array<[string, unknown]> {
  const entries: Array<[string, unknown]> = [];

  function flatten(obj: PlainObject, prefix = ''): void {
    for (const [key, value] of Object.entries(obj)) {
      const fullKey = prefix ? `${prefix}.${key}` : key;

      if (isPlainObject(value)) {
        flatten(value, fullKey);
      } else {
        entries.push([fullKey, value]);
      }
    }
  }

  flatten(loadConfig());
  return entries;
}
