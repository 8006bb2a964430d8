/**
 * Config Module
 *
 * Exports for programmatic config access.
 * CLI users interact via `kbi config` commands.
 */

// Schema and types
export {
  ConfigSchema,
  ConfigObjectSchema,
  PartialConfigSchema,
  ChunkingConfigSchema,
  EmbeddingConfigSchema,
  CaptioningConfigSchema,
  RateLimitConfigSchema,
} from './schema.js';
export type {
  Config,
  PartialConfig,
  ChunkingConfig,
  EmbeddingConfig,
  CaptioningConfig,
  RateLimitConfig,
  EmbeddingTaskType,
} from './schema.js';

// Defaults
export { DEFAULT_CONFIG, CONFIG_TEMPLATE } from './defaults.js';

// Loader functions
export {
  loadConfig,
  resolveConfig,
  getConfigValue,
  setConfigValue,
  resetConfig,
  listConfig,
  getKbiDir,
  getConfigPath,
} from './loader.js';

export { resolveDataPath } from './paths.js';

// Environment variables
export {
  loadEnv,
  getEnv,
  hasApiKey,
  SETUP_INSTRUCTIONS,
  DEFAULT_GENAI_BASE_URL,
  EnvSchema,
  _clearEnvCache,
} from './env.js';
export type { EnvVars } from './env.js';

// Startup validation
export {
  validateStartupConfig,
  printStartupValidation,
  getValidationOptionsForCommand,
  COMMANDS_REQUIRING_API_KEY,
  COMMANDS_REQUIRING_CONFIG,
} from './startup-validation.js';
export type {
  StartupValidationResult,
  StartupValidationOptions,
} from './startup-validation.js';
