/**
 * Utilities Module
 *
 * Shared utility functions used across the codebase.
 */

export { consoleLogger, type Logger } from './logger.js';

export { parseJsonWithSchema, type JsonParseResult } from './json.js';

export { sleep, type Sleeper } from './sleep.js';
