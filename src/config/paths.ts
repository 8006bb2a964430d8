/**
 * Centralized Path Definitions
 *
 * Directory structure:
 * $KBI_HOME/            (default ~/.kbi)
 * └── config.toml       (User configuration)
 *
 * Data files (chunk store, embedding artifact) live wherever the
 * `storage` section of config.toml points; relative paths resolve
 * against the current working directory.
 */

import { join, resolve } from 'node:path';
import { homedir } from 'node:os';

/**
 * Get the kbi home directory. `KBI_HOME` overrides `~/.kbi`.
 */
export function getKbiDir(): string {
  const override = process.env.KBI_HOME?.trim();
  return override ? resolve(override) : join(homedir(), '.kbi');
}

/**
 * Get the config file path ($KBI_HOME/config.toml)
 */
export function getConfigPath(): string {
  return join(getKbiDir(), 'config.toml');
}

/**
 * Resolve a configured data path against the working directory.
 */
export function resolveDataPath(path: string): string {
  return resolve(path);
}
