/**
 * Source Discovery Types
 */

/**
 * A source file found by the scanner.
 */
export interface SourceFile {
  /** Absolute path to the file */
  path: string;

  /** Path relative to the scanned root directory, with forward slashes */
  relativePath: string;

  /** File size in bytes */
  size: number;
}

/**
 * Options for configuring the scanner.
 */
export interface ScanOptions {
  /**
   * Glob patterns relative to the root.
   * Default: ['**\/*.md']
   */
  patterns?: string[];

  /**
   * Maximum directory depth to traverse.
   * Default: Infinity
   */
  maxDepth?: number;

  /** Called for each file that could not be stat'ed */
  onError?: (path: string, error: Error) => void;
}

export interface ScanResult {
  /** Absolute path of the scanned root */
  rootPath: string;

  /** Files in lexical order of relativePath */
  files: SourceFile[];

  /** Sum of file sizes in bytes */
  totalSize: number;

  scanDurationMs: number;
}
